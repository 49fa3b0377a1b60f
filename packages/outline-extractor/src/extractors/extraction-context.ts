import type { StyleProfile } from '@pdf-outline/model';

/**
 * State of one extraction call, created per document and then discarded
 */
export interface ExtractionContext {
  profile: StyleProfile;
  title: string;

  /**
   * Dedup keys of every candidate accepted so far in this document
   */
  seen: Set<string>;

  pageOffset: number;
}

export function createDedupKey(
  text: string,
  level: string,
  page: number,
): string {
  return JSON.stringify([text, level, page]);
}
