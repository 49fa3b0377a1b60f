export type {
  LayoutBBox,
  LayoutBlock,
  LayoutDocument,
  LayoutLine,
  LayoutPage,
  LayoutSpan,
} from './layout-document';
export { HEADING_LEVELS } from './document-outline';
export type {
  DocumentOutline,
  HeadingLevel,
  OutlineEntry,
} from './document-outline';
export type { StyleProfile } from './style-profile';
