import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';

const PDF_EXTENSION = /\.pdf$/i;

/**
 * PDF files to process for an input path: the file itself, or every PDF
 * directly inside a directory (sorted by name)
 */
export async function findPdfFiles(inputPath: string): Promise<string[]> {
  const stats = await stat(inputPath);
  if (!stats.isDirectory()) {
    return PDF_EXTENSION.test(inputPath) ? [inputPath] : [];
  }

  const entries = await readdir(inputPath, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && PDF_EXTENSION.test(entry.name))
    .map((entry) => join(inputPath, entry.name))
    .sort();
}
