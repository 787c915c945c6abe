import { HEADER_BLOCK_DELIMITER, PREVIEW_CONFIG } from '../../shared/constants/library.constants';
import type { PageContentInfo } from '../../shared/types/library.types';

export interface ExtractOptions {
  noteExtension?: string;
  previewMaxLength?: number;
}

const LINE_BREAK = /\r\n|\r|\n/;

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

/** Strip `extension` from the end of `fileName`, case-insensitively. */
export function stripExtension(fileName: string, extension: string): string {
  if (extension && fileName.toLowerCase().endsWith(extension.toLowerCase())) {
    return fileName.slice(0, fileName.length - extension.length);
  }
  return fileName;
}

/** Count of maximal non-whitespace runs across the whole text. */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

/** True when the text opens with a metadata header block delimiter. */
export function hasHeaderBlock(text: string): boolean {
  return text.startsWith(HEADER_BLOCK_DELIMITER);
}

/**
 * Derive a page's title, preview and word count from its raw text.
 *
 * - title: the first non-blank line as written, or `fallbackName` without the
 *   note extension when every line is blank.
 * - preview: the first three non-blank lines joined by single spaces, cut at
 *   `previewMaxLength` code points. The cut ignores word boundaries.
 * - wordCount: counted over the full text, not the preview.
 */
export function extractPageInfo(text: string, fallbackName: string, options: ExtractOptions = {}): PageContentInfo {
  const noteExtension = options.noteExtension ?? '';
  const previewMaxLength = options.previewMaxLength ?? PREVIEW_CONFIG.maxLength;

  const lines = text.split(LINE_BREAK).filter((line) => !isBlank(line));
  const title = lines.length > 0 ? lines[0] : stripExtension(fallbackName, noteExtension);
  const preview = Array.from(lines.slice(0, PREVIEW_CONFIG.lineCount).join(' '))
    .slice(0, previewMaxLength)
    .join('');

  return { title, preview, wordCount: countWords(text) };
}
