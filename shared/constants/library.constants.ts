/**
 * Shared constants for the library index
 */

/**
 * Well-known names inside a library tree
 */
export const LIBRARY_FILES = {
  indexFileName: 'index.json',
  tocFileName: 'toc.json',
  mediaDirName: 'media',
  noteExtension: '.md',
};

export const HIDDEN_FILE_PREFIX = '.';

/** Leading delimiter of a page's metadata header block. */
export const HEADER_BLOCK_DELIMITER = '---';

export const PREVIEW_CONFIG = {
  lineCount: 3,
  maxLength: 200,
};

/**
 * Values given to user-editable notebook fields on first discovery
 */
export const NOTEBOOK_DEFAULTS = {
  description: '',
  icon: '📓',
  color: 'blue',
};
