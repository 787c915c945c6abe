import { z } from 'zod';
import { LIBRARY_FILES, PREVIEW_CONFIG } from '../shared/constants/library.constants';

export interface LibraryIndexConfig {
  indexFileName: string;
  tocFileName: string;
  mediaDirName: string;
  noteExtension: string; // Lower-cased, leading dot
  previewMaxLength: number;
}

export const DEFAULT_CONFIG: LibraryIndexConfig = {
  ...LIBRARY_FILES,
  previewMaxLength: PREVIEW_CONFIG.maxLength,
};

const fileName = z
  .string()
  .trim()
  .min(1)
  .refine((name) => !/[\\/]/.test(name), 'must be a bare file name');

const envSchema = z.object({
  LIBRARY_INDEX_FILE: fileName.optional(),
  LIBRARY_TOC_FILE: fileName.optional(),
  LIBRARY_MEDIA_DIR: fileName.optional(),
  LIBRARY_NOTE_EXTENSION: z
    .string()
    .trim()
    .regex(/^\.?[A-Za-z0-9]+$/, 'must look like ".md" or "md"')
    .optional(),
  LIBRARY_PREVIEW_MAX_LENGTH: z.coerce.number().int().positive().optional(),
});

export function normalizeExtension(extension: string): string {
  const lower = extension.toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Resolve configuration from environment variables, falling back to the defaults.
 * Throws a ZodError naming the offending variable when a value is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LibraryIndexConfig {
  const parsed = envSchema.parse(env);
  return {
    indexFileName: parsed.LIBRARY_INDEX_FILE ?? DEFAULT_CONFIG.indexFileName,
    tocFileName: parsed.LIBRARY_TOC_FILE ?? DEFAULT_CONFIG.tocFileName,
    mediaDirName: parsed.LIBRARY_MEDIA_DIR ?? DEFAULT_CONFIG.mediaDirName,
    noteExtension: normalizeExtension(parsed.LIBRARY_NOTE_EXTENSION ?? DEFAULT_CONFIG.noteExtension),
    previewMaxLength: parsed.LIBRARY_PREVIEW_MAX_LENGTH ?? DEFAULT_CONFIG.previewMaxLength,
  };
}
