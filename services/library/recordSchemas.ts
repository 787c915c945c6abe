import { z } from 'zod';
import { NOTEBOOK_DEFAULTS } from '../../shared/constants/library.constants';
import type {
  LibraryIndex,
  NotebookFieldsPatch,
  NotebookToc,
  NotebookTocFieldsPatch,
} from '../../shared/types/library.types';

const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

/** Trimmed, non-empty, first occurrence wins. */
export function normalizeTags(tags: string[]): string[] {
  const seen = new Set<string>();
  for (const tag of tags) {
    const trimmed = tag.trim();
    if (trimmed) seen.add(trimmed);
  }
  return Array.from(seen);
}

const tagList = z.array(z.string()).transform(normalizeTags);

function requireUniqueIds(entries: Array<{ id: string }>, field: string, ctx: z.RefinementCtx): void {
  const seen = new Set<string>();
  entries.forEach((entry, index) => {
    if (seen.has(entry.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [field, index, 'id'],
        message: `Duplicate id "${entry.id}"`,
      });
    }
    seen.add(entry.id);
  });
}

export const notebookEntrySchema = z.object({
  id: z.string().min(1),
  displayName: z.string(),
  description: z.string().default(NOTEBOOK_DEFAULTS.description),
  tags: z.array(z.string()).default([]),
  icon: z.string().default(NOTEBOOK_DEFAULTS.icon),
  color: z.string().default(NOTEBOOK_DEFAULTS.color),
  noteCount: z.number().int().nonnegative(),
  createdAt: timestamp,
  lastModified: timestamp,
});

export const libraryIndexSchema: z.ZodType<LibraryIndex, z.ZodTypeDef, unknown> = z
  .object({
    name: z.string(),
    createdAt: timestamp,
    lastModified: timestamp,
    notebooks: z.array(notebookEntrySchema),
  })
  .superRefine((index, ctx) => requireUniqueIds(index.notebooks, 'notebooks', ctx));

export const pageEntrySchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  tags: z.array(z.string()).default([]),
  preview: z.string(),
  wordCount: z.number().int().nonnegative(),
  createdAt: timestamp,
  lastModified: timestamp,
  hasHeaderBlock: z.boolean(),
});

export const notebookTocSchema: z.ZodType<NotebookToc, z.ZodTypeDef, unknown> = z
  .object({
    name: z.string(),
    displayName: z.string(),
    description: z.string().default(''),
    tags: z.array(z.string()).default([]),
    createdAt: timestamp,
    lastModified: timestamp,
    pages: z.array(pageEntrySchema),
  })
  .superRefine((toc, ctx) => requireUniqueIds(toc.pages, 'pages', ctx));

// Patches accepted by the mutators. Unknown keys are rejected so a typo never
// silently becomes a no-op.
export const notebookFieldsPatchSchema: z.ZodType<NotebookFieldsPatch, z.ZodTypeDef, unknown> = z
  .object({
    displayName: z.string().trim().min(1).optional(),
    description: z.string().optional(),
    tags: tagList.optional(),
    icon: z.string().min(1).optional(),
    color: z.string().min(1).optional(),
  })
  .strict();

export const notebookTocFieldsPatchSchema: z.ZodType<NotebookTocFieldsPatch, z.ZodTypeDef, unknown> = z
  .object({
    displayName: z.string().trim().min(1).optional(),
    description: z.string().optional(),
    tags: tagList.optional(),
  })
  .strict();

export const pageTagsSchema: z.ZodType<string[], z.ZodTypeDef, unknown> = tagList;

/** Flatten zod issues into `path: message` lines. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
