import { NOTEBOOK_DEFAULTS } from '../../shared/constants/library.constants';
import type {
  NotebookEntry,
  NotebookObservation,
  PageEntry,
  PageObservation,
} from '../../shared/types/library.types';

export interface MergeResult<TEntry> {
  entries: TEntry[];
  added: string[];
  updated: string[];
  removed: string[];
}

interface MergeRules<TEntry, TObservation> {
  create(observation: TObservation): TEntry;
  update(existing: TEntry, observation: TObservation): TEntry;
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Fold fresh observations over the persisted entries, matching by `id`.
 * Observed ids are updated or created; persisted ids that were not observed
 * are dropped. The result depends only on the two inputs.
 */
export function mergeByIdentity<TEntry extends { id: string }, TObservation extends { id: string }>(
  existing: TEntry[],
  observations: TObservation[],
  rules: MergeRules<TEntry, TObservation>
): MergeResult<TEntry> {
  const persisted = new Map(existing.map((entry) => [entry.id, entry]));
  const observed = new Set<string>();
  const result: MergeResult<TEntry> = { entries: [], added: [], updated: [], removed: [] };

  for (const observation of observations) {
    if (observed.has(observation.id)) continue;
    observed.add(observation.id);

    const current = persisted.get(observation.id);
    if (current) {
      result.entries.push(rules.update(current, observation));
      result.updated.push(observation.id);
    } else {
      result.entries.push(rules.create(observation));
      result.added.push(observation.id);
    }
  }

  result.removed = existing.filter((entry) => !observed.has(entry.id)).map((entry) => entry.id);
  return result;
}

const notebookRules: MergeRules<NotebookEntry, NotebookObservation> = {
  create: (observation) => ({
    id: observation.id,
    displayName: observation.id,
    description: NOTEBOOK_DEFAULTS.description,
    tags: [],
    icon: NOTEBOOK_DEFAULTS.icon,
    color: NOTEBOOK_DEFAULTS.color,
    noteCount: observation.noteCount,
    createdAt: observation.createdAt,
    lastModified: observation.modifiedAt,
  }),
  // User-editable fields and createdAt carry over untouched
  update: (existing, observation) => ({
    ...existing,
    noteCount: observation.noteCount,
    lastModified: observation.modifiedAt,
  }),
};

const pageRules: MergeRules<PageEntry, PageObservation> = {
  create: (observation) => ({
    id: observation.id,
    title: observation.title,
    tags: [],
    preview: observation.preview,
    wordCount: observation.wordCount,
    createdAt: observation.createdAt,
    lastModified: observation.modifiedAt,
    hasHeaderBlock: observation.hasHeaderBlock,
  }),
  update: (existing, observation) => ({
    ...existing,
    title: observation.title,
    preview: observation.preview,
    wordCount: observation.wordCount,
    lastModified: observation.modifiedAt,
    hasHeaderBlock: observation.hasHeaderBlock,
  }),
};

/** Newest first; equal timestamps fall back to id order. */
export function sortPages(pages: PageEntry[]): PageEntry[] {
  return [...pages].sort(
    (a, b) => b.lastModified.getTime() - a.lastModified.getTime() || compareIds(a.id, b.id)
  );
}

export function mergeNotebooks(
  existing: NotebookEntry[],
  observations: NotebookObservation[]
): MergeResult<NotebookEntry> {
  const result = mergeByIdentity(existing, observations, notebookRules);
  result.entries.sort((a, b) => compareIds(a.id, b.id));
  return result;
}

export function mergePages(existing: PageEntry[], observations: PageObservation[]): MergeResult<PageEntry> {
  const result = mergeByIdentity(existing, observations, pageRules);
  return { ...result, entries: sortPages(result.entries) };
}
