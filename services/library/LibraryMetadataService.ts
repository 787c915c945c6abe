import type { z } from 'zod';
import type {
  LibraryIndex,
  NotebookEntry,
  NotebookFieldsPatch,
  NotebookToc,
  NotebookTocFieldsPatch,
  PageEntry,
} from '../../shared/types/library.types';
import { nextTimestamp, type Clock } from '../../utils/clock';
import { BaseService } from '../base/BaseService';
import { NotFoundError, ValidationError } from '../base/ServiceError';
import { sortPages } from './indexMerge';
import type { LibraryEventBus } from './LibraryEventBus';
import type { MetadataStore } from './MetadataStore';
import {
  describeIssues,
  notebookFieldsPatchSchema,
  notebookTocFieldsPatchSchema,
  pageTagsSchema,
} from './recordSchemas';

export interface LibraryMetadataServiceDeps {
  clock: Clock;
  libraryStore: MetadataStore<LibraryIndex>;
  tocStore: MetadataStore<NotebookToc>;
  eventBus?: LibraryEventBus;
}

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, label: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}`, describeIssues(result.error), { cause: result.error });
  }
  return result.data;
}

/**
 * Targeted edits to user-owned metadata. Each call loads one record, patches a
 * single entry and saves; nothing here looks at the directory tree, and a
 * missing record or entry is never created implicitly.
 */
export class LibraryMetadataService extends BaseService<LibraryMetadataServiceDeps> {
  constructor(deps: LibraryMetadataServiceDeps) {
    super('LibraryMetadataService', deps);
  }

  /**
   * Apply `patch` to one notebook entry of the library index. Fields absent
   * from the patch keep their values.
   * @throws NotFoundError when the index or the notebook does not exist; nothing is written.
   */
  async updateNotebookFields(
    libraryPath: string,
    notebookId: string,
    patch: NotebookFieldsPatch
  ): Promise<NotebookEntry> {
    return this.execute(
      'updateNotebookFields',
      async () => {
        const fields = parseInput(notebookFieldsPatchSchema, patch, 'notebook fields');
        const index = await this.deps.libraryStore.load(libraryPath);

        const current = index.notebooks.find((notebook) => notebook.id === notebookId);
        if (!current) {
          throw new NotFoundError(`Notebook "${notebookId}" not found in library index`);
        }

        const now = this.deps.clock.now();
        const updated: NotebookEntry = {
          ...current,
          displayName: fields.displayName ?? current.displayName,
          description: fields.description ?? current.description,
          tags: fields.tags ?? current.tags,
          icon: fields.icon ?? current.icon,
          color: fields.color ?? current.color,
          lastModified: nextTimestamp(current.lastModified, now),
        };

        await this.deps.libraryStore.save(
          {
            ...index,
            notebooks: index.notebooks.map((notebook) => (notebook.id === notebookId ? updated : notebook)),
            lastModified: nextTimestamp(index.lastModified, now),
          },
          libraryPath
        );

        this.logInfo(`Updated notebook ${notebookId}`, { libraryPath, fields: Object.keys(fields) });
        this.deps.eventBus?.emit('notebook:metadata-updated', { libraryPath, notebook: updated });
        return updated;
      },
      { libraryPath, notebookId }
    );
  }

  /**
   * Replace the tags of one page. The page's `lastModified` stays tied to its file.
   * @throws NotFoundError when the TOC or the page does not exist; nothing is written.
   */
  async updatePageTags(notebookPath: string, pageId: string, tags: string[]): Promise<PageEntry> {
    return this.execute(
      'updatePageTags',
      async () => {
        const nextTags = parseInput(pageTagsSchema, tags, 'page tags');
        const toc = await this.deps.tocStore.load(notebookPath);

        const current = toc.pages.find((page) => page.id === pageId);
        if (!current) {
          throw new NotFoundError(`Page "${pageId}" not found in notebook TOC`);
        }

        const updated: PageEntry = { ...current, tags: nextTags };
        await this.deps.tocStore.save(
          {
            ...toc,
            pages: sortPages(toc.pages.map((page) => (page.id === pageId ? updated : page))),
            lastModified: nextTimestamp(toc.lastModified, this.deps.clock.now()),
          },
          notebookPath
        );

        this.logInfo(`Updated tags of page ${pageId}`, { notebookPath, tagCount: nextTags.length });
        this.deps.eventBus?.emit('page:tags-updated', { notebookPath, page: updated });
        return updated;
      },
      { notebookPath, pageId }
    );
  }

  /**
   * Patch the notebook-level fields of a TOC record.
   * @throws NotFoundError when the TOC does not exist.
   */
  async updateNotebookTocFields(notebookPath: string, patch: NotebookTocFieldsPatch): Promise<NotebookToc> {
    return this.execute(
      'updateNotebookTocFields',
      async () => {
        const fields = parseInput(notebookTocFieldsPatchSchema, patch, 'notebook TOC fields');
        const toc = await this.deps.tocStore.load(notebookPath);

        const updated: NotebookToc = {
          ...toc,
          displayName: fields.displayName ?? toc.displayName,
          description: fields.description ?? toc.description,
          tags: fields.tags ?? toc.tags,
          pages: sortPages(toc.pages),
          lastModified: nextTimestamp(toc.lastModified, this.deps.clock.now()),
        };
        await this.deps.tocStore.save(updated, notebookPath);

        this.logInfo('Updated notebook TOC fields', { notebookPath, fields: Object.keys(fields) });
        this.deps.eventBus?.emit('notebook:toc-updated', { notebookPath, toc: updated });
        return updated;
      },
      { notebookPath }
    );
  }
}
