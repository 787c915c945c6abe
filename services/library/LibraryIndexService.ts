import * as path from 'path';
import type {
  IndexLevel,
  LibraryIndex,
  LibraryTreeResult,
  NotebookObservation,
  NotebookToc,
  PageObservation,
  ReconcileStats,
} from '../../shared/types/library.types';
import { nextTimestamp, type Clock } from '../../utils/clock';
import type { LibraryIndexConfig } from '../../utils/config';
import { BaseService } from '../base/BaseService';
import { IOError, NotFoundError } from '../base/ServiceError';
import type { ContentProvider } from './ContentProvider';
import { extractPageInfo, hasHeaderBlock } from './contentExtractor';
import type { DirectoryScanner } from './DirectoryScanner';
import { mergeNotebooks, mergePages, type MergeResult } from './indexMerge';
import type { LibraryEventBus } from './LibraryEventBus';
import { encodeRecord, type MetadataStore } from './MetadataStore';

export interface LibraryIndexServiceDeps {
  config: LibraryIndexConfig;
  clock: Clock;
  scanner: DirectoryScanner;
  contentProvider: ContentProvider;
  libraryStore: MetadataStore<LibraryIndex>;
  tocStore: MetadataStore<NotebookToc>;
  eventBus?: LibraryEventBus;
}

function baseName(rootPath: string): string {
  return path.basename(path.resolve(rootPath));
}

function toStats(
  level: IndexLevel,
  rootPath: string,
  merge: MergeResult<unknown>,
  changed: boolean,
  degraded: string[] = []
): ReconcileStats {
  return {
    level,
    rootPath,
    added: merge.added,
    updated: merge.updated,
    removed: merge.removed,
    degraded,
    total: merge.entries.length,
    changed,
  };
}

/**
 * Keeps the library index and notebook TOCs in step with the directory tree.
 *
 * The filesystem decides which entries exist and owns every derived field;
 * the persisted records own the user-editable fields. A rescan never touches
 * the latter except when it creates an entry.
 */
export class LibraryIndexService extends BaseService<LibraryIndexServiceDeps> {
  constructor(deps: LibraryIndexServiceDeps) {
    super('LibraryIndexService', deps);
  }

  /** Persisted library index, created empty on first access. */
  async getLibraryIndex(libraryPath: string): Promise<LibraryIndex> {
    return this.execute('getLibraryIndex', () => this.loadOrCreateLibrary(libraryPath), { libraryPath });
  }

  /** Persisted notebook TOC, created empty on first access. */
  async getNotebookToc(notebookPath: string): Promise<NotebookToc> {
    return this.execute('getNotebookToc', () => this.loadOrCreateToc(notebookPath), { notebookPath });
  }

  async reconcile(rootPath: string, level: IndexLevel): Promise<ReconcileStats> {
    return level === 'library' ? this.reconcileLibrary(rootPath) : this.reconcileNotebook(rootPath);
  }

  /** Merge the notebook directories under `libraryPath` into its index. */
  async reconcileLibrary(libraryPath: string): Promise<ReconcileStats> {
    return this.execute(
      'reconcileLibrary',
      async () => (await this.syncLibrary(libraryPath)).stats,
      { libraryPath }
    );
  }

  /** Merge the page files under `notebookPath` into its TOC, re-reading every page. */
  async reconcileNotebook(notebookPath: string): Promise<ReconcileStats> {
    return this.execute('reconcileNotebook', () => this.syncNotebook(notebookPath), { notebookPath });
  }

  /**
   * Reconcile the library level, then each notebook it lists. A notebook that
   * fails is reported in `failures` and the sweep moves on; a library-level
   * failure aborts.
   */
  async reconcileLibraryTree(libraryPath: string): Promise<LibraryTreeResult> {
    return this.execute(
      'reconcileLibraryTree',
      async () => {
        const { index, stats } = await this.syncLibrary(libraryPath);
        const result: LibraryTreeResult = { library: stats, notebooks: [], failures: [] };

        for (const notebook of index.notebooks) {
          const notebookPath = path.join(libraryPath, notebook.id);
          try {
            result.notebooks.push(await this.syncNotebook(notebookPath));
          } catch (error) {
            this.logError(`Failed to reconcile notebook ${notebook.id}`, error, { notebookPath });
            result.failures.push({
              notebookId: notebook.id,
              error: error instanceof Error ? error.message : String(error),
            });
          }
        }

        // Writing a TOC moves its notebook directory's mtime, so the index is refreshed once more
        const refresh = await this.syncLibrary(libraryPath);
        result.library = { ...stats, changed: stats.changed || refresh.stats.changed };

        this.logInfo(
          `Reconciled library tree: ${result.notebooks.length} notebooks, ${result.failures.length} failures`,
          { libraryPath }
        );
        return result;
      },
      { libraryPath }
    );
  }

  private async syncLibrary(libraryPath: string): Promise<{ index: LibraryIndex; stats: ReconcileStats }> {
    const previous = await this.loadOrCreateLibrary(libraryPath);
    const scanned = await this.deps.scanner.scanChildren(libraryPath, 'notebooks');

    const observations: NotebookObservation[] = [];
    for (const entry of scanned) {
      observations.push({
        id: entry.name,
        noteCount: await this.countNotes(path.join(libraryPath, entry.name)),
        createdAt: entry.createdAt,
        modifiedAt: entry.modifiedAt,
      });
    }

    const merge = mergeNotebooks(previous.notebooks, observations);
    let index: LibraryIndex = { ...previous, notebooks: merge.entries };
    const changed = encodeRecord(index) !== encodeRecord(previous);

    if (changed) {
      index = { ...index, lastModified: nextTimestamp(previous.lastModified, this.deps.clock.now()) };
      await this.deps.libraryStore.save(index, libraryPath);
    }

    const stats = toStats('library', libraryPath, merge, changed);
    this.logInfo(
      `Library reconciled: +${stats.added.length} ~${stats.updated.length} -${stats.removed.length}`,
      { libraryPath, changed }
    );
    if (changed) {
      this.deps.eventBus?.emit('library:reconciled', { libraryPath, index, stats });
    }
    return { index, stats };
  }

  private async syncNotebook(notebookPath: string): Promise<ReconcileStats> {
    const previous = await this.loadOrCreateToc(notebookPath);
    const scanned = await this.deps.scanner.scanChildren(notebookPath, 'pages');
    const { noteExtension, previewMaxLength } = this.deps.config;

    const observations: PageObservation[] = [];
    const degraded: string[] = [];
    for (const entry of scanned) {
      const content = await this.deps.contentProvider.readPage(notebookPath, entry.name);
      let text = '';
      if (content.status === 'ok') {
        text = content.text;
      } else {
        // Indexed from empty text rather than failing the whole notebook
        degraded.push(entry.name);
        this.logWarn(`Page content ${content.status}, indexing as empty`, {
          notebookPath,
          pageId: entry.name,
          reason: content.status === 'unreadable' ? content.reason : undefined,
        });
      }

      observations.push({
        id: entry.name,
        ...extractPageInfo(text, entry.name, { noteExtension, previewMaxLength }),
        hasHeaderBlock: hasHeaderBlock(text),
        createdAt: entry.createdAt,
        modifiedAt: entry.modifiedAt,
      });
    }

    const merge = mergePages(previous.pages, observations);
    let toc: NotebookToc = { ...previous, pages: merge.entries };
    const changed = encodeRecord(toc) !== encodeRecord(previous);

    if (changed) {
      toc = { ...toc, lastModified: nextTimestamp(previous.lastModified, this.deps.clock.now()) };
      await this.deps.tocStore.save(toc, notebookPath);
    }

    const stats = toStats('notebook', notebookPath, merge, changed, degraded);
    this.logInfo(
      `Notebook reconciled: +${stats.added.length} ~${stats.updated.length} -${stats.removed.length}`,
      { notebookPath, changed, degraded: degraded.length }
    );
    if (changed) {
      this.deps.eventBus?.emit('notebook:reconciled', { notebookPath, toc, stats });
    }
    return stats;
  }

  private async countNotes(notebookPath: string): Promise<number> {
    try {
      return (await this.deps.scanner.scanChildren(notebookPath, 'pages')).length;
    } catch (error) {
      if (!(error instanceof IOError)) throw error;
      this.logWarn('Could not count notes, using 0', { notebookPath, error: error.message });
      return 0;
    }
  }

  private async loadOrCreateLibrary(libraryPath: string): Promise<LibraryIndex> {
    try {
      return await this.deps.libraryStore.load(libraryPath);
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
    }

    const now = this.deps.clock.now();
    const index: LibraryIndex = {
      name: baseName(libraryPath),
      createdAt: now,
      lastModified: now,
      notebooks: [],
    };
    await this.deps.libraryStore.save(index, libraryPath);
    this.logInfo('Created library index', { libraryPath });
    return index;
  }

  private async loadOrCreateToc(notebookPath: string): Promise<NotebookToc> {
    try {
      return await this.deps.tocStore.load(notebookPath);
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
    }

    const now = this.deps.clock.now();
    const name = baseName(notebookPath);
    const toc: NotebookToc = {
      name,
      displayName: name,
      description: '',
      tags: [],
      createdAt: now,
      lastModified: now,
      pages: [],
    };
    await this.deps.tocStore.save(toc, notebookPath);
    this.logInfo('Created notebook TOC', { notebookPath });
    return toc;
  }
}
