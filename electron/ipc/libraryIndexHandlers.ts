import { z } from 'zod';
import {
  LIBRARY_GET_INDEX,
  LIBRARY_RECONCILE,
  LIBRARY_RECONCILE_TREE,
  LIBRARY_UPDATE_NOTEBOOK,
  NOTEBOOK_GET_TOC,
  NOTEBOOK_RECONCILE,
  NOTEBOOK_UPDATE_PAGE_TAGS,
  NOTEBOOK_UPDATE_TOC,
} from '../../shared/ipcChannels';
import { ValidationError } from '../../services/base/ServiceError';
import type { LibraryIndexService } from '../../services/library/LibraryIndexService';
import type { LibraryMetadataService } from '../../services/library/LibraryMetadataService';
import {
  describeIssues,
  notebookFieldsPatchSchema,
  notebookTocFieldsPatchSchema,
  pageTagsSchema,
} from '../../services/library/recordSchemas';
import { logger } from '../../utils/logger';

export type IpcInvokeListener = (event: unknown, ...args: unknown[]) => Promise<unknown>;

/** The part of Electron's `ipcMain` these handlers need. */
export interface IpcHandlerRegistry {
  handle(channel: string, listener: IpcInvokeListener): void;
}

const rootPath = z.string().min(1);
const identity = z.string().min(1);

function parseArgs<T extends [z.ZodTypeAny, ...z.ZodTypeAny[]]>(
  channel: string,
  schema: z.ZodTuple<T>,
  args: unknown[]
): z.infer<z.ZodTuple<T>> {
  const result = schema.safeParse(args);
  if (!result.success) {
    throw new ValidationError(`Invalid arguments for ${channel}`, describeIssues(result.error));
  }
  return result.data;
}

export function registerLibraryIndexHandlers(
  ipcMain: IpcHandlerRegistry,
  indexService: LibraryIndexService,
  metadataService: LibraryMetadataService
): void {
  function register(channel: string, label: string, run: (args: unknown[]) => Promise<unknown>): void {
    ipcMain.handle(channel, async (_event, ...args) => {
      try {
        logger.debug({ channel, args }, `[LibraryIndex] ${label}`);
        return await run(args);
      } catch (error) {
        logger.error({ channel, err: error }, `[LibraryIndex] Error: ${label}`);
        throw error;
      }
    });
  }

  // Read-only views for presentation layers
  register(LIBRARY_GET_INDEX, 'Getting library index', (args) => {
    const [libraryPath] = parseArgs(LIBRARY_GET_INDEX, z.tuple([rootPath]), args);
    return indexService.getLibraryIndex(libraryPath);
  });

  register(NOTEBOOK_GET_TOC, 'Getting notebook TOC', (args) => {
    const [notebookPath] = parseArgs(NOTEBOOK_GET_TOC, z.tuple([rootPath]), args);
    return indexService.getNotebookToc(notebookPath);
  });

  // Rescans
  register(LIBRARY_RECONCILE, 'Reconciling library', (args) => {
    const [libraryPath] = parseArgs(LIBRARY_RECONCILE, z.tuple([rootPath]), args);
    return indexService.reconcileLibrary(libraryPath);
  });

  register(LIBRARY_RECONCILE_TREE, 'Reconciling library tree', (args) => {
    const [libraryPath] = parseArgs(LIBRARY_RECONCILE_TREE, z.tuple([rootPath]), args);
    return indexService.reconcileLibraryTree(libraryPath);
  });

  register(NOTEBOOK_RECONCILE, 'Reconciling notebook', (args) => {
    const [notebookPath] = parseArgs(NOTEBOOK_RECONCILE, z.tuple([rootPath]), args);
    return indexService.reconcileNotebook(notebookPath);
  });

  // Targeted edits
  register(LIBRARY_UPDATE_NOTEBOOK, 'Updating notebook fields', (args) => {
    const [libraryPath, notebookId, patch] = parseArgs(
      LIBRARY_UPDATE_NOTEBOOK,
      z.tuple([rootPath, identity, notebookFieldsPatchSchema]),
      args
    );
    return metadataService.updateNotebookFields(libraryPath, notebookId, patch);
  });

  register(NOTEBOOK_UPDATE_TOC, 'Updating notebook TOC fields', (args) => {
    const [notebookPath, patch] = parseArgs(
      NOTEBOOK_UPDATE_TOC,
      z.tuple([rootPath, notebookTocFieldsPatchSchema]),
      args
    );
    return metadataService.updateNotebookTocFields(notebookPath, patch);
  });

  register(NOTEBOOK_UPDATE_PAGE_TAGS, 'Updating page tags', (args) => {
    const [notebookPath, pageId, tags] = parseArgs(
      NOTEBOOK_UPDATE_PAGE_TAGS,
      z.tuple([rootPath, identity, pageTagsSchema]),
      args
    );
    return metadataService.updatePageTags(notebookPath, pageId, tags);
  });

  logger.info('[LibraryIndex] IPC handlers registered');
}
