import type { LibraryIndex, NotebookToc } from '../../shared/types/library.types';
import { systemClock, type Clock } from '../../utils/clock';
import { loadConfig, type LibraryIndexConfig } from '../../utils/config';
import { FileContentProvider, type ContentProvider } from './ContentProvider';
import { DirectoryScanner } from './DirectoryScanner';
import { LibraryEventBus } from './LibraryEventBus';
import { LibraryIndexService } from './LibraryIndexService';
import { LibraryMetadataService } from './LibraryMetadataService';
import { MetadataStore } from './MetadataStore';
import { libraryIndexSchema, notebookTocSchema } from './recordSchemas';

export interface LibraryServicesOptions {
  config?: LibraryIndexConfig;
  clock?: Clock;
  contentProvider?: ContentProvider;
  eventBus?: LibraryEventBus;
}

export interface LibraryServices {
  config: LibraryIndexConfig;
  eventBus: LibraryEventBus;
  scanner: DirectoryScanner;
  libraryStore: MetadataStore<LibraryIndex>;
  tocStore: MetadataStore<NotebookToc>;
  indexService: LibraryIndexService;
  metadataService: LibraryMetadataService;
}

/** Wire the library index services, sharing one config, clock, store pair and event bus. */
export function createLibraryServices(options: LibraryServicesOptions = {}): LibraryServices {
  const config = options.config ?? loadConfig();
  const clock = options.clock ?? systemClock;
  const eventBus = options.eventBus ?? new LibraryEventBus();
  const contentProvider = options.contentProvider ?? new FileContentProvider();

  const scanner = new DirectoryScanner({ config });
  const libraryStore = new MetadataStore<LibraryIndex>(config.indexFileName, libraryIndexSchema);
  const tocStore = new MetadataStore<NotebookToc>(config.tocFileName, notebookTocSchema);

  const indexService = new LibraryIndexService({
    config,
    clock,
    scanner,
    contentProvider,
    libraryStore,
    tocStore,
    eventBus,
  });
  const metadataService = new LibraryMetadataService({ clock, libraryStore, tocStore, eventBus });

  return { config, eventBus, scanner, libraryStore, tocStore, indexService, metadataService };
}
