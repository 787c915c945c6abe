export * from './shared/types/library.types';
export * from './shared/ipcChannels';
export { LIBRARY_FILES, NOTEBOOK_DEFAULTS } from './shared/constants/library.constants';
export { loadConfig, DEFAULT_CONFIG, type LibraryIndexConfig } from './utils/config';
export { systemClock, fixedClock, type Clock } from './utils/clock';
export {
  ServiceError,
  NotFoundError,
  IOError,
  ValidationError,
  RecordFormatError,
  type ServiceErrorCode,
} from './services/base/ServiceError';
export { createLibraryServices, type LibraryServices, type LibraryServicesOptions } from './services/library/bootstrap';
export { LibraryIndexService } from './services/library/LibraryIndexService';
export { LibraryMetadataService } from './services/library/LibraryMetadataService';
export { LibraryEventBus, type LibraryEvent, type LibraryEventName } from './services/library/LibraryEventBus';
export { DirectoryScanner } from './services/library/DirectoryScanner';
export { MetadataStore, encodeRecord } from './services/library/MetadataStore';
export { FileContentProvider, type ContentProvider } from './services/library/ContentProvider';
export { extractPageInfo, hasHeaderBlock, countWords } from './services/library/contentExtractor';
export { mergeNotebooks, mergePages } from './services/library/indexMerge';
export { registerLibraryIndexHandlers, type IpcHandlerRegistry } from './electron/ipc/libraryIndexHandlers';
