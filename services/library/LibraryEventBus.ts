import { EventEmitter } from 'events';
import type {
  LibraryIndex,
  NotebookEntry,
  NotebookToc,
  PageEntry,
  ReconcileStats,
} from '../../shared/types/library.types';
import { createLogger } from '../../utils/logger';

/** Payloads of the events emitted after a record has been persisted. */
export interface LibraryEvent {
  'library:reconciled': { libraryPath: string; index: LibraryIndex; stats: ReconcileStats };
  'notebook:reconciled': { notebookPath: string; toc: NotebookToc; stats: ReconcileStats };
  'notebook:metadata-updated': { libraryPath: string; notebook: NotebookEntry };
  'notebook:toc-updated': { notebookPath: string; toc: NotebookToc };
  'page:tags-updated': { notebookPath: string; page: PageEntry };
}

export type LibraryEventName = keyof LibraryEvent;

/**
 * Typed wrapper over EventEmitter so presentation layers can follow index
 * changes without polling the record files.
 */
export class LibraryEventBus {
  private readonly emitter = new EventEmitter();
  private readonly logger = createLogger('LibraryEventBus');

  on<K extends LibraryEventName>(event: K, listener: (payload: LibraryEvent[K]) => void): void {
    this.emitter.on(event, listener);
  }

  once<K extends LibraryEventName>(event: K, listener: (payload: LibraryEvent[K]) => void): void {
    this.emitter.once(event, listener);
  }

  off<K extends LibraryEventName>(event: K, listener: (payload: LibraryEvent[K]) => void): void {
    this.emitter.off(event, listener);
  }

  /**
   * Listeners run synchronously, in registration order. A throwing listener is
   * logged; the remaining listeners still run and the emitter does not throw.
   */
  emit<K extends LibraryEventName>(event: K, payload: LibraryEvent[K]): void {
    // rawListeners keeps `once` wrappers, so calling one also unregisters it
    for (const listener of this.emitter.rawListeners(event)) {
      try {
        listener.call(this.emitter, payload);
      } catch (error) {
        this.logger.error({ err: error, event }, 'Library event listener failed');
      }
    }
  }

  listenerCount(event: LibraryEventName): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(event?: LibraryEventName): void {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
  }
}
