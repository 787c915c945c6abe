import fs from 'fs-extra';
import * as path from 'path';
import type { PageContentResult } from '../../shared/types/library.types';
import { isErrnoException } from '../base/ServiceError';

/** Supplies the raw text of a page. Implementations report failures as results and never throw. */
export interface ContentProvider {
  readPage(notebookPath: string, pageId: string): Promise<PageContentResult>;
}

/** Reads pages from disk as strict UTF-8; bytes that do not decode come back as `unreadable`. */
export class FileContentProvider implements ContentProvider {
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  async readPage(notebookPath: string, pageId: string): Promise<PageContentResult> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(path.join(notebookPath, pageId));
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { status: 'not-found' };
      }
      return { status: 'unreadable', reason: isErrnoException(error) ? `${error.code}` : String(error) };
    }

    try {
      return { status: 'ok', text: this.decoder.decode(bytes) };
    } catch {
      return { status: 'unreadable', reason: 'content is not valid UTF-8' };
    }
  }
}
