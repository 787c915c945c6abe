import fs from 'fs-extra';
import type { Stats } from 'fs';
import * as path from 'path';
import { HIDDEN_FILE_PREFIX } from '../../shared/constants/library.constants';
import type { ScanKind, ScannedEntry } from '../../shared/types/library.types';
import type { LibraryIndexConfig } from '../../utils/config';
import { BaseService } from '../base/BaseService';
import { isErrnoException, toIOError } from '../base/ServiceError';

export interface DirectoryScannerDeps {
  config: Pick<LibraryIndexConfig, 'mediaDirName' | 'noteExtension'>;
}

// Some filesystems report no birth time (0); the mtime is the closest stand-in.
function creationTime(stats: Stats): Date {
  return stats.birthtimeMs > 0 ? stats.birthtime : stats.mtime;
}

function compareNames(a: ScannedEntry, b: ScannedEntry): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Lists the immediate children of a directory that belong to one level of the
 * library tree. Each call reads the directory afresh.
 */
export class DirectoryScanner extends BaseService<DirectoryScannerDeps> {
  constructor(deps: DirectoryScannerDeps) {
    super('DirectoryScanner', deps);
  }

  /**
   * `notebooks`: directories, minus the media directory.
   * `pages`: regular files carrying the note extension.
   * Hidden entries are skipped at both levels. Results are sorted by name.
   *
   * @throws IOError when `dirPath` is missing, not a directory, or unreadable.
   * Nothing is returned in that case.
   */
  async scanChildren(dirPath: string, kind: ScanKind): Promise<ScannedEntry[]> {
    let names: string[];
    try {
      names = await fs.readdir(dirPath);
    } catch (error) {
      throw toIOError(error, 'scan', dirPath);
    }

    const entries: ScannedEntry[] = [];
    for (const name of names) {
      if (name.startsWith(HIDDEN_FILE_PREFIX)) continue;

      const fullPath = path.join(dirPath, name);
      let stats: Stats;
      try {
        stats = await fs.stat(fullPath);
      } catch (error) {
        // Deleted between readdir and stat: it is simply no longer a child.
        if (isErrnoException(error) && error.code === 'ENOENT') {
          this.logDebug('Entry vanished during scan', { path: fullPath });
          continue;
        }
        throw toIOError(error, 'stat', fullPath);
      }

      if (!this.accepts(kind, name, stats)) continue;

      entries.push({
        name,
        isDirectory: stats.isDirectory(),
        extension: stats.isDirectory() ? '' : path.extname(name).toLowerCase(),
        createdAt: creationTime(stats),
        modifiedAt: stats.mtime,
      });
    }

    this.logDebug(`Scanned ${entries.length} ${kind}`, { dirPath });
    return entries.sort(compareNames);
  }

  private accepts(kind: ScanKind, name: string, stats: Stats): boolean {
    const { mediaDirName, noteExtension } = this.deps.config;
    if (kind === 'notebooks') {
      return stats.isDirectory() && name !== mediaDirName;
    }
    return stats.isFile() && path.extname(name).toLowerCase() === noteExtension;
  }
}
