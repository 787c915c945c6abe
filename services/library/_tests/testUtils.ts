import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import type { Clock } from '../../../utils/clock';

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'library-index-'));
}

/** Write a file and pin its mtime so timestamps in assertions are known. */
export async function writeFileAt(filePath: string, content: string | Buffer, mtime: Date): Promise<void> {
  await fs.outputFile(filePath, content);
  await fs.utimes(filePath, mtime, mtime);
}

export async function setMtime(targetPath: string, mtime: Date): Promise<void> {
  await fs.utimes(targetPath, mtime, mtime);
}

/** Clock whose time tests can move by hand. */
export function manualClock(start: string): Clock & { set(time: string): void } {
  let current = new Date(start);
  return {
    now: () => new Date(current),
    set: (time: string) => {
      current = new Date(time);
    },
  };
}

export async function listTempFiles(dirPath: string): Promise<string[]> {
  return (await fs.readdir(dirPath)).filter((name) => name.endsWith('.tmp'));
}
