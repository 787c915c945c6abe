import fs from 'fs-extra';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import { HIDDEN_FILE_PREFIX } from '../../shared/constants/library.constants';
import { NotFoundError, RecordFormatError, isErrnoException, toIOError } from '../base/ServiceError';
import { describeIssues } from './recordSchemas';

/**
 * Normalize a value for canonical encoding: object keys sorted at every level,
 * dates as UTC ISO-8601 strings.
 */
function toCanonical(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(toCanonical);
  if (value !== null && typeof value === 'object') {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of entries) {
      sorted[key] = toCanonical(entry);
    }
    return sorted;
  }
  return value;
}

/** Logically identical records always encode to identical text. */
export function encodeRecord(record: object): string {
  return `${JSON.stringify(toCanonical(record), null, 2)}\n`;
}

export function decodeRecord<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, filePath: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RecordFormatError(filePath, [`invalid JSON: ${reason}`], { cause: error });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new RecordFormatError(filePath, describeIssues(result.error), { cause: result.error });
  }
  return result.data;
}

/**
 * Persists one kind of record as a file with a fixed name inside a root directory.
 *
 * Saves go through a hidden temp file in the same directory followed by a rename,
 * so a reader sees either the previous file or the new one in full.
 */
export class MetadataStore<T extends object> {
  constructor(
    private readonly fileName: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  recordPath(rootPath: string): string {
    return path.join(rootPath, this.fileName);
  }

  /** @throws NotFoundError when no record file exists under `rootPath` */
  async load(rootPath: string): Promise<T> {
    const filePath = this.recordPath(rootPath);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(`No ${this.fileName} under ${rootPath}`, { cause: error });
      }
      throw toIOError(error, 'read', filePath);
    }
    return decodeRecord(raw, this.schema, filePath);
  }

  async save(record: T, rootPath: string): Promise<void> {
    const filePath = this.recordPath(rootPath);
    const tempPath = path.join(rootPath, `${HIDDEN_FILE_PREFIX}${this.fileName}.${uuidv4()}.tmp`);
    const data = encodeRecord(record);

    try {
      await fs.writeFile(tempPath, data, 'utf8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.remove(tempPath);
      throw toIOError(error, 'write', filePath);
    }
  }
}
