// Keyed JSON record files
// Each store is a single `{ version, records }` file under the config dir,
// replaced atomically on every write.

import { readFile, writeFile, rename, rm, chmod } from 'fs/promises';
import { join } from 'path';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import { ensureConfigDir } from '../utils/platform.js';
import { StoreError, errorMessage } from '../errors.js';

const STORE_VERSION = 1;

export interface RecordStoreOptions<T> {
  dir: string;
  fileName: string;
  schema: z.ZodType<T>;
  /** File mode applied on every write (e.g. 0o600 for secrets) */
  mode?: number;
}

export class RecordStore<T> {
  readonly filePath: string;
  private readonly fileSchema = z.object({
    version: z.literal(STORE_VERSION),
    records: z.record(z.unknown()),
  });

  constructor(private readonly options: RecordStoreOptions<T>) {
    this.filePath = join(options.dir, options.fileName);
  }

  /**
   * Read all records. A missing, unreadable or malformed file reads as empty;
   * a single invalid record is dropped without touching the others.
   */
  async load(): Promise<Record<string, T>> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      return {};
    }

    const parsed = this.fileSchema.safeParse(raw);
    if (!parsed.success) {
      return {};
    }

    const records: Record<string, T> = {};
    for (const [key, value] of Object.entries(parsed.data.records)) {
      const record = this.options.schema.safeParse(value);
      if (record.success) {
        records[key] = record.data;
      }
    }
    return records;
  }

  async get(key: string): Promise<T | undefined> {
    const records = await this.load();
    return Object.prototype.hasOwnProperty.call(records, key) ? records[key] : undefined;
  }

  async put(key: string, value: T): Promise<T | undefined> {
    const records = await this.load();
    const previous = Object.prototype.hasOwnProperty.call(records, key) ? records[key] : undefined;
    records[key] = value;
    await this.save(records);
    return previous;
  }

  async delete(key: string): Promise<boolean> {
    const records = await this.load();
    if (!Object.prototype.hasOwnProperty.call(records, key)) {
      return false;
    }
    delete records[key];
    await this.save(records);
    return true;
  }

  async entries(): Promise<Array<[string, T]>> {
    return Object.entries(await this.load());
  }

  async clear(): Promise<void> {
    await this.save({});
  }

  /**
   * Write to a temp file beside the target, then rename over it.
   */
  private async save(records: Record<string, T>): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
    const data = JSON.stringify({ version: STORE_VERSION, records }, null, 2);
    const mode = this.options.mode ?? 0o644;

    try {
      await ensureConfigDir(this.options.dir);
      await writeFile(tempPath, data, { encoding: 'utf-8', mode });
      // writeFile's mode is masked by umask
      await chmod(tempPath, mode);
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch(() => undefined);
      throw new StoreError('PersistError', `Could not write ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
