import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { IKeyValueStore, KeyValueEntry, SetOptions } from '../../domain/repositories/IKeyValueStore';
import { ILogger } from '../../domain/common/ILogger';
import { Clock, systemClock } from '../../domain/common/Clock';
import { toError } from '../../domain/common/Errors';

const entrySchema = z.object({
  key: z.string(),
  value: z.unknown(),
  expiresAt: z.number().nullable(),
  updatedAt: z.number(),
});

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * File system based implementation of IKeyValueStore.
 * Stores each key as its own JSON file. Nothing is cached: both the
 * foreground and the background context read the same files, so every call
 * goes to disk. Writes land in a temp file first and are renamed into place.
 */
export class FileSystemKeyValueStore implements IKeyValueStore {
  private initialized: boolean = false;

  constructor(
    private readonly stateDir: string,
    private readonly logger: ILogger,
    private readonly clock: Clock = systemClock
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) return;
    await fs.mkdir(this.stateDir, { recursive: true });
    this.initialized = true;
  }

  private async ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      await this.initialize();
    }
  }

  private filePath(key: string): string {
    return path.join(this.stateDir, `${encodeURIComponent(key)}.json`);
  }

  private async readEntry(file: string): Promise<KeyValueEntry | null> {
    let data: string;
    try {
      data = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }

    let parsed: KeyValueEntry;
    try {
      const raw = entrySchema.parse(JSON.parse(data));
      parsed = { key: raw.key, value: raw.value, expiresAt: raw.expiresAt, updatedAt: raw.updatedAt };
    } catch (err) {
      this.logger.warn(`Ignoring unreadable state file: ${path.basename(file)}`, { error: toError(err).message });
      return null;
    }

    if (parsed.expiresAt !== null && parsed.expiresAt <= this.clock().getTime()) {
      return null;
    }
    return parsed;
  }

  async get(key: string): Promise<KeyValueEntry | null> {
    await this.ensureInitialized();
    return this.readEntry(this.filePath(key));
  }

  async set(key: string, value: unknown, options: SetOptions = {}): Promise<void> {
    await this.ensureInitialized();
    const now = this.clock().getTime();
    const entry: KeyValueEntry = {
      key,
      value,
      expiresAt: options.ttlMs !== undefined ? now + options.ttlMs : null,
      updatedAt: now,
    };

    const target = this.filePath(key);
    const temp = `${target}.${randomUUID()}.tmp`;
    await fs.writeFile(temp, JSON.stringify(entry, null, 2));
    await fs.rename(temp, target);
  }

  async delete(key: string): Promise<boolean> {
    await this.ensureInitialized();
    try {
      await fs.unlink(this.filePath(key));
      return true;
    } catch (err) {
      if (isMissingFile(err)) return false;
      throw err;
    }
  }

  async list(prefix: string): Promise<KeyValueEntry[]> {
    await this.ensureInitialized();
    const files = (await fs.readdir(this.stateDir)).filter(f => f.endsWith('.json')).sort();

    const entries: KeyValueEntry[] = [];
    for (const file of files) {
      if (!decodeURIComponent(file.slice(0, -'.json'.length)).startsWith(prefix)) continue;
      const entry = await this.readEntry(path.join(this.stateDir, file));
      if (entry) entries.push(entry);
    }
    return entries;
  }
}
