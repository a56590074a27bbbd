import { appendFile, mkdir, readFile } from 'fs/promises';
import { dirname } from 'path';
import { logger } from '../utils/logger';

/**
 * Environment-local record of source URLs already handled.
 * Append-only: there is no removal.
 */
export interface SeenSet {
  contains(id: string): Promise<boolean>;
  add(id: string): Promise<void>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Seen-set backed by a text file, one URL per line.
 * Each add is appended before it is acknowledged, so an interrupted
 * batch keeps every mark written so far.
 */
export class FileSeenSet implements SeenSet {
  private entries: Set<string> | null = null;
  private readonly log = logger.child('seen-set');

  constructor(private readonly filePath: string) {}

  async contains(id: string): Promise<boolean> {
    const entries = await this.load();
    return entries.has(id.trim());
  }

  async add(id: string): Promise<void> {
    const entry = id.trim();
    if (!entry) return;

    const entries = await this.load();
    if (entries.has(entry)) return;

    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${entry}\n`, 'utf-8');
    entries.add(entry);
  }

  get size(): number {
    return this.entries?.size ?? 0;
  }

  private async load(): Promise<Set<string>> {
    if (this.entries) return this.entries;

    let content = '';
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.log.error('Seen-set file is unreadable', error, { path: this.filePath });
        throw error;
      }
      this.log.info('No seen-set file yet, starting empty', { path: this.filePath });
    }

    this.entries = new Set(
      content.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0)
    );
    this.log.debug(`Loaded ${this.entries.size} seen URLs`, { path: this.filePath });
    return this.entries;
  }
}

export class InMemorySeenSet implements SeenSet {
  private readonly entries: Set<string>;

  constructor(initial: Iterable<string> = []) {
    this.entries = new Set(initial);
  }

  async contains(id: string): Promise<boolean> {
    return this.entries.has(id.trim());
  }

  async add(id: string): Promise<void> {
    const entry = id.trim();
    if (entry) this.entries.add(entry);
  }

  values(): string[] {
    return [...this.entries];
  }
}
