/**
 * History store for cloud-shrink
 * JSON-based record of every permanent per-file decision, keyed by path
 * relative to the root. Each mutation is written through before returning.
 */

import { mkdirSync, renameSync, writeFileSync } from 'node:fs';
import { readFile, rename } from 'node:fs/promises';
import { dirname, isAbsolute, relative } from 'node:path';
import { getErrorCode } from '../shared/errors.ts';
import { getLogger } from '../shared/logger.ts';
import { HistoryFileSchema, HistoryStatusSchema, LegacyHistoryFileSchema } from './schemas.ts';
import type { HistoryFile, HistoryRecord, HistoryStatus } from './types.ts';

const logger = getLogger().child('history');

const HISTORY_VERSION = 2;

/** Status names used by the unversioned layout */
const LEGACY_STATUSES: Record<string, HistoryStatus> = {
  converted: 'converted',
  kept_original: 'kept-original',
  skipped_low_bitrate: 'skipped-low-bitrate',
  skipped_low_savings: 'skipped-low-savings',
  skipped_test_low_savings: 'skipped-test-low-savings',
};

export type RemoveResult = 'removed' | 'not-found' | 'protected';

export interface HistoryStats {
  records: number;
  byStatus: Record<HistoryStatus, number>;
  totalBytesSaved: number;
}

/**
 * Normalize a path to a history key: relative to the root, forward slashes,
 * no leading separators. Relative input is taken as already root-relative.
 */
export function toHistoryKey(rootDir: string, filePath: string): string {
  const rel = isAbsolute(filePath) ? relative(rootDir, filePath) : filePath;
  return rel.replace(/\\/g, '/').replace(/^(\.\/|\/)+/, '');
}

function legacyStatus(value: string): HistoryStatus | null {
  if (value in LEGACY_STATUSES) return LEGACY_STATUSES[value];
  const parsed = HistoryStatusSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function sumConverted(records: Map<string, HistoryRecord>): number {
  let total = 0;
  for (const record of records.values()) {
    if (record.status === 'converted') total += record.bytesSaved;
  }
  return total;
}

export class HistoryStore {
  private records = new Map<string, HistoryRecord>();
  private total = 0;

  constructor(
    readonly filePath: string,
    readonly rootDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  //═════════════════════════════════════════════════════════════════════════════
  // LOADING
  //═════════════════════════════════════════════════════════════════════════════

  /**
   * Load the history file
   * A missing file gives an empty store. An unreadable one is moved aside
   * to `<file>.corrupt` and also gives an empty store.
   */
  static async load(
    filePath: string,
    rootDir: string,
    now?: () => Date,
  ): Promise<HistoryStore> {
    const store = new HistoryStore(filePath, rootDir, now);

    let content: string;
    try {
      content = await readFile(filePath, 'utf8');
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        logger.info('No existing history found, starting fresh');
        return store;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch {
      await store.quarantine('not valid JSON');
      return store;
    }

    const current = HistoryFileSchema.safeParse(json);
    if (current.success) {
      store.adopt(current.data);
      return store;
    }

    const legacy = LegacyHistoryFileSchema.safeParse(json);
    if (legacy.success) {
      store.migrateLegacy(legacy.data.files);
      return store;
    }

    await store.quarantine('unrecognized layout');
    return store;
  }

  private async quarantine(reason: string): Promise<void> {
    const backup = `${this.filePath}.corrupt`;
    try {
      await rename(this.filePath, backup);
    } catch (error) {
      // The next write replaces the unreadable file
      logger.error(
        `History file unreadable (${reason}) and could not be moved to ${backup}; starting fresh:`,
        error,
      );
      return;
    }
    logger.warn(`History file unreadable (${reason}); moved to ${backup} and starting fresh`);
  }

  private adopt(file: HistoryFile): void {
    for (const [key, record] of Object.entries(file.records)) {
      this.records.set(key, record.status === 'converted' ? record : { ...record, bytesSaved: 0 });
    }
    this.total = sumConverted(this.records);

    if (this.total !== file.totalBytesSaved) {
      logger.warn(
        `Stored savings counter (${file.totalBytesSaved}) disagrees with records (${this.total}); using records`,
      );
    }
    logger.info(`Loaded history with ${this.records.size} records`);
  }

  private migrateLegacy(files: Record<string, { status: string; time?: string; saved?: number }>): void {
    let dropped = 0;
    for (const [path, entry] of Object.entries(files)) {
      const status = legacyStatus(entry.status);
      if (!status) {
        dropped++;
        continue;
      }
      const saved = status === 'converted' ? Math.max(0, Math.round(entry.saved ?? 0)) : 0;
      this.records.set(toHistoryKey(this.rootDir, path), {
        status,
        timestamp: entry.time ?? this.now().toISOString(),
        bytesSaved: saved,
      });
    }
    this.total = sumConverted(this.records);

    logger.warn(`Migrated ${this.records.size} records from the legacy history layout`);
    if (dropped > 0) {
      logger.warn(`Dropped ${dropped} legacy records with an unknown status`);
    }
  }

  //═════════════════════════════════════════════════════════════════════════════
  // QUERIES
  //═════════════════════════════════════════════════════════════════════════════

  keyFor(filePath: string): string {
    return toHistoryKey(this.rootDir, filePath);
  }

  has(filePath: string): boolean {
    return this.records.has(this.keyFor(filePath));
  }

  get(filePath: string): HistoryRecord | undefined {
    return this.records.get(this.keyFor(filePath));
  }

  get totalBytesSaved(): number {
    return this.total;
  }

  get size(): number {
    return this.records.size;
  }

  entries(): Array<[string, HistoryRecord]> {
    return [...this.records.entries()];
  }

  stats(): HistoryStats {
    const byStatus: Record<HistoryStatus, number> = {
      'converted': 0,
      'kept-original': 0,
      'skipped-low-bitrate': 0,
      'skipped-low-savings': 0,
      'skipped-test-low-savings': 0,
    };
    for (const record of this.records.values()) {
      byStatus[record.status]++;
    }
    return { records: this.records.size, byStatus, totalBytesSaved: this.total };
  }

  //═════════════════════════════════════════════════════════════════════════════
  // MUTATIONS
  //═════════════════════════════════════════════════════════════════════════════

  /**
   * Record the permanent outcome for a file and flush
   * A converted record is final; later outcomes for the same key are ignored.
   */
  recordOutcome(filePath: string, status: HistoryStatus, bytesSaved = 0): HistoryRecord {
    const key = this.keyFor(filePath);
    const existing = this.records.get(key);
    if (existing?.status === 'converted') {
      logger.warn(`Ignoring ${status} for already converted file: ${key}`);
      return existing;
    }

    const record: HistoryRecord = {
      status,
      timestamp: this.now().toISOString(),
      bytesSaved: status === 'converted' ? Math.max(0, Math.round(bytesSaved)) : 0,
    };
    this.records.set(key, record);
    this.total = sumConverted(this.records);
    this.flush();

    logger.debug(`Recorded ${status} for: ${key}`);
    return record;
  }

  /** Manual reset of one record; converted records cannot be removed */
  remove(filePath: string): RemoveResult {
    const key = this.keyFor(filePath);
    const record = this.records.get(key);
    if (!record) return 'not-found';
    if (record.status === 'converted') return 'protected';

    this.records.delete(key);
    this.flush();
    return 'removed';
  }

  /** Manual reset of every record with a status; returns how many were removed */
  removeByStatus(status: Exclude<HistoryStatus, 'converted'>): number {
    let removed = 0;
    for (const [key, record] of this.records) {
      if (record.status === status) {
        this.records.delete(key);
        removed++;
      }
    }
    if (removed > 0) this.flush();
    return removed;
  }

  /**
   * Write the store to disk
   * Synchronous (temp file + rename) so it is safe from a signal handler.
   */
  flush(): void {
    const file: HistoryFile = {
      version: HISTORY_VERSION,
      totalBytesSaved: this.total,
      records: Object.fromEntries(this.records),
    };

    mkdirSync(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    writeFileSync(tempPath, JSON.stringify(file, null, 2));
    renameSync(tempPath, this.filePath);
  }
}
