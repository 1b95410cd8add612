/**
 * History CLI Action
 * Lists recorded outcomes and performs manual resets
 */

import { HistoryStore } from '../transcode/history.ts';
import { HistoryStatusSchema } from '../transcode/schemas.ts';
import { acquireLock, releaseLock } from '../shared/process.ts';
import { configureGlobalLogger, type Logger } from '../shared/logger.ts';
import { formatBytes } from '../shared/format.ts';
import type { HistoryStatus } from '../transcode/types.ts';
import { loadRunConfig, resolveLogLevel, type CommonOptions } from './transcode.ts';

/** Options for the history command */
export interface HistoryOptions extends CommonOptions {
  /** Only list records with this status */
  status?: string;
  /** Root-relative path whose record should be removed */
  clear?: string;
  /** Remove every record with this status */
  clearStatus?: string;
}

function parseStatus(value: string, logger: Logger): HistoryStatus | null {
  const parsed = HistoryStatusSchema.safeParse(value);
  if (!parsed.success) {
    logger.error(`Unknown status "${value}". Expected one of: ${HistoryStatusSchema.options.join(', ')}`);
    return null;
  }
  return parsed.data;
}

/** History action handler; resolves with the process exit code */
export async function historyAction(options: HistoryOptions): Promise<number> {
  const logger = configureGlobalLogger({ level: resolveLogLevel(options) });

  const config = await loadRunConfig(options, {}, logger);
  if (!config) return 1;

  const mutating = options.clear !== undefined || options.clearStatus !== undefined;
  if (mutating && !(await acquireLock(config.lockFilePath))) {
    logger.error('A run is in progress; try again once it has finished');
    return 1;
  }

  try {
    const history = await HistoryStore.load(config.historyPath, config.rootDir);

    if (options.clear !== undefined) {
      return clearRecord(history, options.clear, logger);
    }
    if (options.clearStatus !== undefined) {
      return clearStatus(history, options.clearStatus, logger);
    }
    return listRecords(history, options.status, logger);
  } finally {
    if (mutating) releaseLock();
  }
}

function clearRecord(history: HistoryStore, path: string, logger: Logger): number {
  const key = history.keyFor(path);
  switch (history.remove(path)) {
    case 'removed':
      logger.info(`Removed history record: ${key}`);
      return 0;
    case 'not-found':
      logger.warn(`No history record for: ${key}`);
      return 1;
    case 'protected':
      logger.error(`Refusing to remove a converted record: ${key}`);
      return 1;
  }
}

function clearStatus(history: HistoryStore, value: string, logger: Logger): number {
  const status = parseStatus(value, logger);
  if (!status) return 1;
  if (status === 'converted') {
    logger.error('Converted records cannot be cleared');
    return 1;
  }

  const removed = history.removeByStatus(status);
  logger.info(`Removed ${removed} ${status} records`);
  return 0;
}

function listRecords(history: HistoryStore, statusFilter: string | undefined, logger: Logger): number {
  let filter: HistoryStatus | null = null;
  if (statusFilter !== undefined) {
    filter = parseStatus(statusFilter, logger);
    if (!filter) return 1;
  }

  const entries = history
    .entries()
    .filter(([, record]) => filter === null || record.status === filter)
    .sort(([a], [b]) => a.localeCompare(b));

  for (const [key, record] of entries) {
    const saved = record.status === 'converted' ? `  (saved ${formatBytes(record.bytesSaved)})` : '';
    console.log(`  ${record.status.padEnd(24)} ${record.timestamp}  ${key}${saved}`);
  }

  const stats = history.stats();
  console.log('\n' + '='.repeat(50));
  console.log(`Records:     ${stats.records}${filter ? ` (${entries.length} ${filter})` : ''}`);
  for (const [status, count] of Object.entries(stats.byStatus)) {
    console.log(`  ${status.padEnd(24)} ${count}`);
  }
  console.log(`Total saved: ${formatBytes(stats.totalBytesSaved)}`);
  console.log('='.repeat(50));
  return 0;
}
