/**
 * Free disk space lookup
 */

import { statfs } from 'node:fs/promises';
import type { DiskSpace } from './types.ts';

export class StatfsDiskSpace implements DiskSpace {
  /** Bytes available to this (unprivileged) process */
  async freeBytes(dir: string): Promise<number> {
    const stats = await statfs(dir);
    return stats.bavail * stats.bsize;
  }
}

/** True when `free` covers `size` times the safety factor */
export function hasRoomFor(free: number, size: number, factor: number): boolean {
  return free >= size * factor;
}
