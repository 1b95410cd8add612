/**
 * In-process stand-ins for the pipeline's collaborators, used by the tests
 */

import { mkdtemp, truncate, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import fse from 'fs-extra';
import type {
  CloudSync,
  DiskSpace,
  EncodeExit,
  EncodeRequest,
  Encoder,
  MediaInfo,
  Prober,
} from './types.ts';

export async function makeTempDir(prefix = 'cloud-shrink-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

/** Create a file of the given size without writing its content */
export async function makeSparseFile(path: string, size: number): Promise<void> {
  await fse.ensureDir(dirname(path));
  await writeFile(path, '');
  await truncate(path, size);
}

export class FakeProber implements Prober {
  readonly calls: string[] = [];

  constructor(private readonly infos: Record<string, MediaInfo | null> = {}) {}

  set(path: string, info: MediaInfo | null): void {
    this.infos[path] = info;
  }

  async probe(path: string): Promise<MediaInfo | null> {
    this.calls.push(path);
    return this.infos[path] ?? null;
  }
}

/** Decides the size of the file an encode writes, or the exit code it fails with */
export type EncodeBehavior = (request: EncodeRequest) => { size: number } | { code: number; partialSize?: number };

export class FakeEncoder implements Encoder {
  readonly requests: EncodeRequest[] = [];

  constructor(private readonly behavior: EncodeBehavior) {}

  async encode(request: EncodeRequest): Promise<EncodeExit> {
    this.requests.push(request);
    const result = this.behavior(request);

    if ('size' in result) {
      await makeSparseFile(request.output, result.size);
      return { code: 0, stderr: '' };
    }
    if (result.partialSize !== undefined) {
      await makeSparseFile(request.output, result.partialSize);
    }
    return { code: result.code, stderr: 'Conversion failed!' };
  }

  /** Requests for full transcodes (whole file) */
  get fullEncodes(): EncodeRequest[] {
    return this.requests.filter((r) => r.input.kind === 'file' && r.durationSeconds === undefined);
  }

  /** Requests for trial segments (length-limited, from a file) */
  get trialEncodes(): EncodeRequest[] {
    return this.requests.filter((r) => r.input.kind === 'file' && r.durationSeconds !== undefined);
  }
}

export class FakeCloudSync implements CloudSync {
  readonly local = new Set<string>();
  readonly released: string[] = [];
  readonly downloadRequests: string[] = [];
  /** Every path asked about, in order */
  readonly localityChecks: string[] = [];

  /** When false, requested downloads never complete */
  constructor(public autoComplete = true) {}

  async isLocallyAvailable(path: string): Promise<boolean> {
    this.localityChecks.push(path);
    return this.local.has(path);
  }

  async releaseToCloudOnly(path: string): Promise<boolean> {
    this.released.push(path);
    this.local.delete(path);
    return true;
  }

  requestDownload(path: string): void {
    this.downloadRequests.push(path);
    if (this.autoComplete) this.local.add(path);
  }
}

export class FakeDiskSpace implements DiskSpace {
  constructor(public free = Number.MAX_SAFE_INTEGER) {}

  async freeBytes(): Promise<number> {
    return this.free;
  }
}

/** Sleep and clock for the download coordinator that never actually wait */
export function fakeClock(): { sleep: (ms: number) => Promise<void>; now: () => number } {
  let current = 0;
  return {
    sleep: async (ms: number) => {
      current += ms;
    },
    now: () => current,
  };
}
