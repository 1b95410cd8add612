import { ChildProcess } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import fse from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HistoryStore } from './history.ts';
import { registerInterruptHandler, RunContext } from './run-context.ts';
import { makeSparseFile, makeTempDir } from './testing.ts';

describe('RunContext', () => {
  let dir: string;
  let history: HistoryStore;
  let context: RunContext;

  beforeEach(async () => {
    dir = await makeTempDir();
    history = new HistoryStore(join(dir, 'history.json'), dir);
    context = new RunContext(history);
  });

  afterEach(async () => {
    await fse.remove(dir);
  });

  it('deletes the in-flight artifact and flushes history on interrupt', async () => {
    const temp = join(dir, 'movie_av1.partial.mkv');
    await makeSparseFile(temp, 1_000);
    context.beginAttempt(temp);

    context.interrupt();

    expect(await fse.pathExists(temp)).toBe(false);
    expect(context.inFlightTempPath).toBeNull();
    expect(JSON.parse(await readFile(join(dir, 'history.json'), 'utf8'))).toEqual({
      version: 2,
      totalBytesSaved: 0,
      records: {},
    });
  });

  it('kills a running encoder', () => {
    const child = new ChildProcess();
    const kill = vi.spyOn(child, 'kill').mockReturnValue(true);
    context.attachChild(child);

    context.interrupt();

    expect(kill).toHaveBeenCalledWith('SIGKILL');
  });

  it('leaves nothing to clean up after the attempt ends', async () => {
    const temp = join(dir, 'movie_av1.mkv');
    await makeSparseFile(temp, 1_000);
    context.beginAttempt(temp);
    context.endAttempt();

    context.interrupt();

    expect(await fse.pathExists(temp)).toBe(true);
  });
});

describe('registerInterruptHandler', () => {
  it('installs a handler for each shutdown signal and removes it again', async () => {
    const dir = await makeTempDir();
    const context = new RunContext(new HistoryStore(join(dir, 'history.json'), dir));
    const before = process.listenerCount('SIGTERM');

    const dispose = registerInterruptHandler(context, vi.fn());
    expect(process.listenerCount('SIGTERM')).toBe(before + 1);
    expect(process.listenerCount('SIGINT')).toBeGreaterThan(0);

    dispose();
    expect(process.listenerCount('SIGTERM')).toBe(before);
    await fse.remove(dir);
  });
});
