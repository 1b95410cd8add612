/**
 * Process manager module for cloud-shrink
 * Handles singleton execution, signal handling and external command execution
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { readFileSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import fse from 'fs-extra';
import { getErrorCode } from './errors.ts';
import { getLogger } from './logger.ts';
import { INTERRUPTED_EXIT_CODE } from './constants.ts';

const logger = getLogger().child('process');

/** Keep only the tail of noisy tool output (ffmpeg writes progress to stderr) */
const MAX_CAPTURED_OUTPUT = 16 * 1024;

/** Path of the lock this process currently holds */
let heldLockPath: string | null = null;

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return getErrorCode(error) === 'EPERM';
  }
}

/**
 * Acquire the process lock to ensure only one instance runs at a time
 * Returns true if lock acquired, false if another instance is running.
 * A lock left behind by a dead process is taken over.
 */
export async function acquireLock(lockFilePath: string): Promise<boolean> {
  await fse.ensureDir(dirname(lockFilePath));
  const pid = process.pid.toString();

  try {
    writeFileSync(lockFilePath, pid, { flag: 'wx' });
  } catch (error) {
    if (getErrorCode(error) !== 'EEXIST') {
      logger.error('Failed to acquire lock:', error);
      return false;
    }

    const owner = parseInt(readFileSync(lockFilePath, 'utf8').trim(), 10);
    if (Number.isFinite(owner) && owner !== process.pid && isProcessAlive(owner)) {
      return false;
    }

    logger.warn(`Taking over stale lock (PID: ${Number.isFinite(owner) ? owner : 'unknown'})`);
    writeFileSync(lockFilePath, pid);
  }

  heldLockPath = lockFilePath;
  logger.debug(`Lock acquired (PID: ${pid})`);
  return true;
}

/**
 * Release the process lock
 * Synchronous so it can run from a signal handler right before exit
 */
export function releaseLock(): void {
  if (!heldLockPath) return;

  try {
    unlinkSync(heldLockPath);
    logger.debug('Lock released');
  } catch (error) {
    logger.error('Failed to release lock:', error);
  }
  heldLockPath = null;
}

/** Signals treated as a request to stop */
export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * Build the shutdown handler installed for each signal
 * The cleanup runs synchronously and only once, then the lock is released
 * and the process exits.
 */
export function createShutdownHandler(
  cleanup: (signal: NodeJS.Signals) => void,
  exit: (code: number) => void = (code) => process.exit(code),
  exitCode = INTERRUPTED_EXIT_CODE,
): (signal: NodeJS.Signals) => void {
  let handled = false;

  return (signal) => {
    if (handled) return;
    handled = true;
    logger.warn(`Received ${signal}, shutting down...`);
    try {
      cleanup(signal);
    } catch (error) {
      logger.error('Cleanup after signal failed:', error);
    }
    releaseLock();
    exit(exitCode);
  };
}

/**
 * Setup signal handlers for graceful shutdown
 * Returns a function that removes the handlers again.
 */
export function setupSignalHandlers(
  cleanup: (signal: NodeJS.Signals) => void,
  exit?: (code: number) => void,
  exitCode?: number,
): () => void {
  const handleSignal = createShutdownHandler(cleanup, exit, exitCode);

  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, handleSignal);
  }

  return () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, handleSignal);
    }
  };
}

/** Result of running an external command to completion */
export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  /** Called once the child exists, e.g. to make it killable from a signal handler */
  onSpawn?: (child: ChildProcess) => void;
}

function appendTail(buffer: string, chunk: Buffer): string {
  const next = buffer + chunk.toString('utf8');
  return next.length > MAX_CAPTURED_OUTPUT ? next.slice(-MAX_CAPTURED_OUTPUT) : next;
}

/**
 * Run a command and collect its output
 * Resolves with the exit code (killed processes report -1); rejects only if
 * the binary could not be started at all.
 */
export function runCommand(
  cmd: string,
  args: string[],
  options: RunCommandOptions = {},
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (chunk: Buffer) => {
      stdout = appendTail(stdout, chunk);
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr = appendTail(stderr, chunk);
    });

    child.once('error', reject);
    child.once('close', (code) => {
      resolve({ code: code ?? -1, stdout, stderr });
    });

    options.onSpawn?.(child);
  });
}

/**
 * Start a command without waiting for it
 * Used for fire-and-forget requests to the cloud-sync layer.
 */
export function launchDetached(cmd: string, args: string[]): void {
  const child = spawn(cmd, args, { stdio: 'ignore', windowsHide: true });
  child.once('error', (error) => {
    logger.warn(`Could not start ${cmd}:`, error);
  });
  child.once('close', (code) => {
    if (code !== 0) {
      logger.debug(`${cmd} ${args.join(' ')} exited with code ${code}`);
    }
  });
  child.unref();
}

/**
 * Check if a command is available in PATH
 */
export async function checkCommand(cmd: string): Promise<boolean> {
  try {
    const { code } = await runCommand(cmd, ['-version']);
    return code === 0;
  } catch {
    return false;
  }
}

/**
 * Check if ffmpeg and ffprobe are available
 */
export async function checkFFmpegDependencies(
  ffmpegPath = 'ffmpeg',
  ffprobePath = 'ffprobe',
): Promise<{ ffmpeg: boolean; ffprobe: boolean }> {
  return {
    ffmpeg: await checkCommand(ffmpegPath),
    ffprobe: await checkCommand(ffprobePath),
  };
}
