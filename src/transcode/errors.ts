/**
 * Fatal conditions that abort a whole run
 * Everything that goes wrong for a single file is reported as a FileOutcome instead.
 */

export class FatalRunError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** No encoder profile produced output in this environment */
export class NoUsableEncoderError extends FatalRunError {
  constructor(readonly tried: string[]) {
    super(`No usable encoder found (tried: ${tried.join(', ') || 'none'})`);
  }
}

/** The folder to walk could not be located */
export class RootNotFoundError extends FatalRunError {
  constructor(readonly searched: string[]) {
    super(
      `Could not locate the root folder. Set rootDir in the config or pass --root.\n` +
        `Searched:\n${searched.map((p) => `  - ${p}`).join('\n')}`,
    );
  }
}

/** ffprobe/ffmpeg could not be started */
export class ToolUnavailableError extends FatalRunError {
  constructor(readonly tool: string, cause: unknown) {
    super(`Cannot run ${tool}: ${cause instanceof Error ? cause.message : String(cause)}`);
  }
}
