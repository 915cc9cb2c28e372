import { spawn, type ChildProcess } from 'node:child_process';
import { once } from 'node:events';
import type { Readable } from 'node:stream';
import { text } from 'node:stream/consumers';
import { AbortError, ProcessExitError, ProcessStartError } from '../../types/index.js';
import type { Logger } from '../../utils/logger.js';

export type CliProcessSpec = {
  readonly binary: string;
  readonly args: ReadonlyArray<string>;
  readonly env: Readonly<Record<string, string>>;
  readonly cwd?: string;
  readonly signal?: AbortSignal;
  readonly logger: Logger;
};

type ExitStatus = {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
};

/**
 * Runs the CLI for the duration of `consume`, which receives its stdout.
 *
 * stderr is drained concurrently from the moment the process starts and
 * that drain is always awaited before this returns or throws. If `consume`
 * throws, the process is killed first. On success a non-zero exit becomes
 * a ProcessExitError carrying whatever stderr the CLI wrote.
 */
export async function runCliProcess<T>(
  spec: CliProcessSpec,
  consume: (stdout: Readable) => Promise<T>,
): Promise<T> {
  if (spec.signal?.aborted) {
    throw new AbortError('Signal was already aborted');
  }

  const child = await startProcess(spec);
  const exited = waitForExit(child, spec.logger);
  const stderrDrained = drainStderr(child, spec.logger);

  try {
    const value = await consume(requirePipe(child.stdout, 'stdout'));
    const status = await exited;

    if (spec.signal?.aborted) {
      throw new AbortError('CLI process was aborted');
    }
    if (status.code !== 0) {
      const stderr = (await stderrDrained).trim();
      throw new ProcessExitError(status.code, status.signal, stderr);
    }
    return value;
  } catch (err) {
    if (child.exitCode === null && child.signalCode === null) {
      child.kill('SIGKILL');
    }
    if (spec.signal?.aborted && !(err instanceof AbortError)) {
      throw new AbortError('CLI process was aborted', err instanceof Error ? err : undefined);
    }
    throw err;
  } finally {
    await stderrDrained;
  }
}

async function startProcess(spec: CliProcessSpec): Promise<ChildProcess> {
  let child: ChildProcess;
  try {
    child = spawn(spec.binary, [...spec.args], {
      cwd: spec.cwd || undefined,
      env: spec.env,
      signal: spec.signal,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  } catch (err) {
    throw new ProcessStartError(
      `start cli: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? err : undefined,
    );
  }

  try {
    await once(child, 'spawn');
  } catch (err) {
    if (spec.signal?.aborted) {
      throw new AbortError('CLI process was aborted', err instanceof Error ? err : undefined);
    }
    throw new ProcessStartError(
      `start cli: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? err : undefined,
    );
  }

  return child;
}

function waitForExit(child: ChildProcess, logger: Logger): Promise<ExitStatus> {
  return new Promise((resolve) => {
    // After 'spawn', 'error' only reports failed kills and aborts; the
    // outcome is still decided by 'close'.
    child.on('error', (err) => {
      logger.debug(`cli process error: ${err.message}`);
    });
    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({ code, signal });
    });
  });
}

async function drainStderr(child: ChildProcess, logger: Logger): Promise<string> {
  try {
    return await text(requirePipe(child.stderr, 'stderr'));
  } catch (err) {
    logger.warn(`stderr drain failed: ${err instanceof Error ? err.message : String(err)}`);
    return '';
  }
}

function requirePipe(stream: Readable | null, name: string): Readable {
  if (!stream) {
    throw new ProcessStartError(`start cli: ${name} is not piped`);
  }
  return stream;
}
