import type { ClaudeCodeOptions, Option, OutputMode, ToolEventHook } from '../../types/index.js';
import type { Logger } from '../../utils/logger.js';

export const DEFAULT_PERMISSION_MODE = 'bypassPermissions';
export const DEFAULT_MAX_BUFFER_SIZE = 1024 * 1024;

export function defaultOptions(): ClaudeCodeOptions {
  return {
    cliPath: '',
    model: '',
    systemPrompt: '',
    cwd: '',
    permissionMode: DEFAULT_PERMISSION_MODE,
    tools: [],
    allowedTools: [],
    disallowedTools: [],
    env: {},
    extraArgs: {},
    maxBufferSize: DEFAULT_MAX_BUFFER_SIZE,
    outputMode: 'text',
    toolEventHook: null,
    sessionId: '',
    resume: false,
    forkSession: false,
    noSessionPersistence: false,
    logger: null,
  };
}

/**
 * Applies option functions left to right onto the defaults. Blank
 * permission modes and non-positive buffer sizes fall back to the defaults.
 */
export function resolveOptions(options: ReadonlyArray<Option>): Readonly<ClaudeCodeOptions> {
  const applied = options.reduce<ClaudeCodeOptions>((acc, option) => option(acc), defaultOptions());

  return Object.freeze({
    ...applied,
    permissionMode: applied.permissionMode === '' ? DEFAULT_PERMISSION_MODE : applied.permissionMode,
    maxBufferSize: applied.maxBufferSize > 0 ? applied.maxBufferSize : DEFAULT_MAX_BUFFER_SIZE,
  });
}

export function withCliPath(cliPath: string): Option {
  return (o) => ({ ...o, cliPath });
}

export function withModel(model: string): Option {
  return (o) => ({ ...o, model });
}

export function withSystemPrompt(systemPrompt: string): Option {
  return (o) => ({ ...o, systemPrompt });
}

export function withCwd(cwd: string): Option {
  return (o) => ({ ...o, cwd });
}

export function withPermissionMode(permissionMode: string): Option {
  return (o) => ({ ...o, permissionMode });
}

export function withTools(...tools: string[]): Option {
  return (o) => ({ ...o, tools: [...tools] });
}

export function withAllowedTools(...allowedTools: string[]): Option {
  return (o) => ({ ...o, allowedTools: [...allowedTools] });
}

export function withDisallowedTools(...disallowedTools: string[]): Option {
  return (o) => ({ ...o, disallowedTools: [...disallowedTools] });
}

export function withEnv(env: Readonly<Record<string, string>>): Option {
  return (o) => ({ ...o, env: { ...env } });
}

export function withExtraArgs(extraArgs: Readonly<Record<string, string>>): Option {
  return (o) => ({ ...o, extraArgs: { ...extraArgs } });
}

/** Non-positive sizes are ignored. */
export function withMaxBufferSize(maxBufferSize: number): Option {
  return (o) => (maxBufferSize > 0 ? { ...o, maxBufferSize } : o);
}

export function withOutputMode(outputMode: OutputMode): Option {
  return (o) => ({ ...o, outputMode });
}

/** The hook sees every tool event, whatever the output mode. */
export function withToolEventHook(toolEventHook: ToolEventHook): Option {
  return (o) => ({ ...o, toolEventHook });
}

export function withSessionId(sessionId: string): Option {
  return (o) => ({ ...o, sessionId });
}

export function withResume(resume: boolean): Option {
  return (o) => ({ ...o, resume });
}

/** Only meaningful together with `withResume(true)`. */
export function withForkSession(forkSession: boolean): Option {
  return (o) => ({ ...o, forkSession });
}

export function withNoSessionPersistence(noSessionPersistence: boolean): Option {
  return (o) => ({ ...o, noSessionPersistence });
}

export function withLogger(logger: Logger): Option {
  return (o) => ({ ...o, logger });
}
