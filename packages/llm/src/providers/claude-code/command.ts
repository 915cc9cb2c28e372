import type { ClaudeCodeOptions } from '../../types/index.js';

/**
 * Builds the CLI argument vector. The order is fixed so the same options
 * always produce the same command line; the prompt goes last, after `--`,
 * so text starting with `-` is never read as a flag.
 */
export function buildArgs(
  options: Readonly<ClaudeCodeOptions>,
  prompt: string,
  systemPrompt: string,
): string[] {
  const args = ['--output-format', 'stream-json', '--verbose'];

  if (systemPrompt !== '') {
    args.push('--system-prompt', systemPrompt);
  }
  if (options.tools.length > 0) {
    args.push('--tools', options.tools.join(','));
  }
  if (options.allowedTools.length > 0) {
    args.push('--allowedTools', options.allowedTools.join(','));
  }
  if (options.disallowedTools.length > 0) {
    args.push('--disallowedTools', options.disallowedTools.join(','));
  }
  if (options.model !== '') {
    args.push('--model', options.model);
  }
  if (options.permissionMode !== '') {
    args.push('--permission-mode', options.permissionMode);
  }

  args.push(...sessionArgs(options));

  for (const key of Object.keys(options.extraArgs).sort()) {
    const value = options.extraArgs[key] ?? '';
    if (value === '') {
      args.push(`--${key}`);
    } else {
      args.push(`--${key}`, value);
    }
  }

  args.push('--print', '--', prompt);
  return args;
}

function sessionArgs(options: Readonly<ClaudeCodeOptions>): string[] {
  const args: string[] = [];

  if (options.resume) {
    if (options.sessionId !== '') {
      args.push('--resume', options.sessionId);
    } else {
      args.push('--continue');
    }
    if (options.forkSession) {
      args.push('--fork-session');
    }
  } else if (options.sessionId !== '') {
    args.push('--session-id', options.sessionId);
  }

  if (options.noSessionPersistence) {
    args.push('--no-session-persistence');
  }

  return args;
}

export function formatCommandLine(binary: string, args: ReadonlyArray<string>): string {
  return [binary, ...args].join(' ');
}

/** Inherited environment with `overrides` layered on top. */
export function mergeEnv(
  base: Readonly<Record<string, string | undefined>>,
  overrides: Readonly<Record<string, string>>,
): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return { ...merged, ...overrides };
}
