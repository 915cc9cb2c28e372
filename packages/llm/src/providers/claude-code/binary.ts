import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import { homedir } from 'node:os';
import { delimiter, join } from 'node:path';
import { CliNotFoundError } from '../../types/index.js';

export const CLI_BINARY_NAME = 'claude';

export type ResolveCliPathOptions = {
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly homeDir?: string;
  readonly platform?: NodeJS.Platform;
};

/**
 * Finds the CLI binary: an explicit path wins, then `~/.local/bin/claude`,
 * then the first match on PATH.
 */
export async function resolveCliPath(
  explicitPath: string,
  options: ResolveCliPathOptions = {},
): Promise<string> {
  const trimmed = explicitPath.trim();
  if (trimmed !== '') {
    return trimmed;
  }

  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const candidates: string[] = [];

  const home = options.homeDir ?? homedir();
  if (home) {
    candidates.push(join(home, '.local', 'bin', CLI_BINARY_NAME));
  }
  candidates.push(...pathCandidates(env, platform));

  for (const candidate of candidates) {
    if (await isExecutableFile(candidate, platform)) {
      return candidate;
    }
  }

  throw new CliNotFoundError(candidates);
}

function pathCandidates(
  env: Readonly<Record<string, string | undefined>>,
  platform: NodeJS.Platform,
): string[] {
  const dirs = (env['PATH'] ?? '').split(delimiter).filter((dir) => dir !== '');

  if (platform !== 'win32') {
    return dirs.map((dir) => join(dir, CLI_BINARY_NAME));
  }

  const extensions = (env['PATHEXT'] ?? '.COM;.EXE;.BAT;.CMD')
    .split(';')
    .filter((ext) => ext !== '');
  return dirs.flatMap((dir) => extensions.map((ext) => join(dir, CLI_BINARY_NAME + ext.toLowerCase())));
}

async function isExecutableFile(path: string, platform: NodeJS.Platform): Promise<boolean> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      return false;
    }
    // Windows has no execute bit; PATHEXT already filtered candidates.
    if (platform !== 'win32') {
      await access(path, constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}
