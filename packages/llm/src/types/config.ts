import type { Logger } from '../utils/logger.js';
import type { ToolEvent, ToolEventHook } from './tool.js';

/**
 * How much of the agent's tool activity is folded into the response text.
 *
 * - `text`: final assistant text only
 * - `verbose`: text plus a one-line summary per tool call
 * - `full`: text plus every tool call input and (truncated) tool output
 */
export type OutputMode = 'text' | 'verbose' | 'full';

export type ClaudeCodeOptions = {
  /** Explicit path to the CLI binary; resolved from well-known locations when empty. */
  readonly cliPath: string;
  readonly model: string;
  /** Base system prompt; system messages of a call are appended to it. */
  readonly systemPrompt: string;
  /** Working directory of the CLI process; inherits ours when empty. */
  readonly cwd: string;
  /** e.g. `bypassPermissions`, `acceptEdits`, `plan`. */
  readonly permissionMode: string;
  /** Overrides the CLI's base tool set. */
  readonly tools: ReadonlyArray<string>;
  readonly allowedTools: ReadonlyArray<string>;
  readonly disallowedTools: ReadonlyArray<string>;
  /** Layered over the inherited environment; these win on collision. */
  readonly env: Readonly<Record<string, string>>;
  /** Additional `--flag value` pairs. An empty value emits a bare `--flag`. */
  readonly extraArgs: Readonly<Record<string, string>>;
  /** Longest stdout line accepted, in bytes. */
  readonly maxBufferSize: number;
  readonly outputMode: OutputMode;
  readonly toolEventHook: ToolEventHook | null;
  /** Session to create, or to resume when `resume` is set. */
  readonly sessionId: string;
  /** Resume `sessionId`, or the most recent session when no id is given. */
  readonly resume: boolean;
  /** Branch into a new session id when resuming. */
  readonly forkSession: boolean;
  readonly noSessionPersistence: boolean;
  readonly logger: Logger | null;
};

export type Option = (options: Readonly<ClaudeCodeOptions>) => ClaudeCodeOptions;

export type CallOptions = {
  /** Receives every text chunk as it is appended to the response. */
  readonly onChunk?: (chunk: string) => void | Promise<void>;
  /** Per-call counterpart of the `toolEventHook` option. */
  readonly onToolEvent?: (event: ToolEvent) => void;
  /** Aborting kills the CLI process. */
  readonly signal?: AbortSignal;
};
