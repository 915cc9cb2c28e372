import type {
  CallOptions,
  ClaudeCodeOptions,
  LLMResponse,
  Message,
  Option,
  StreamEvent,
  ToolEvent,
} from '../../types/index.js';
import { humanMessage } from '../../types/index.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import { readLines } from '../../utils/lines.js';
import { createEventQueue } from '../../utils/queue.js';
import { linkSignals } from '../../utils/signal.js';
import { resolveCliPath } from './binary.js';
import { buildArgs, formatCommandLine, mergeEnv } from './command.js';
import { resolveOptions } from './options.js';
import { runCliProcess } from './process.js';
import { buildPrompt } from './prompt.js';
import { ResponseAccumulator, translateResponse } from './response.js';
import { translateStream } from './stream.js';

/**
 * Chat-completion client backed by the `claude` CLI. Each call spawns one
 * CLI process in print mode and parses its stream-json output.
 */
export class ClaudeCodeLLM {
  readonly name = 'claude-code';
  readonly cliPath: string;
  readonly options: Readonly<ClaudeCodeOptions>;
  private readonly logger: Logger;

  private constructor(cliPath: string, options: Readonly<ClaudeCodeOptions>) {
    this.cliPath = cliPath;
    this.options = options;
    this.logger = options.logger ?? createLogger('claude-code');
  }

  /** Resolves options and locates the CLI binary once for the client's lifetime. */
  static async create(...options: Option[]): Promise<ClaudeCodeLLM> {
    const resolved = resolveOptions(options);
    const cliPath = await resolveCliPath(resolved.cliPath);
    return new ClaudeCodeLLM(cliPath, resolved);
  }

  async call(prompt: string, callOptions: CallOptions = {}): Promise<string> {
    const response = await this.generateContent([humanMessage(prompt)], callOptions);
    return response.text;
  }

  async generateContent(
    messages: ReadonlyArray<Message>,
    callOptions: CallOptions = {},
  ): Promise<LLMResponse> {
    const { systemPrompt, prompt } = buildPrompt(messages, this.options.systemPrompt);
    const args = buildArgs(this.options, prompt, systemPrompt);

    this.logger.debug(`claude command: ${formatCommandLine(this.cliPath, args)}`);

    const accumulator = new ResponseAccumulator();
    const toolEventHooks = [this.options.toolEventHook, callOptions.onToolEvent].filter(
      (hook): hook is (event: ToolEvent) => void => typeof hook === 'function',
    );

    await runCliProcess(
      {
        binary: this.cliPath,
        args,
        env: mergeEnv(process.env, this.options.env),
        cwd: this.options.cwd,
        signal: callOptions.signal,
        logger: this.logger,
      },
      (stdout) =>
        translateStream(readLines(stdout, this.options.maxBufferSize), {
          accumulator,
          outputMode: this.options.outputMode,
          logger: this.logger,
          onChunk: callOptions.onChunk,
          toolEventHooks,
        }),
    );

    return translateResponse(accumulator, this.options.model);
  }

  /**
   * Streams a call as events. Leaving the loop early kills the CLI process.
   */
  stream(messages: ReadonlyArray<Message>, callOptions: CallOptions = {}): AsyncIterable<StreamEvent> {
    const controller = new AbortController();
    const queue = createEventQueue<StreamEvent>(() => controller.abort());
    const linked = linkSignals(callOptions.signal, controller.signal);

    void this.generateContent(messages, {
      signal: linked.signal,
      onChunk: async (text) => {
        queue.push({ type: 'TEXT_DELTA', text });
        if (callOptions.onChunk) {
          await callOptions.onChunk(text);
        }
      },
      onToolEvent: (event) => {
        queue.push({ type: 'TOOL_EVENT', event });
        callOptions.onToolEvent?.(event);
      },
    })
      .finally(linked.unlink)
      .then(
        (response) => {
          queue.push({ type: 'FINISH', response });
          queue.complete();
        },
        (err: unknown) => {
          queue.error(err instanceof Error ? err : new Error(String(err)));
        },
      );

    return queue.iterator();
  }
}

export { resolveCliPath } from './binary.js';
export { buildArgs, formatCommandLine, mergeEnv } from './command.js';
export * from './options.js';
export { buildPrompt, mergeSystemPrompt, splitSystemMessages } from './prompt.js';
export { formatToolEvent, formatToolUseSummary } from './tool-events.js';
