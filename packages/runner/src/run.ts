import { Command, CommanderError, Option as FlagOption } from 'commander';
import type { Readable } from 'node:stream';
import { text } from 'node:stream/consumers';
import {
  ClaudeCodeLLM,
  createLogger,
  humanMessage,
  withCliPath,
  withCwd,
  withLogger,
  withModel,
  withOutputMode,
  withPermissionMode,
  withSystemPrompt,
  DEFAULT_PERMISSION_MODE,
  type LLMResponse,
  type Message,
  type CallOptions,
  type Option,
  type OutputMode,
} from '@cclm/llm';

export const RUNNER_NAME = 'cclm-runner';

export type RunnerFlags = {
  readonly model?: string;
  readonly system?: string;
  readonly cli?: string;
  readonly permissionMode: string;
  readonly cwd?: string;
  readonly outputMode: OutputMode;
  readonly verbose: boolean;
};

export type Writer = {
  write: (chunk: string) => unknown;
};

export type ChatClient = {
  generateContent: (messages: ReadonlyArray<Message>, callOptions?: CallOptions) => Promise<LLMResponse>;
};

export type RunnerIO = {
  readonly stdin: Readable;
  readonly stdout: Writer;
  readonly stderr: Writer;
  readonly createClient: (...options: Option[]) => Promise<ChatClient>;
};

const OUTPUT_MODES: ReadonlyArray<OutputMode> = ['text', 'verbose', 'full'];

function defaultIO(): RunnerIO {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    createClient: (...options) => ClaudeCodeLLM.create(...options),
  };
}

function isOutputMode(value: string): value is OutputMode {
  return OUTPUT_MODES.some((mode) => mode === value);
}

function createProgram(io: RunnerIO): Command {
  return new Command()
    .name(RUNNER_NAME)
    .description('Send one prompt to the claude CLI and print the reply')
    .argument('[prompt...]', 'prompt text; read from stdin when omitted')
    .option('--model <model>', 'model name passed to the CLI')
    .option('--system <prompt>', 'system prompt')
    .option('--cli <path>', 'path to the claude binary')
    .option('--permission-mode <mode>', 'CLI permission mode', DEFAULT_PERMISSION_MODE)
    .option('--cwd <dir>', 'working directory for the CLI')
    .addOption(
      new FlagOption('--output-mode <mode>', 'how tool activity appears in the output')
        .choices(OUTPUT_MODES)
        .default('text'),
    )
    .option('--verbose', 'log the CLI command and stream at debug level', false)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => void io.stdout.write(str),
      writeErr: (str) => void io.stderr.write(str),
    });
}

/** Maps parsed flags onto client options; unset flags keep the client defaults. */
export function buildOptions(flags: RunnerFlags): Option[] {
  const options: Option[] = [withPermissionMode(flags.permissionMode), withOutputMode(flags.outputMode)];

  if (flags.cli) options.push(withCliPath(flags.cli));
  if (flags.model) options.push(withModel(flags.model));
  if (flags.system) options.push(withSystemPrompt(flags.system));
  if (flags.cwd) options.push(withCwd(flags.cwd));
  if (flags.verbose) options.push(withLogger(createLogger('claude-code', 'debug')));

  return options;
}

export async function readPrompt(args: ReadonlyArray<string>, stdin: Readable): Promise<string> {
  const fromArgs = args.join(' ').trim();
  if (fromArgs !== '') {
    return fromArgs;
  }
  return (await text(stdin)).trim();
}

function readFlags(program: Command): RunnerFlags {
  const raw = program.opts<Record<string, unknown>>();
  const optionalString = (key: string): string | undefined => {
    const value = raw[key];
    return typeof value === 'string' ? value : undefined;
  };
  const outputMode = optionalString('outputMode') ?? 'text';

  return {
    model: optionalString('model'),
    system: optionalString('system'),
    cli: optionalString('cli'),
    permissionMode: optionalString('permissionMode') ?? DEFAULT_PERMISSION_MODE,
    cwd: optionalString('cwd'),
    outputMode: isOutputMode(outputMode) ? outputMode : 'text',
    verbose: raw['verbose'] === true,
  };
}

/**
 * Parses `argv` (without the node and script entries), runs one call and
 * prints the reply to stdout. Resolves to the process exit code.
 */
export async function run(argv: ReadonlyArray<string>, io: RunnerIO = defaultIO()): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  const flags = readFlags(program);
  const logger = createLogger(RUNNER_NAME, flags.verbose ? 'debug' : undefined);

  try {
    const prompt = await readPrompt(program.args, io.stdin);
    if (prompt === '') {
      throw new Error('prompt is required');
    }

    const client = await io.createClient(...buildOptions(flags));
    logger.debug(`sending prompt of ${prompt.length} characters`);

    // Nothing reaches stdout unless the call succeeds.
    const response = await client.generateContent([humanMessage(prompt)]);

    io.stdout.write(response.text.endsWith('\n') ? response.text : `${response.text}\n`);
    return 0;
  } catch (err) {
    io.stderr.write(`${RUNNER_NAME}: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}
