import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter, getEventListeners } from 'node:events';
import { PassThrough } from 'node:stream';
import { ClaudeCodeLLM, withCliPath, withEnv, withLogger, withOutputMode, withToolEventHook } from './index.js';
import {
  AbortError,
  CliReportedError,
  ProcessExitError,
  ProcessStartError,
  StreamParseError,
  humanMessage,
  systemMessage,
} from '../../types/index.js';
import type { StreamEvent } from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));

vi.mock('node:child_process', () => ({ spawn: spawnMock }));

const CLI_PATH = '/usr/local/bin/claude';

/** Stands in for a spawned CLI: scripts write to its pipes and then exit. */
class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly kill = vi.fn((signal: NodeJS.Signals = 'SIGTERM') => {
    this.exit(null, signal);
    return true;
  });

  writeLine(payload: Record<string, unknown> | string): void {
    this.stdout.write(`${typeof payload === 'string' ? payload : JSON.stringify(payload)}\n`);
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exitCode !== null || this.signalCode !== null) {
      return;
    }
    this.exitCode = code;
    this.signalCode = signal;
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit('close', code, signal));
  }
}

type SpawnOptions = { readonly signal?: AbortSignal };

function mockCli(script: (child: FakeChild) => void): FakeChild {
  const child = new FakeChild();
  spawnMock.mockImplementationOnce((_binary: string, _args: string[], options: SpawnOptions) => {
    options.signal?.addEventListener('abort', () => child.kill('SIGTERM'), { once: true });
    process.nextTick(() => {
      child.emit('spawn');
      setImmediate(() => script(child));
    });
    return child;
  });
  return child;
}

function createClient(...extra: Parameters<typeof ClaudeCodeLLM.create>): Promise<ClaudeCodeLLM> {
  return ClaudeCodeLLM.create(withCliPath(CLI_PATH), withLogger(createLogger('test', 'silent')), ...extra);
}

const textLine = (text: string) => ({ type: 'assistant', message: { content: [{ type: 'text', text }] } });

describe('ClaudeCodeLLM', () => {
  beforeEach(() => {
    spawnMock.mockReset();
  });

  describe('create', () => {
    it('should keep an explicit CLI path without searching for one', async () => {
      const llm = await createClient();

      expect(llm.name).toBe('claude-code');
      expect(llm.cliPath).toBe(CLI_PATH);
      expect(llm.options.permissionMode).toBe('bypassPermissions');
    });
  });

  describe('generateContent', () => {
    it('should run the CLI and collect text and generation info', async () => {
      mockCli((child) => {
        child.writeLine({ type: 'system', subtype: 'init' });
        child.writeLine(textLine('hi'));
        child.writeLine({ type: 'result', total_cost_usd: 0.01 });
        child.exit(0);
      });
      const llm = await createClient();

      const response = await llm.generateContent([humanMessage('hello')]);

      expect(response.text).toBe('hi');
      expect(response.model).toBe('');
      expect(response.generationInfo).toEqual({ totalCostUsd: 0.01 });
      expect(response.id).not.toBe('');
    });

    it('should pass the built arguments, environment and pipes to the CLI', async () => {
      mockCli((child) => child.exit(0));
      const llm = await createClient(withEnv({ CCLM_TEST_FLAG: '1' }));

      await llm.generateContent([systemMessage('be brief'), humanMessage('hello')]);

      expect(spawnMock).toHaveBeenCalledTimes(1);
      expect(spawnMock).toHaveBeenCalledWith(
        CLI_PATH,
        [
          '--output-format',
          'stream-json',
          '--verbose',
          '--system-prompt',
          'be brief',
          '--permission-mode',
          'bypassPermissions',
          '--print',
          '--',
          'User: hello',
        ],
        expect.objectContaining({
          env: expect.objectContaining({ CCLM_TEST_FLAG: '1' }),
          stdio: ['ignore', 'pipe', 'pipe'],
        }),
      );
    });

    it('should give each call its own response', async () => {
      mockCli((child) => {
        child.writeLine(textLine('first'));
        child.exit(0);
      });
      mockCli((child) => {
        child.writeLine(textLine('second'));
        child.exit(0);
      });
      const llm = await createClient();

      const first = await llm.generateContent([humanMessage('one')]);
      const second = await llm.generateContent([humanMessage('two')]);

      expect(first.text).toBe('first');
      expect(second.text).toBe('second');
      expect(first.id).not.toBe(second.id);
    });

    it('should reject an empty conversation without spawning', async () => {
      const llm = await createClient();

      await expect(llm.generateContent([humanMessage('   ')])).rejects.toThrow('prompt is empty');
      expect(spawnMock).not.toHaveBeenCalled();
    });

    it('should report a non-zero exit with the CLI stderr', async () => {
      mockCli((child) => {
        child.stderr.write('auth failed\n');
        child.exit(1);
      });
      const llm = await createClient();

      const error = await llm.generateContent([humanMessage('hello')]).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProcessExitError);
      expect(error).toMatchObject({ exitCode: 1, stderr: 'auth failed', message: 'cli failed: exit status 1: auth failed' });
    });

    it('should report a CLI error line even when text came before it', async () => {
      mockCli((child) => {
        child.writeLine(textLine('partial'));
        child.writeLine({ type: '', error: 'Invalid API key' });
        child.exit(1);
      });
      const llm = await createClient();

      await expect(llm.generateContent([humanMessage('hello')])).rejects.toThrow(CliReportedError);
    });

    it('should kill the CLI and finish draining stderr when parsing fails', async () => {
      const child = mockCli((c) => {
        c.stderr.write('warning: slow network\n');
        c.writeLine('{not json');
      });
      const llm = await createClient();

      await expect(llm.generateContent([humanMessage('hello')])).rejects.toThrow(StreamParseError);
      expect(child.kill).toHaveBeenCalledWith('SIGKILL');
      expect(child.stderr.readableEnded).toBe(true);
    });

    it('should fail with ProcessStartError when the binary cannot be started', async () => {
      spawnMock.mockImplementationOnce(() => {
        const child = new FakeChild();
        process.nextTick(() => child.emit('error', new Error(`spawn ${CLI_PATH} ENOENT`)));
        return child;
      });
      const llm = await createClient();

      const error = await llm.generateContent([humanMessage('hello')]).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProcessStartError);
      expect(error).toMatchObject({ message: `start cli: spawn ${CLI_PATH} ENOENT` });
    });

    it('should report an abort that lands before the process has started as an abort', async () => {
      const controller = new AbortController();
      spawnMock.mockImplementationOnce(() => {
        const child = new FakeChild();
        process.nextTick(() => {
          controller.abort();
          child.emit('error', new Error('The operation was aborted'));
        });
        return child;
      });
      const llm = await createClient();

      const error = await llm
        .generateContent([humanMessage('hello')], { signal: controller.signal })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AbortError);
      expect(error).not.toBeInstanceOf(ProcessStartError);
    });

    it('should not spawn when the signal is already aborted', async () => {
      const llm = await createClient();

      await expect(
        llm.generateContent([humanMessage('hello')], { signal: AbortSignal.abort() }),
      ).rejects.toThrow(AbortError);
      expect(spawnMock).not.toHaveBeenCalled();
    });

    it('should abort a running call and discard partial output', async () => {
      const controller = new AbortController();
      const child = mockCli((c) => {
        c.writeLine(textLine('partial'));
      });
      const llm = await createClient();

      const result = llm.generateContent([humanMessage('hello')], {
        signal: controller.signal,
        onChunk: () => controller.abort(),
      });

      await expect(result).rejects.toThrow(AbortError);
      expect(child.kill).toHaveBeenCalledWith('SIGTERM');
    });
  });

  describe('call', () => {
    it('should send the prompt as a single user turn and return the text', async () => {
      mockCli((child) => {
        child.writeLine(textLine('4'));
        child.exit(0);
      });
      const llm = await createClient();

      expect(await llm.call('what is 2+2?')).toBe('4');
      expect(spawnMock.mock.calls[0]?.[1]).toContain('User: what is 2+2?');
    });

    it('should stream chunks to onChunk in order', async () => {
      mockCli((child) => {
        child.writeLine(textLine('Hello'));
        child.writeLine(textLine(', world'));
        child.exit(0);
      });
      const llm = await createClient();
      const chunks: string[] = [];

      const text = await llm.call('greet', { onChunk: (chunk) => void chunks.push(chunk) });

      expect(chunks).toEqual(['Hello', ', world']);
      expect(text).toBe('Hello, world');
    });

    it('should call both tool hooks once per event in text mode without changing the text', async () => {
      mockCli((child) => {
        child.writeLine({
          type: 'assistant',
          message: {
            content: [
              { type: 'tool_use', id: 'toolu_1', name: 'Read', input: { file_path: 'README.md' } },
              { type: 'text', text: 'done' },
            ],
          },
        });
        child.exit(0);
      });
      const optionHook = vi.fn();
      const callHook = vi.fn();
      const llm = await createClient(withToolEventHook(optionHook));

      const text = await llm.call('read it', { onToolEvent: callHook });

      expect(text).toBe('done');
      expect(optionHook).toHaveBeenCalledTimes(1);
      expect(callHook).toHaveBeenCalledTimes(1);
      expect(callHook.mock.calls[0]?.[0]).toMatchObject({ kind: 'TOOL_USE', toolName: 'Read', toolId: 'toolu_1' });
    });

    it('should fold tool summaries into the text in verbose mode', async () => {
      mockCli((child) => {
        child.writeLine({
          type: 'assistant',
          message: { content: [{ type: 'tool_use', id: 'toolu_1', name: 'Bash', input: { command: 'ls' } }] },
        });
        child.writeLine({ type: 'tool_result', tool_use_id: 'toolu_1', content: 'README.md' });
        child.writeLine(textLine('One file.'));
        child.exit(0);
      });
      const llm = await createClient(withOutputMode('verbose'));

      expect(await llm.call('list files')).toBe('\n🔧 Bash: ls\nOne file.');
    });
  });

  describe('stream', () => {
    async function collect(events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
      const out: StreamEvent[] = [];
      for await (const event of events) {
        out.push(event);
      }
      return out;
    }

    it('should yield deltas, tool events and a final response', async () => {
      mockCli((child) => {
        child.writeLine({
          type: 'assistant',
          message: {
            content: [
              { type: 'text', text: 'Checking.' },
              { type: 'tool_use', id: 'toolu_1', name: 'Glob', input: { path: 'src' } },
            ],
          },
        });
        child.writeLine({ type: 'result', total_cost_usd: 0.02 });
        child.exit(0);
      });
      const llm = await createClient(withOutputMode('verbose'));

      const events = await collect(llm.stream([humanMessage('look')]));

      expect(events.map((event) => event.type)).toEqual(['TEXT_DELTA', 'TOOL_EVENT', 'TEXT_DELTA', 'FINISH']);
      expect(events[0]).toEqual({ type: 'TEXT_DELTA', text: 'Checking.' });
      expect(events[2]).toEqual({ type: 'TEXT_DELTA', text: '\n🔧 Glob: src\n' });
      expect(events[3]).toMatchObject({
        type: 'FINISH',
        response: { text: 'Checking.\n🔧 Glob: src\n', generationInfo: { totalCostUsd: 0.02 } },
      });
    });

    it('should surface failures to the consumer', async () => {
      mockCli((child) => {
        child.stderr.write('boom');
        child.exit(2);
      });
      const llm = await createClient();

      await expect(collect(llm.stream([humanMessage('hello')]))).rejects.toThrow('cli failed: exit status 2: boom');
    });

    it('should leave no listeners on a caller signal shared across calls', async () => {
      const caller = new AbortController();
      const llm = await createClient();

      for (const reply of ['one', 'two', 'three']) {
        mockCli((child) => {
          child.writeLine(textLine(reply));
          child.exit(0);
        });
        await collect(llm.stream([humanMessage('hello')], { signal: caller.signal }));
      }
      mockCli((child) => child.exit(3));
      await expect(collect(llm.stream([humanMessage('hello')], { signal: caller.signal }))).rejects.toThrow(
        ProcessExitError,
      );

      expect(getEventListeners(caller.signal, 'abort')).toHaveLength(0);
    });

    it('should kill the CLI when the consumer stops early', async () => {
      const child = mockCli((c) => {
        c.writeLine(textLine('first'));
      });
      const llm = await createClient();

      for await (const event of llm.stream([humanMessage('hello')])) {
        expect(event).toEqual({ type: 'TEXT_DELTA', text: 'first' });
        break;
      }

      expect(child.kill).toHaveBeenCalledWith('SIGTERM');
    });
  });
});
