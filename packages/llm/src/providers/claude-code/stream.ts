import type { OutputMode, ToolEvent } from '../../types/index.js';
import type { Logger } from '../../utils/logger.js';
import type { ResponseAccumulator } from './response.js';
import { classifyLine, decodeLine } from './schema.js';
import { formatToolEvent } from './tool-events.js';

export type StreamContext = {
  readonly accumulator: ResponseAccumulator;
  readonly outputMode: OutputMode;
  readonly logger: Logger;
  readonly onChunk?: (chunk: string) => void | Promise<void>;
  readonly toolEventHooks: ReadonlyArray<(event: ToolEvent) => void>;
};

/**
 * Consumes the CLI's stream-json output line by line, writing text and
 * generation info into the context's accumulator.
 *
 * Throws on the first unusable line; whatever was accumulated before that
 * stays in the accumulator.
 */
export async function translateStream(lines: AsyncIterable<string>, ctx: StreamContext): Promise<void> {
  for await (const rawLine of lines) {
    const line = rawLine.trim();
    if (line === '') {
      continue;
    }

    const decoded = decodeLine(line);
    logLine(ctx.logger, decoded.type, decoded.payload);

    const classified = classifyLine(decoded);
    switch (classified.kind) {
      case 'assistant':
        for (const block of classified.blocks) {
          if (block.type === 'text') {
            if (block.text !== '') {
              await emitText(ctx, block.text);
            }
          } else {
            await handleToolEvent(ctx, {
              kind: 'TOOL_USE',
              toolName: block.name,
              toolId: block.id,
              input: block.input,
              timestamp: new Date(),
            });
          }
        }
        break;
      case 'tool_result':
        await handleToolEvent(ctx, {
          kind: 'TOOL_RESULT',
          toolId: classified.toolUseId,
          output: classified.content,
          timestamp: new Date(),
        });
        break;
      case 'result':
        ctx.accumulator.mergeInfo(classified.info);
        break;
      case 'ignored':
        // system, user, stream_event and future informational lines
        break;
    }
  }
}

async function emitText(ctx: StreamContext, text: string): Promise<void> {
  if (ctx.onChunk) {
    await ctx.onChunk(text);
  }
  ctx.accumulator.append(text);
}

async function handleToolEvent(ctx: StreamContext, event: ToolEvent): Promise<void> {
  for (const hook of ctx.toolEventHooks) {
    hook(event);
  }

  const summary = formatToolEvent(event, ctx.outputMode);
  if (summary !== '') {
    await emitText(ctx, summary);
  }
}

function logLine(logger: Logger, type: string, payload: Readonly<Record<string, unknown>>): void {
  logger.debug(`stream-json (type=${type === '' ? '<empty>' : type}):\n${JSON.stringify(payload, null, 2)}`);
}
