import { z } from 'zod';
import type { GenerationInfo } from '../../types/index.js';
import { CliReportedError, StreamParseError } from '../../types/index.js';

// Field readers are lenient: a wrong-typed field reads as its empty value,
// the way the CLI's optional fields are treated everywhere else.
const lenientString = z.string().catch('');

const textBlockSchema = z.object({
  type: z.literal('text'),
  text: lenientString,
});

const toolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: lenientString,
  name: lenientString,
  input: z.record(z.string(), z.unknown()).catch({}),
});

const contentBlockSchema = z.discriminatedUnion('type', [textBlockSchema, toolUseBlockSchema]);

export type AssistantBlock = z.infer<typeof contentBlockSchema>;

const assistantLineSchema = z.object({
  message: z.object(
    {
      content: z.union([z.string(), z.array(z.unknown())], {
        errorMap: () => ({ message: 'unsupported assistant content type' }),
      }),
    },
    { errorMap: () => ({ message: "assistant message missing 'message'" }) },
  ),
});

const toolResultLineSchema = z.object({
  tool_use_id: z.string().optional().catch(undefined),
  content: z.string().optional().catch(undefined),
});

// Result fields pass through as the CLI wrote them, null included.
const resultLineSchema = z.object({
  total_cost_usd: z.unknown(),
  usage: z.unknown(),
  result: z.unknown(),
  structured_output: z.unknown(),
});

export type StreamLine =
  | { readonly kind: 'assistant'; readonly blocks: ReadonlyArray<AssistantBlock> }
  | { readonly kind: 'tool_result'; readonly toolUseId: string; readonly content: string }
  | { readonly kind: 'result'; readonly info: GenerationInfo }
  | { readonly kind: 'ignored'; readonly type: string };

export type DecodedLine = {
  readonly type: string;
  readonly payload: Readonly<Record<string, unknown>>;
};

/**
 * Parses one stdout line into a JSON object and reads its `type`. A line
 * that is not a JSON object is a StreamParseError.
 */
export function decodeLine(line: string): DecodedLine {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new StreamParseError(
      `parse json: ${err instanceof Error ? err.message : String(err)}`,
      line,
      err instanceof Error ? err : undefined,
    );
  }

  if (!isRecord(parsed)) {
    throw new StreamParseError('parse json: line is not a JSON object', line);
  }

  const type = parsed['type'];
  return { type: typeof type === 'string' ? type : '', payload: parsed };
}

/**
 * Classifies a decoded line. An empty `type` is the CLI reporting a fatal
 * error; unknown types are kept as `ignored`.
 */
export function classifyLine(line: DecodedLine): StreamLine {
  switch (line.type) {
    case '':
      throw new CliReportedError(line.payload);
    case 'assistant':
      return { kind: 'assistant', blocks: readAssistantBlocks(line.payload) };
    case 'tool_result': {
      const parsed = toolResultLineSchema.parse(line.payload);
      return {
        kind: 'tool_result',
        toolUseId: parsed.tool_use_id ?? '',
        content: parsed.content ?? '',
      };
    }
    case 'result':
      return { kind: 'result', info: readResultInfo(line.payload) };
    default:
      return { kind: 'ignored', type: line.type };
  }
}

function readAssistantBlocks(payload: Readonly<Record<string, unknown>>): ReadonlyArray<AssistantBlock> {
  const parsed = assistantLineSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new StreamParseError(issue?.message ?? 'invalid assistant message', JSON.stringify(payload));
  }

  const content = parsed.data.message.content;
  if (typeof content === 'string') {
    return content === '' ? [] : [{ type: 'text', text: content }];
  }

  const blocks: AssistantBlock[] = [];
  for (const raw of content) {
    const block = contentBlockSchema.safeParse(raw);
    if (block.success) {
      blocks.push(block.data);
    }
  }
  return blocks;
}

function readResultInfo(payload: Readonly<Record<string, unknown>>): GenerationInfo {
  const parsed = resultLineSchema.parse(payload);
  return {
    ...('total_cost_usd' in payload && { totalCostUsd: parsed.total_cost_usd }),
    ...('usage' in payload && { usage: parsed.usage }),
    ...('result' in payload && { result: parsed.result }),
    ...('structured_output' in payload && { structuredOutput: parsed.structured_output }),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
