import type { OutputMode, ToolEvent } from '../../types/index.js';

export const FULL_OUTPUT_LIMIT = 500;
const COMMAND_DETAIL_LIMIT = 80;
const FALLBACK_DETAIL_LIMIT = 60;
const FALLBACK_DETAIL_KEYS = ['path', 'file', 'command', 'query', 'name', 'url'] as const;

/**
 * Text to fold into the response for a tool event under the given output
 * mode; empty when the mode shows nothing for it.
 */
export function formatToolEvent(event: ToolEvent, mode: OutputMode): string {
  if (mode === 'text') {
    return '';
  }

  if (event.kind === 'TOOL_USE') {
    if (mode === 'full') {
      return `\n🔧 [${event.toolName}] ${event.toolId}\n${JSON.stringify(event.input, null, 2)}\n`;
    }
    return formatToolUseSummary(event.toolName, event.input);
  }

  // Tool results are too noisy for verbose mode.
  if (mode === 'full') {
    return `  └─ 📤 ${truncate(event.output, FULL_OUTPUT_LIMIT)}\n`;
  }
  return '';
}

export function formatToolUseSummary(toolName: string, input: Readonly<Record<string, unknown>>): string {
  const detail = toolUseDetail(toolName, input);
  return detail !== '' ? `\n🔧 ${toolName}: ${detail}\n` : `\n🔧 ${toolName}\n`;
}

function toolUseDetail(toolName: string, input: Readonly<Record<string, unknown>>): string {
  switch (toolName) {
    case 'Read':
    case 'read_file':
    case 'view_file':
    case 'Write':
    case 'write_file':
    case 'create_file':
      return firstString(input, ['file_path', 'path']);
    case 'Bash':
    case 'run_command':
    case 'execute_command':
      return ellipsize(firstString(input, ['command']), COMMAND_DETAIL_LIMIT);
    case 'TodoWrite':
    case 'task':
    case 'plan':
      return todoCount(input['todos']);
    case 'Skill':
    case 'use_skill':
      return firstString(input, ['skill_name', 'name']);
    case 'Search':
    case 'grep':
    case 'find':
      return firstString(input, ['query', 'pattern']);
    default:
      for (const key of FALLBACK_DETAIL_KEYS) {
        const value = input[key];
        if (typeof value === 'string' && value !== '') {
          return ellipsize(value, FALLBACK_DETAIL_LIMIT);
        }
      }
      return '';
  }
}

function firstString(input: Readonly<Record<string, unknown>>, keys: ReadonlyArray<string>): string {
  for (const key of keys) {
    const value = input[key];
    if (typeof value === 'string') {
      return value;
    }
  }
  return '';
}

function todoCount(todos: unknown): string {
  if (typeof todos === 'string') {
    return `${todos.split('\n').length} items`;
  }
  if (Array.isArray(todos)) {
    return `${todos.length} items`;
  }
  return '';
}

/** Keeps `limit` characters in total, the last three being `...`. */
function ellipsize(value: string, limit: number): string {
  return value.length > limit ? `${cut(value, limit - 3)}...` : value;
}

function truncate(value: string, limit: number): string {
  return value.length > limit ? `${cut(value, limit)}... (truncated)` : value;
}

/** First `end` UTF-16 units, one fewer when the last would split a surrogate pair. */
function cut(value: string, end: number): string {
  const last = value.charCodeAt(end - 1);
  return value.slice(0, last >= 0xd800 && last <= 0xdbff ? end - 1 : end);
}
