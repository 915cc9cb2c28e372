import type { ContentPart, Message, Role } from '../../types/index.js';
import { EmptyPromptError, UnsupportedContentError } from '../../types/index.js';

export type BuiltPrompt = {
  readonly systemPrompt: string;
  readonly prompt: string;
};

/**
 * Turns a conversation into the two strings the CLI accepts: a system
 * prompt (configured base plus any system messages) and a single user
 * turn with role-labelled messages separated by blank lines.
 */
export function buildPrompt(
  messages: ReadonlyArray<Message>,
  baseSystemPrompt: string,
): BuiltPrompt {
  const { systemText, others } = splitSystemMessages(messages);
  const systemPrompt = mergeSystemPrompt(baseSystemPrompt, systemText);
  const prompt = formatConversation(others);

  if (prompt.trim() === '') {
    throw new EmptyPromptError();
  }

  return { systemPrompt, prompt };
}

export function splitSystemMessages(messages: ReadonlyArray<Message>): {
  readonly systemText: string;
  readonly others: ReadonlyArray<Message>;
} {
  const systemParts: string[] = [];
  const others: Message[] = [];

  for (const message of messages) {
    if (message.role !== 'system') {
      others.push(message);
      continue;
    }
    const text = messageToText(message);
    if (text.trim() !== '') {
      systemParts.push(text);
    }
  }

  return { systemText: systemParts.join('\n\n'), others };
}

export function mergeSystemPrompt(base: string, extra: string): string {
  const trimmedBase = base.trim();
  const trimmedExtra = extra.trim();

  if (trimmedBase === '') {
    return trimmedExtra;
  }
  if (trimmedExtra === '') {
    return trimmedBase;
  }
  return `${trimmedBase}\n\n${trimmedExtra}`;
}

export function formatConversation(messages: ReadonlyArray<Message>): string {
  const parts: string[] = [];

  for (const message of messages) {
    const text = messageToText(message).trim();
    if (text === '') {
      continue;
    }

    const prefix = rolePrefix(message.role);
    parts.push(prefix ? `${prefix}: ${text}` : text);
  }

  return parts.join('\n\n');
}

export function messageToText(message: Message): string {
  if (typeof message.content === 'string') {
    return message.content;
  }
  return message.content.map(partToText).join('\n');
}

function partToText(part: ContentPart): string {
  switch (part.kind) {
    case 'TEXT':
      return part.text;
    case 'TOOL_CALL':
      return `[ToolCall] ${part.toolName} ${JSON.stringify(part.args)}`;
    case 'TOOL_RESULT': {
      const name = part.toolName.trim();
      return name === '' ? `[ToolResult] ${part.content}` : `[ToolResult:${name}] ${part.content}`;
    }
    default:
      throw new UnsupportedContentError(part.kind);
  }
}

export function rolePrefix(role: Role): string {
  switch (role) {
    case 'human':
    case 'generic':
      return 'User';
    case 'assistant':
      return 'Assistant';
    case 'function':
      return 'Function';
    case 'tool':
      return 'Tool';
    case 'system':
      return 'System';
    default:
      return '';
  }
}
