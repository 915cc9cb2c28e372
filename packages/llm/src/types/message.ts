import type { ContentPart, Role } from './content.js';

/** One turn of a conversation. A string is shorthand for a single text part. */
export type Message = {
  readonly role: Role;
  readonly content: ReadonlyArray<ContentPart> | string;
};

type MessageContent = Message['content'];

export function createMessage(role: Role, content: MessageContent): Message {
  return { role, content };
}

export const systemMessage = (text: string): Message => createMessage('system', text);

export const humanMessage = (content: MessageContent): Message => createMessage('human', content);

export const assistantMessage = (content: MessageContent): Message => createMessage('assistant', content);

/** An assistant turn that asked for `toolName` to run with `args`. */
export function toolCallMessage(
  toolCallId: string,
  toolName: string,
  args: Readonly<Record<string, unknown>>,
  text = '',
): Message {
  const parts: ContentPart[] = text === '' ? [] : [{ kind: 'TEXT', text }];
  parts.push({ kind: 'TOOL_CALL', toolCallId, toolName, args });
  return createMessage('assistant', parts);
}

export function toolMessage(toolCallId: string, toolName: string, content: string, isError = false): Message {
  return createMessage('tool', [{ kind: 'TOOL_RESULT', toolCallId, toolName, content, isError }]);
}
