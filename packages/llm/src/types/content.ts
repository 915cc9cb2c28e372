export type Role = 'human' | 'assistant' | 'system' | 'function' | 'tool' | 'generic';

export type TextPart = {
  readonly kind: 'TEXT';
  readonly text: string;
};

/** A request, made earlier in the conversation, for a tool to run. */
export type ToolCallPart = {
  readonly kind: 'TOOL_CALL';
  readonly toolCallId: string;
  readonly toolName: string;
  readonly args: Readonly<Record<string, unknown>>;
};

export type ToolResultPart = {
  readonly kind: 'TOOL_RESULT';
  readonly toolCallId: string;
  readonly toolName: string;
  readonly content: string;
  readonly isError: boolean;
};

/**
 * Inline binary content. It can be put in a message but the CLI only
 * takes text, so building a prompt from it fails.
 */
export type BinaryPart = {
  readonly kind: 'IMAGE' | 'AUDIO' | 'DOCUMENT';
  readonly mediaType: string;
  readonly data: string | null;
  readonly url: string | null;
};

export type ContentPart = TextPart | ToolCallPart | ToolResultPart | BinaryPart;

export type ContentKind = ContentPart['kind'];
