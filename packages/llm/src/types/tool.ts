export type ToolEventKind = 'TOOL_USE' | 'TOOL_RESULT';

/** The agent asked for a tool to run. */
export type ToolUseEvent = {
  readonly kind: 'TOOL_USE';
  readonly toolName: string;
  readonly toolId: string;
  readonly input: Readonly<Record<string, unknown>>;
  readonly timestamp: Date;
};

/** A tool the agent ran has produced output. */
export type ToolResultEvent = {
  readonly kind: 'TOOL_RESULT';
  readonly toolId: string;
  readonly output: string;
  readonly timestamp: Date;
};

export type ToolEvent = ToolUseEvent | ToolResultEvent;

export type ToolEventHook = (event: ToolEvent) => void;
