import type { LLMResponse } from './response.js';
import type { ToolEvent } from './tool.js';

export type StreamEventType = 'TEXT_DELTA' | 'TOOL_EVENT' | 'FINISH';

export type TextDelta = {
  readonly type: 'TEXT_DELTA';
  readonly text: string;
};

export type ToolEventDelta = {
  readonly type: 'TOOL_EVENT';
  readonly event: ToolEvent;
};

export type Finish = {
  readonly type: 'FINISH';
  readonly response: LLMResponse;
};

export type StreamEvent = TextDelta | ToolEventDelta | Finish;
