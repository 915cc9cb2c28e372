import { nanoid } from 'nanoid';
import type { GenerationInfo, LLMResponse } from '../../types/index.js';
import { emptyGenerationInfo, mergeGenerationInfo } from '../../types/index.js';

/**
 * Per-call output state. The stream translator writes into it; the client
 * reads it once the CLI has exited cleanly.
 */
export class ResponseAccumulator {
  private readonly chunks: string[] = [];
  private info: GenerationInfo = emptyGenerationInfo();

  append(text: string): void {
    this.chunks.push(text);
  }

  mergeInfo(next: Readonly<GenerationInfo>): void {
    this.info = mergeGenerationInfo(this.info, next);
  }

  get text(): string {
    return this.chunks.join('');
  }

  get generationInfo(): GenerationInfo {
    return this.info;
  }
}

export function translateResponse(accumulator: ResponseAccumulator, model: string): LLMResponse {
  return Object.freeze({
    id: nanoid(),
    model,
    text: accumulator.text,
    generationInfo: Object.freeze({ ...accumulator.generationInfo }),
  });
}
