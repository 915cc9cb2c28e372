export type GenerationInfo = {
  /** Usually a number of US dollars; kept as reported. */
  readonly totalCostUsd?: unknown;
  readonly usage?: unknown;
  readonly result?: unknown;
  readonly structuredOutput?: unknown;
};

export type LLMResponse = {
  readonly id: string;
  readonly model: string;
  readonly text: string;
  readonly generationInfo: GenerationInfo;
};

export function emptyGenerationInfo(): GenerationInfo {
  return {};
}

/**
 * Every key present in `next` wins, whatever its value; keys absent from
 * `next` keep their previous value.
 */
export function mergeGenerationInfo(
  previous: Readonly<GenerationInfo>,
  next: Readonly<GenerationInfo>,
): GenerationInfo {
  return { ...previous, ...next };
}
