export type LinkedSignal = {
  readonly signal: AbortSignal;
  /** Detaches from the source signals. Call once the guarded work has settled. */
  readonly unlink: () => void;
};

/**
 * Combines signals into one that aborts as soon as any of them does.
 * Listeners stay on the sources until `unlink` runs, so a long-lived
 * caller signal must be unlinked after every call.
 */
export function linkSignals(...sources: ReadonlyArray<AbortSignal | undefined>): LinkedSignal {
  const controller = new AbortController();
  const attached: AbortSignal[] = [];

  const onAbort = (): void => {
    unlink();
    controller.abort();
  };

  const unlink = (): void => {
    for (const source of attached) {
      source.removeEventListener('abort', onAbort);
    }
    attached.length = 0;
  };

  for (const source of sources) {
    if (!source) {
      continue;
    }
    if (source.aborted) {
      onAbort();
      break;
    }
    source.addEventListener('abort', onAbort, { once: true });
    attached.push(source);
  }

  return { signal: controller.signal, unlink };
}
