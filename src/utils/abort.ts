/**
 * The part of an abort signal this package listens to. Satisfied by Node's
 * `AbortSignal` and by the `AbortSignalLike` the Azure SDK hands to
 * `TokenCredential.getToken`.
 */
export interface AbortSignalLike {
  readonly aborted: boolean;
  addEventListener(type: "abort", listener: () => void): void;
  removeEventListener(type: "abort", listener: () => void): void;
}

export interface LinkedSignal {
  readonly signal: AbortSignal;
  /** Detaches from the source signals. */
  dispose(): void;
}

/** Aborts as soon as any of `signals` aborts. */
export function linkSignals(
  ...signals: Array<AbortSignalLike | undefined>
): LinkedSignal {
  const controller = new AbortController();
  const sources = signals.filter(
    (signal): signal is AbortSignalLike => signal !== undefined,
  );
  const onAbort = () => controller.abort();

  const dispose = () => {
    for (const source of sources) {
      source.removeEventListener("abort", onAbort);
    }
  };

  if (sources.some((source) => source.aborted)) {
    controller.abort();
    return { signal: controller.signal, dispose: () => {} };
  }

  for (const source of sources) {
    source.addEventListener("abort", onAbort);
  }
  return { signal: controller.signal, dispose };
}
