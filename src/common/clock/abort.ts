/**
 * Combines several optional signals into one that aborts as soon as any of
 * them does. `dispose` detaches the listeners once the combined signal is
 * no longer needed.
 */
export function anySignal(signals: ReadonlyArray<AbortSignal | undefined>): {
  signal: AbortSignal;
  dispose: () => void;
} {
  const controller = new AbortController();
  const attached: Array<{ source: AbortSignal; listener: () => void }> = [];

  const dispose = () => {
    for (const { source, listener } of attached) {
      source.removeEventListener('abort', listener);
    }
    attached.length = 0;
  };

  for (const source of signals) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      dispose();
      break;
    }
    const listener = () => {
      controller.abort(source.reason);
      dispose();
    };
    source.addEventListener('abort', listener, { once: true });
    attached.push({ source, listener });
  }

  return { signal: controller.signal, dispose };
}

/** Aborts after `ms`. `clear` cancels the timer. */
export function timeoutSignal(ms: number): { signal: AbortSignal; clear: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new Error(`timed out after ${ms}ms`)),
    ms,
  );
  timer.unref?.();
  return { signal: controller.signal, clear: () => clearTimeout(timer) };
}
