/**
 * A signal that aborts with the reason of whichever source aborts first.
 * Missing sources are skipped, so optional caller signals can be passed as is.
 */
export function combineSignals(...signals: Array<AbortSignal | undefined>): AbortSignal {
  const controller = new AbortController();
  const sources = signals.filter((signal): signal is AbortSignal => signal !== undefined);

  const early = sources.find((signal) => signal.aborted);
  if (early) {
    controller.abort(early.reason);
    return controller.signal;
  }

  const onAbort = (event: Event) => {
    if (event.target instanceof AbortSignal) {
      controller.abort(event.target.reason);
    }
    for (const signal of sources) {
      signal.removeEventListener('abort', onAbort);
    }
  };
  for (const signal of sources) {
    signal.addEventListener('abort', onAbort);
  }

  return controller.signal;
}
