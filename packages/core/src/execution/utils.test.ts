import { describe, it, expect } from 'vitest';
import { combineSignals } from './utils';

describe('combineSignals', () => {
  it('should abort when first signal aborts', () => {
    const first = new AbortController();
    const second = new AbortController();

    const combined = combineSignals(first.signal, second.signal);
    expect(combined.aborted).toBe(false);

    first.abort('first abort');

    expect(combined.aborted).toBe(true);
    expect(combined.reason).toBe('first abort');
  });

  it('should abort when second signal aborts', () => {
    const first = new AbortController();
    const second = new AbortController();

    const combined = combineSignals(first.signal, second.signal);
    second.abort('second abort');

    expect(combined.aborted).toBe(true);
    expect(combined.reason).toBe('second abort');
  });

  it('should start aborted when a source already is', () => {
    const first = new AbortController();
    first.abort('early');

    const combined = combineSignals(first.signal, new AbortController().signal);

    expect(combined.aborted).toBe(true);
    expect(combined.reason).toBe('early');
  });

  it('should keep the reason of the first abort', () => {
    const first = new AbortController();
    const second = new AbortController();
    const combined = combineSignals(first.signal, second.signal);

    second.abort('second');
    first.abort('first');

    expect(combined.reason).toBe('second');
  });

  it('should skip missing signals', () => {
    const only = new AbortController();

    const combined = combineSignals(undefined, only.signal, undefined);
    only.abort('done');

    expect(combined.reason).toBe('done');
  });
});
