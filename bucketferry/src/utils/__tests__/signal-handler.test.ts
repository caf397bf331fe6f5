import { afterEach, describe, expect, it, vi } from 'vitest';

import { SignalHandler } from '../signal-handler.js';

describe('SignalHandler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should abort the run signal on the first signal', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const exit = vi.fn();
    const handler = new SignalHandler(exit);

    handler.handle('SIGINT');

    expect(handler.signal.aborted).toBe(true);
    expect(handler.isShuttingDown).toBe(true);
    expect(handler.signal.reason).toBeInstanceOf(Error);
    expect(handler.signal.reason).toMatchObject({
      name: 'AbortError',
      message: 'Interrupted by SIGINT',
    });
    expect(exit).not.toHaveBeenCalled();
  });

  it('should force exit on a second signal', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const exit = vi.fn();
    const handler = new SignalHandler(exit);

    handler.handle('SIGTERM');
    handler.handle('SIGINT');

    expect(exit).toHaveBeenCalledWith(130);
  });

  it('should remove its process listeners when uninstalled', () => {
    const before = process.listenerCount('SIGTERM');
    const handler = new SignalHandler(vi.fn()).install(['SIGTERM']);

    expect(process.listenerCount('SIGTERM')).toBe(before + 1);

    handler.uninstall();

    expect(process.listenerCount('SIGTERM')).toBe(before);
  });
});
