import { describe, it, expect } from 'vitest';
import { sleep, throwIfAborted, withDeadline } from '../deadline.js';
import { DeadlineExceededError } from '../../services/orchestrator/errors.js';

describe('withDeadline', () => {
  it('resolves work that finishes in time', async () => {
    await expect(withDeadline(1000, 'quick', async () => 'done')).resolves.toBe('done');
  });

  it('rejects and aborts the signal when time runs out', async () => {
    let seen: AbortSignal | undefined;
    const result = withDeadline(10, 'slow', signal => {
      seen = signal;
      return new Promise<string>(() => {});
    });

    await expect(result).rejects.toBeInstanceOf(DeadlineExceededError);
    expect(seen?.aborted).toBe(true);
  });

  it('passes work failures through', async () => {
    await expect(withDeadline(1000, 'failing', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
  });
});

describe('sleep', () => {
  it('rejects when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new DeadlineExceededError('stop'));

    await expect(pending).rejects.toThrow('stop');
  });
});

describe('throwIfAborted', () => {
  it('does nothing without an aborted signal', () => {
    expect(() => throwIfAborted(undefined, 'x')).not.toThrow();
    expect(() => throwIfAborted(new AbortController().signal, 'x')).not.toThrow();
  });

  it('rethrows the deadline reason', () => {
    const controller = new AbortController();
    const reason = new DeadlineExceededError('late');
    controller.abort(reason);

    expect(() => throwIfAborted(controller.signal, 'x')).toThrow(reason);
  });
});
