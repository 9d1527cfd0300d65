import { ActionOutcome, CollaboratorFailure, UnexpectedActionError } from '../errors';
import { log, LogLevel } from '../logger';
import { BackgroundTaskQueue } from './backgroundTaskQueue';

jest.mock('../logger');

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('BackgroundTaskQueue', () => {
  let queue: BackgroundTaskQueue;

  beforeEach(() => {
    jest.clearAllMocks();
    queue = new BackgroundTaskQueue();
  });

  it('runs jobs one at a time in submission order', async () => {
    const events: string[] = [];
    const gate = deferred<void>();

    const first = queue.enqueue('initial_scan', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return { action: 'initial_scan', status: 'success', message: 'scanned' };
    });
    const second = queue.enqueue('turbo', async () => {
      events.push('second:start');
      return { action: 'turbo', status: 'success', message: 'patched' };
    });

    expect(queue.size).toBe(2);
    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(queue.size).toBe(0);
  });

  it('turns a thrown pipeline error into a failed outcome and keeps going', async () => {
    const failure = new CollaboratorFailure('ocr', 'service unavailable');

    const failed = await queue.enqueue('full_ocr', async () => {
      throw failure;
    });
    const next = await queue.enqueue('turbo', async () => ({ action: 'turbo', status: 'success', message: 'ok' }));

    expect(failed).toEqual({ action: 'full_ocr', status: 'failed', message: 'service unavailable', error: failure });
    expect(next.status).toBe('success');
  });

  it('wraps anything else thrown as an unexpected error', async () => {
    const outcome = await queue.enqueue('ocr_only', async () => {
      throw 'boom';
    });

    expect(outcome.status).toBe('failed');
    expect(outcome.error).toBeInstanceOf(UnexpectedActionError);
    expect(outcome.error?.kind).toBe('Unexpected');
    expect(outcome.message).toBe('boom');
  });

  it('logs each outcome at a level matching its status', async () => {
    const outcomes: ActionOutcome[] = [
      { action: 'turbo', status: 'success', message: 'patched' },
      { action: 'turbo', status: 'fallback', message: 'status only' },
      { action: 'turbo', status: 'skipped', message: 'no snapshot' },
    ];

    for (const outcome of outcomes) {
      await queue.enqueue(outcome.action, async () => outcome);
    }

    expect(log).toHaveBeenCalledWith(LogLevel.INFO, '[turbo] SUCCESS: patched');
    expect(log).toHaveBeenCalledWith(LogLevel.WARN, '[turbo] FALLBACK: status only');
    expect(log).toHaveBeenCalledWith(LogLevel.INFO, '[turbo] SKIPPED: no snapshot');
  });

  it('resolves whenIdle after every queued job has finished', async () => {
    const done: string[] = [];
    void queue.enqueue('full_ocr', async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      done.push('full_ocr');
      return { action: 'full_ocr', status: 'success', message: 'done' };
    });

    await queue.whenIdle();

    expect(done).toEqual(['full_ocr']);
  });
});
