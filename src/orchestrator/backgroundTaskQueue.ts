import { ActionKind, ActionOutcome, ActionStatus, PipelineError, UnexpectedActionError } from '../errors';
import { describeError, log, LogLevel } from '../logger';

const levelByStatus: Record<ActionStatus, LogLevel> = {
  success: LogLevel.INFO,
  skipped: LogLevel.INFO,
  fallback: LogLevel.WARN,
  failed: LogLevel.ERROR,
};

/**
 * Runs background actions one at a time in submission order. The promise
 * returned by `enqueue` always resolves with an outcome; a throwing job is
 * reported as `failed`.
 */
export class BackgroundTaskQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  enqueue(action: ActionKind, job: () => Promise<ActionOutcome>): Promise<ActionOutcome> {
    this.pending += 1;
    log(LogLevel.DEBUG, `[Queue] ${action} queued (${this.pending} pending)`);

    const run = this.tail.then(async (): Promise<ActionOutcome> => {
      try {
        return await job();
      } catch (error) {
        log(LogLevel.ERROR, `[Queue] ${action} threw`, describeError(error));
        const message = error instanceof Error ? error.message : String(error);
        return {
          action,
          status: 'failed',
          message,
          error: error instanceof PipelineError ? error : new UnexpectedActionError(message, { cause: error }),
        };
      } finally {
        this.pending -= 1;
      }
    });

    this.tail = run;
    return run.then((outcome) => {
      log(levelByStatus[outcome.status], `[${outcome.action}] ${outcome.status.toUpperCase()}: ${outcome.message}`);
      return outcome;
    });
  }

  get size(): number {
    return this.pending;
  }

  /** Resolves once every job queued so far has finished. */
  async whenIdle(): Promise<void> {
    await this.tail;
  }
}
