import { createLogger, NAMESPACES } from '../logging.js';
import { errorMessage } from '../errors.js';

const writesLog = createLogger(NAMESPACES.jobs.writes);

export interface BackgroundWriteOptions {
  /** Total attempts before the write is given up and logged. */
  attempts?: number;
}

/**
 * Fire-and-forget writes that must not gate or fail the response (chat audit
 * records). Failures are retried, then logged. flush() waits for everything
 * still outstanding, which callers use before replaying history.
 */
export class BackgroundWrites {
  private readonly pending = new Set<Promise<void>>();
  private failures = 0;

  constructor(private readonly defaults: Required<BackgroundWriteOptions> = { attempts: 2 }) {}

  schedule(label: string, runner: () => void | Promise<void>, options: BackgroundWriteOptions = {}): void {
    const attempts = Math.max(1, options.attempts ?? this.defaults.attempts);

    const job: Promise<void> = (async () => {
      // Let the response go out first
      await new Promise<void>(resolve => setImmediate(resolve));
      for (let attempt = 1; attempt <= attempts; attempt++) {
        try {
          await runner();
          if (attempt > 1) writesLog('[%s] succeeded on attempt %d', label, attempt);
          return;
        } catch (e) {
          writesLog('[%s] attempt %d/%d failed: %s', label, attempt, attempts, errorMessage(e));
        }
      }
      this.failures += 1;
      console.warn(`[BACKGROUND_WRITES] Giving up on ${label} after ${attempts} attempts`);
    })().finally(() => {
      this.pending.delete(job);
    });

    this.pending.add(job);
  }

  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
  }

  get failedCount(): number {
    return this.failures;
  }
}

export default BackgroundWrites;
