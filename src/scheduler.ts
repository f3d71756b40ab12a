import { describeError } from "./errors";
import { Logger } from "./logger";

export type ScheduledJob = {
  id: string;
  name: string;
  nextRun: string | null;
};

/** Next local-time occurrence of hour:minute strictly after `now`. */
export function computeNextRun(now: Date, hour: number, minute: number): Date {
  const next = new Date(now.getFullYear(), now.getMonth(), now.getDate(), hour, minute, 0, 0);
  if (next.getTime() <= now.getTime()) {
    next.setDate(next.getDate() + 1);
  }
  return next;
}

export type DailySchedulerOptions = {
  id: string;
  name: string;
  hour: number;
  minute: number;
  task: () => Promise<unknown>;
  logger: Logger;
  now?: () => Date;
};

/**
 * Runs a task once a day through a chain of timers. A run that is still in
 * progress when the next one comes due is not waited for.
 */
export class DailyScheduler {
  private timer: NodeJS.Timeout | undefined;
  private next: Date | undefined;
  private readonly now: () => Date;

  constructor(private readonly options: DailySchedulerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) return;
    this.arm();
    this.options.logger.info(
      `Scheduled "${this.options.name}" daily at ${pad(this.options.hour)}:${pad(this.options.minute)}, next run ${this.next?.toISOString()}`
    );
  }

  stop(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    this.next = undefined;
  }

  nextRunAt(): Date | undefined {
    return this.next;
  }

  describe(): ScheduledJob {
    return { id: this.options.id, name: this.options.name, nextRun: this.next?.toISOString() ?? null };
  }

  /** `after` is the slot that just fired; the clock may read slightly before it. */
  private arm(after?: Date): void {
    const now = this.now();
    const from = after !== undefined && after.getTime() > now.getTime() ? after : now;
    const next = computeNextRun(from, this.options.hour, this.options.minute);
    this.next = next;
    this.timer = setTimeout(() => this.fire(), Math.max(0, next.getTime() - now.getTime()));
  }

  private fire(): void {
    const { logger, name, task } = this.options;
    logger.info(`Running scheduled job "${name}"`);
    this.arm(this.next);
    void task().then(
      () => logger.info(`Scheduled job "${name}" finished`),
      (error: unknown) => logger.error(`Scheduled job "${name}" failed: ${describeError(error)}`)
    );
  }
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}
