import { CronTime } from "cron";
import { RunTimeoutError, SchedulerBusyError, SchedulerFault } from "./errors.js";
import { logger } from "./logger.js";
import { localDate } from "./time.js";
import type { ScheduleState } from "./types.js";

export type SchedulerStatus = "idle" | "waiting" | "running" | "stopped";

export type FireContext = {
  /** Local calendar date this fire belongs to. */
  date: string;
  scheduledFor: Date;
  catchUp: boolean;
};

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type DailySchedulerOptions = {
  timezone: string;
  targetLocalTime: string;
  run: (fire: FireContext, signal: AbortSignal) => Promise<unknown>;
  runTimeoutMs?: number;
  lastFiredDate?: string | null;
  catchUpOnStart?: boolean;
  now?: () => Date;
  sleep?: Sleep;
};

export type SchedulerSnapshot = ScheduleState & {
  status: SchedulerStatus;
  nextFireInstant: string | null;
  lastFault: string | null;
};

export const DEFAULT_RUN_TIMEOUT_MS = 5 * 60 * 1000;
// Waits are re-checked against the clock at least this often.
export const MAX_SLEEP_MS = 60 * 60 * 1000;

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`.
 * Rejects with RunTimeoutError at the deadline even if the task ignores the signal.
 */
export function withDeadline<T>(timeoutMs: number, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const running = task(controller.signal);
    const timer = setTimeout(() => {
      const err = new RunTimeoutError(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
    running.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        if (controller.signal.aborted) logger.debug({ err }, "Run settled after its deadline");
        reject(err);
      },
    );
  });
}

export function cronExpression(targetLocalTime: string): string {
  const [hours, minutes] = targetLocalTime.split(":").map(Number);
  if (hours === undefined || minutes === undefined || Number.isNaN(hours) || Number.isNaN(minutes)) {
    throw new Error(`Invalid target time "${targetLocalTime}", expected HH:mm`);
  }
  return `${minutes} ${hours} * * *`;
}

export class DailyScheduler {
  readonly state: ScheduleState;
  private status: SchedulerStatus = "idle";
  private nextFire: Date | null = null;
  private lastFault: SchedulerFault | null = null;
  private loop: Promise<void> | null = null;
  private active: Promise<unknown> | null = null;
  private readonly stopController = new AbortController();
  private readonly cronTime: CronTime;
  private readonly runTimeoutMs: number;
  private readonly now: () => Date;
  private readonly sleep: Sleep;

  constructor(private readonly options: DailySchedulerOptions) {
    this.state = {
      timezone: options.timezone,
      targetLocalTime: options.targetLocalTime,
      lastFiredDate: options.lastFiredDate ?? null,
    };
    this.cronTime = new CronTime(cronExpression(options.targetLocalTime), options.timezone);
    this.runTimeoutMs = options.runTimeoutMs ?? DEFAULT_RUN_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleep;
  }

  get running(): boolean {
    return this.active !== null;
  }

  /** Next occurrence of the target local time strictly after `from`. */
  nextFireInstant(from: Date): Date {
    let next = this.cronTime.getNextDateFrom(from, this.state.timezone).toJSDate();
    while (next.getTime() <= from.getTime()) {
      next = this.cronTime.getNextDateFrom(new Date(next.getTime() + 1000), this.state.timezone).toJSDate();
    }
    return next;
  }

  /**
   * Decides the next fire. A known last fire date other than today, with
   * today's target already behind us, means today was missed: fire now.
   */
  plan(now: Date, treatUnknownAsMissed = false): FireContext {
    const today = localDate(now, this.state.timezone);
    const next = this.nextFireInstant(now);
    const targetPassedToday = localDate(next, this.state.timezone) !== today;
    const last = this.state.lastFiredDate;
    const missedToday = last === null ? treatUnknownAsMissed : last !== today;

    if (targetPassedToday && missedToday) {
      return { date: today, scheduledFor: now, catchUp: true };
    }
    return { date: localDate(next, this.state.timezone), scheduledFor: next, catchUp: false };
  }

  start(): Promise<void> {
    if (!this.loop) this.loop = this.runLoop();
    return this.loop;
  }

  async stop(): Promise<void> {
    if (!this.stopController.signal.aborted) {
      logger.info({ status: this.status }, "Stopping scheduler");
      this.stopController.abort();
    }
    if (this.loop) {
      await this.loop;
    } else {
      this.status = "stopped";
    }
  }

  /** On-demand run under the same exclusivity and time cap as scheduled runs. */
  async runNow<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    if (this.active) throw new SchedulerBusyError();
    return this.exclusive(task);
  }

  snapshot(): SchedulerSnapshot {
    return {
      ...this.state,
      status: this.status,
      nextFireInstant: this.nextFire ? this.nextFire.toISOString() : null,
      lastFault: this.lastFault ? this.lastFault.message : null,
    };
  }

  private get stopped(): boolean {
    return this.stopController.signal.aborted;
  }

  private async runLoop(): Promise<void> {
    let fire = this.plan(this.now(), this.options.catchUpOnStart ?? false);
    while (!this.stopped) {
      this.status = "waiting";
      this.nextFire = fire.scheduledFor;
      logger.info(
        { date: fire.date, at: fire.scheduledFor.toISOString(), catchUp: fire.catchUp },
        "Waiting for next daily summary",
      );

      if (!(await this.waitUntil(fire.scheduledFor))) break;

      // A scheduled fire queues behind an on-demand run instead of overlapping it.
      while (this.active) await Promise.allSettled([this.active]);
      if (this.stopped) break;

      // Woken on a later local day (host suspend, clock jump): the planned day is gone.
      const today = localDate(this.now(), this.state.timezone);
      if (today !== fire.date) {
        logger.warn({ date: fire.date, today }, "Woke after the scheduled day ended, re-planning for today");
        fire = this.plan(this.now(), true);
        continue;
      }

      if (this.state.lastFiredDate === fire.date) {
        logger.warn({ date: fire.date }, "Already fired for this date, skipping");
      } else {
        await this.fire(fire);
      }
      fire = this.plan(this.now());
    }
    this.nextFire = null;
    this.status = "stopped";
    logger.info("Scheduler stopped");
  }

  /** Resolves false when interrupted by stop(). */
  private async waitUntil(target: Date): Promise<boolean> {
    const signal = this.stopController.signal;
    while (!signal.aborted) {
      const remaining = target.getTime() - this.now().getTime();
      if (remaining <= 0) return true;
      try {
        await this.sleep(Math.min(remaining, MAX_SLEEP_MS), signal);
      } catch (err) {
        if (signal.aborted) return false;
        throw err;
      }
    }
    return false;
  }

  private async fire(fire: FireContext): Promise<void> {
    this.status = "running";
    logger.info({ date: fire.date, catchUp: fire.catchUp }, "Running daily summary");

    try {
      await this.exclusive((signal) => this.options.run(fire, signal));
    } catch (err) {
      this.lastFault = new SchedulerFault(fire.date, { cause: err });
      logger.error({ err: this.lastFault }, "Scheduled run failed");
    } finally {
      this.state.lastFiredDate = fire.date;
      this.status = this.stopped ? "stopped" : "waiting";
    }
  }

  private exclusive<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const active = new Promise<void>((resolve) => {
      release = resolve;
    });
    const settle = () => {
      if (this.active === active) this.active = null;
      release();
    };
    this.active = active;

    // Busy until the task itself settles, even when that is past its deadline.
    return withDeadline(this.runTimeoutMs, (signal) => {
      let running: Promise<T>;
      try {
        running = task(signal);
      } catch (err) {
        settle();
        throw err;
      }
      void running.then(settle, settle);
      return running;
    });
  }
}
