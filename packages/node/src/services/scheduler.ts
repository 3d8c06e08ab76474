/**
 * Scheduler: Interval and daily tasks with an overlap guard and a
 * per-run deadline.
 *
 * - A task never runs twice at once; a tick that finds it running is
 *   skipped
 * - A run that exceeds the deadline is abandoned for that cycle. Its
 *   promise is left to settle on its own and the next tick may start a
 *   fresh run
 * - Task failures are logged, never thrown to the timer
 */

import type { Logger } from "pino";

export type TaskRun = () => Promise<void>;

export type TaskOutcome = "completed" | "failed" | "timed_out" | "skipped";

export interface SchedulerOptions {
  readonly logger: Logger;
  /** Runs longer than this are abandoned for the cycle */
  readonly deadlineMs: number;
  /** IANA time zone of daily tasks. Default: "UTC" */
  readonly timeZone?: string | undefined;
  /** Clock (injectable for tests). Default: () => new Date() */
  readonly now?: (() => Date) | undefined;
}

export type SchedulerErrorCode = "DUPLICATE_TASK" | "UNKNOWN_TASK" | "INVALID_TIME";

export class SchedulerError extends Error {
  public readonly code: SchedulerErrorCode;

  constructor(code: SchedulerErrorCode, message: string) {
    super(message);
    this.name = "SchedulerError";
    this.code = code;
  }
}

interface TaskState {
  readonly name: string;
  readonly run: TaskRun;
  running: boolean;
  timer: NodeJS.Timeout | undefined;
}

/**
 * Milliseconds from `now` until the next local `hour:minute` in the
 * time zone. A time equal to now is scheduled a day later.
 */
export function msUntilLocalTime(now: Date, hour: number, minute: number, timeZone: string): number {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    hourCycle: "h23",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
  }).formatToParts(now);
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value ?? "0");

  const localSeconds = part("hour") * 3600 + part("minute") * 60 + part("second");
  let delta = hour * 3600 + minute * 60 - localSeconds;
  if (delta * 1000 - now.getUTCMilliseconds() <= 0) {
    delta += 24 * 3600;
  }
  return delta * 1000 - now.getUTCMilliseconds();
}

export function parseTimeOfDay(time: string): { readonly hour: number; readonly minute: number } {
  const match = /^([01]\d|2[0-3]):([0-5]\d)$/.exec(time);
  if (match === null) {
    throw new SchedulerError("INVALID_TIME", `Invalid time of day "${time}", expected HH:MM`);
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

export class Scheduler {
  private readonly tasks = new Map<string, TaskState>();
  private readonly logger: Logger;
  private readonly deadlineMs: number;
  private readonly timeZone: string;
  private readonly now: () => Date;
  private stopped = false;

  constructor(options: SchedulerOptions) {
    this.logger = options.logger;
    this.deadlineMs = options.deadlineMs;
    this.timeZone = options.timeZone ?? "UTC";
    this.now = options.now ?? (() => new Date());
  }

  // ─── Registration ──────────────────────────────────────────────────

  /**
   * Run a task every `intervalMs`, starting one interval from now.
   */
  every(name: string, intervalMs: number, run: TaskRun): void {
    const task = this.register(name, run);
    task.timer = setInterval(() => {
      void this.execute(task);
    }, intervalMs);
    this.logger.info({ task: name, intervalMs }, "Interval task scheduled");
  }

  /**
   * Run a task daily at a local "HH:MM".
   */
  dailyAt(name: string, time: string, run: TaskRun): void {
    const { hour, minute } = parseTimeOfDay(time);
    const task = this.register(name, run);
    this.scheduleDaily(task, hour, minute);
  }

  // ─── Control ───────────────────────────────────────────────────────

  /**
   * Run a task now, outside its schedule. The overlap guard applies.
   */
  trigger(name: string): Promise<TaskOutcome> {
    const task = this.tasks.get(name);
    if (task === undefined) {
      return Promise.reject(new SchedulerError("UNKNOWN_TASK", `No task named "${name}"`));
    }
    return this.execute(task);
  }

  taskNames(): readonly string[] {
    return [...this.tasks.keys()];
  }

  stop(): void {
    this.stopped = true;
    for (const task of this.tasks.values()) {
      clearInterval(task.timer);
      clearTimeout(task.timer);
      task.timer = undefined;
    }
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private register(name: string, run: TaskRun): TaskState {
    if (this.tasks.has(name)) {
      throw new SchedulerError("DUPLICATE_TASK", `Task "${name}" is already scheduled`);
    }
    const task: TaskState = { name, run, running: false, timer: undefined };
    this.tasks.set(name, task);
    return task;
  }

  private scheduleDaily(task: TaskState, hour: number, minute: number): void {
    if (this.stopped) {
      return;
    }
    const delayMs = msUntilLocalTime(this.now(), hour, minute, this.timeZone);
    task.timer = setTimeout(() => {
      void this.execute(task).then(() => this.scheduleDaily(task, hour, minute));
    }, delayMs);
    this.logger.info(
      { task: task.name, nextRunAt: new Date(this.now().getTime() + delayMs).toISOString() },
      "Daily task scheduled",
    );
  }

  private async execute(task: TaskState): Promise<TaskOutcome> {
    const log = this.logger.child({ task: task.name });

    if (task.running) {
      log.warn("Previous run still in progress; skipping");
      return "skipped";
    }

    task.running = true;
    const startedAt = Date.now();
    let deadlineTimer: NodeJS.Timeout | undefined;

    const work = task.run().then(
      () => "completed" as const,
      (err: unknown) => {
        log.error({ error: err instanceof Error ? err.message : String(err) }, "Task run failed");
        return "failed" as const;
      },
    );
    const deadline = new Promise<"timed_out">((resolve) => {
      deadlineTimer = setTimeout(() => resolve("timed_out"), this.deadlineMs);
    });

    try {
      const outcome = await Promise.race([work, deadline]);
      if (outcome === "timed_out") {
        log.error({ deadlineMs: this.deadlineMs }, "Task exceeded its deadline; abandoned for this cycle");
        void work.then((late) => {
          log.info({ outcome: late, durationMs: Date.now() - startedAt }, "Abandoned task run settled");
        });
      } else {
        log.debug({ outcome, durationMs: Date.now() - startedAt }, "Task run finished");
      }
      return outcome;
    } finally {
      clearTimeout(deadlineTimer);
      task.running = false;
    }
  }
}
