export type SchedulerResult = 'success' | 'error' | 'pending';

export interface SchedulerStatus {
  taskName: string;
  lastRunAt: Date | null;
  lastResult: SchedulerResult;
  lastError?: string;
  intervalMs: number;
  nextRunAt: Date | null;
  runCount: number;
  lastDurationMs: number | null;
}

/**
 * In-process registry of background jobs, surfaced by the health endpoint. A job that
 * reports a run without registering first is tracked with no interval.
 */
export class SchedulerTracker {
  private readonly schedulers = new Map<string, SchedulerStatus>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  private nextRun(intervalMs: number): Date | null {
    return intervalMs > 0 ? new Date(this.clock().getTime() + intervalMs) : null;
  }

  private ensure(name: string, intervalMs: number): SchedulerStatus {
    let status = this.schedulers.get(name);
    if (!status) {
      status = {
        taskName: name,
        lastRunAt: null,
        lastResult: 'pending',
        intervalMs,
        nextRunAt: this.nextRun(intervalMs),
        runCount: 0,
        lastDurationMs: null,
      };
      this.schedulers.set(name, status);
    }
    return status;
  }

  registerScheduler(name: string, intervalMs: number): void {
    this.schedulers.delete(name);
    this.ensure(name, intervalMs);
  }

  recordRun(name: string, success: boolean, error?: string, durationMs?: number): void {
    const status = this.ensure(name, 0);
    status.lastRunAt = this.clock();
    status.lastResult = success ? 'success' : 'error';
    status.lastError = error;
    status.runCount += 1;
    status.lastDurationMs = durationMs ?? null;
    status.nextRunAt = this.nextRun(status.intervalMs);
  }

  getSchedulerStatuses(): SchedulerStatus[] {
    return Array.from(this.schedulers.values()).sort((a, b) => a.taskName.localeCompare(b.taskName));
  }
}

export const schedulerTracker = new SchedulerTracker();
