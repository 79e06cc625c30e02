/**
 * In-memory tracking for background merge jobs. Every change replaces the
 * job's snapshot; listeners receive the new snapshot.
 */

import type { MergeProgress, MergeResult, MergeWarning } from "./types";

export type JobStatus = "pending" | "running" | "completed" | "error" | "cancelled";

export interface JobFailure {
  code: string;
  message: string;
  warnings: MergeWarning[];
}

export interface JobProgress {
  readonly id: string;
  readonly status: JobStatus;
  readonly percent: number; // 0-100
  readonly progress?: MergeProgress;
  readonly message?: string;
  readonly result?: MergeResult;
  readonly error?: JobFailure;
  readonly updatedAt: number;
}

export type JobUpdate = Partial<Omit<JobProgress, "id" | "updatedAt">>;
export type JobListener = (job: JobProgress) => void;

// Jobs untouched for this long are forgotten
export const JOB_TTL_MS = 5 * 60 * 1000;

export function isTerminal(status: JobStatus): boolean {
  return status === "completed" || status === "error" || status === "cancelled";
}

export function percentOf(progress: MergeProgress): number {
  if (progress.phase === "done") return 100;
  if (progress.totalEntries === 0) return 0;
  return Math.min(99, Math.floor((progress.entriesWritten / progress.totalEntries) * 100));
}

export class JobStore {
  private readonly snapshots = new Map<string, JobProgress>();
  private readonly listeners = new Map<string, Set<JobListener>>();

  constructor(private readonly ttlMs = JOB_TTL_MS) {}

  create(id: string): JobProgress {
    const job: JobProgress = Object.freeze({ id, status: "pending", percent: 0, updatedAt: Date.now() });
    this.snapshots.set(id, job);
    return job;
  }

  update(id: string, update: JobUpdate): JobProgress | null {
    const previous = this.snapshots.get(id);
    if (!previous) return null;

    const next: JobProgress = Object.freeze({ ...previous, ...update, updatedAt: Date.now() });
    this.snapshots.set(id, next);
    this.listeners.get(id)?.forEach((listener) => listener(next));
    return next;
  }

  get(id: string, now = Date.now()): JobProgress | null {
    const job = this.snapshots.get(id);
    if (!job) return null;
    if (this.isExpired(job, now)) {
      this.forget(id);
      return null;
    }
    return job;
  }

  /** Register a listener; the returned function removes it again. */
  subscribe(id: string, listener: JobListener): () => void {
    const set = this.listeners.get(id) ?? new Set<JobListener>();
    set.add(listener);
    this.listeners.set(id, set);

    return () => {
      set.delete(listener);
      if (set.size === 0 && this.listeners.get(id) === set) this.listeners.delete(id);
    };
  }

  sweep(now = Date.now()): number {
    let removed = 0;
    for (const job of [...this.snapshots.values()]) {
      if (this.isExpired(job, now)) {
        this.forget(job.id);
        removed++;
      }
    }
    return removed;
  }

  private isExpired(job: JobProgress, now: number): boolean {
    return now - job.updatedAt > this.ttlMs;
  }

  private forget(id: string): void {
    this.snapshots.delete(id);
    this.listeners.delete(id);
  }
}

export const jobStore = new JobStore();

// Sweep once a minute without keeping the process alive
setInterval(() => jobStore.sweep(), 60 * 1000).unref();
