/**
 * Job Store
 * Tracks background download jobs: queued -> running -> completed | failed
 */

import ShortUniqueId from "short-unique-id";
import type { ProgressEvent } from "../types";

export type JobState = "queued" | "running" | "completed" | "failed";

export interface Job {
  id: string;
  target: string;
  state: JobState;
  progress: number; // 0..1
  currentItem?: string;
  error?: string;
  createdAt: Date;
  finishedAt?: Date;
}

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  queued: ["running", "failed"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
};

export class JobStore {
  private readonly jobs = new Map<string, Job>();
  private readonly uid = new ShortUniqueId({
    length: 8,
    dictionary: "alphanum_lower",
  });

  create(target: string): Job {
    const job: Job = {
      id: this.nextId(),
      target,
      state: "queued",
      progress: 0,
      createdAt: new Date(),
    };
    this.jobs.set(job.id, job);
    return job;
  }

  get(id: string): Job | undefined {
    return this.jobs.get(id);
  }

  list(): Job[] {
    return [...this.jobs.values()];
  }

  start(id: string): Job {
    return this.transition(id, "running");
  }

  complete(id: string): Job {
    const job = this.transition(id, "completed");
    job.progress = 1;
    job.currentItem = undefined;
    return job;
  }

  fail(id: string, error: string): Job {
    const job = this.transition(id, "failed");
    job.error = error;
    return job;
  }

  /**
   * Apply a pipeline progress event to a running job
   */
  report(id: string, event: ProgressEvent): Job {
    const job = this.require(id);
    if (job.state !== "running") {
      throw new Error(`Job ${id} is ${job.state}, cannot report progress`);
    }
    job.currentItem = event.item;
    if (event.total > 0) {
      job.progress = Math.min(event.current / event.total, 1);
    }
    return job;
  }

  private nextId(): string {
    let id: string;
    do {
      id = this.uid.rnd();
    } while (this.jobs.has(id));
    return id;
  }

  private transition(id: string, next: JobState): Job {
    const job = this.require(id);
    if (!TRANSITIONS[job.state].includes(next)) {
      throw new Error(`Invalid job transition: ${job.state} -> ${next}`);
    }
    job.state = next;
    if (next === "completed" || next === "failed") {
      job.finishedAt = new Date();
    }
    return job;
  }

  private require(id: string): Job {
    const job = this.jobs.get(id);
    if (!job) {
      throw new Error(`Unknown job: ${id}`);
    }
    return job;
  }
}
