import { describe, it, expect } from "vitest";
import { JobStore } from "./job-store";

describe("JobStore", () => {
  it("creates queued jobs with unique IDs", () => {
    const store = new JobStore();
    const first = store.create("path learn.a");
    const second = store.create("path learn.b");

    expect(first.state).toBe("queued");
    expect(first.progress).toBe(0);
    expect(first.id).not.toBe(second.id);
    expect(store.list().map((job) => job.target)).toEqual([
      "path learn.a",
      "path learn.b",
    ]);
  });

  it("runs a job to completion with progress", () => {
    const store = new JobStore();
    const { id } = store.create("module learn.m");

    store.start(id);
    const running = store.report(id, {
      stage: "units",
      current: 1,
      total: 4,
      item: "Introduction",
    });
    expect(running.progress).toBe(0.25);
    expect(running.currentItem).toBe("Introduction");

    const done = store.complete(id);
    expect(done.state).toBe("completed");
    expect(done.progress).toBe(1);
    expect(done.currentItem).toBe(undefined);
    expect(done.finishedAt).toBeInstanceOf(Date);
  });

  it("records the error of a failed job", () => {
    const store = new JobStore();
    const { id } = store.create("course c");
    store.start(id);

    const failed = store.fail(id, "Not found in catalog: c");
    expect(failed.state).toBe("failed");
    expect(failed.error).toBe("Not found in catalog: c");
  });

  it("rejects invalid transitions", () => {
    const store = new JobStore();
    const { id } = store.create("path learn.a");

    expect(() => store.complete(id)).toThrow(
      "Invalid job transition: queued -> completed",
    );
    store.start(id);
    store.complete(id);
    expect(() => store.start(id)).toThrow(
      "Invalid job transition: completed -> running",
    );
  });

  it("rejects progress reports on jobs that are not running", () => {
    const store = new JobStore();
    const { id } = store.create("path learn.a");
    expect(() =>
      store.report(id, { stage: "catalog", current: 1, total: 2 }),
    ).toThrow(`Job ${id} is queued, cannot report progress`);
  });

  it("throws on unknown jobs", () => {
    expect(() => new JobStore().start("missing")).toThrow("Unknown job: missing");
  });
});
