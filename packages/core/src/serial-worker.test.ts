import { describe, it, expect } from "vitest";
import { SerialWorker } from "./serial-worker.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("SerialWorker", () => {
  it("runs tasks one at a time in submission order", async () => {
    const worker = new SerialWorker();
    const started: number[] = [];
    const finished: number[] = [];
    let inFlight = 0;
    let maxInFlight = 0;

    const results = [0, 1, 2, 3].map((i) =>
      worker.submit(async () => {
        started.push(i);
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        // Earlier tasks sleep longer, so any overlap would reorder completion.
        await delay(8 - i * 2);
        inFlight--;
        finished.push(i);
        return i * 10;
      }),
    );

    expect(await Promise.all(results)).toEqual([0, 10, 20, 30]);
    expect(started).toEqual([0, 1, 2, 3]);
    expect(finished).toEqual([0, 1, 2, 3]);
    expect(maxInFlight).toBe(1);
  });

  it("accepts submissions without waiting for earlier tasks", () => {
    const worker = new SerialWorker();

    void worker.submit(() => delay(5));
    void worker.submit(() => delay(5));
    void worker.submit(() => delay(5));

    expect(worker.pending).toBe(true);
    expect(worker.size).toBe(2);
  });

  it("rejects only the failing task's promise", async () => {
    const worker = new SerialWorker();

    const failing = worker.submit(async () => {
      throw new Error("task failed");
    });
    const following = worker.submit(async () => "still runs");

    await expect(failing).rejects.toThrow("task failed");
    await expect(following).resolves.toBe("still runs");
  });

  it("onIdle resolves immediately when nothing is queued", async () => {
    const worker = new SerialWorker();
    await expect(worker.onIdle()).resolves.toBeUndefined();
    expect(worker.pending).toBe(false);
  });

  it("onIdle resolves after the queue drains", async () => {
    const worker = new SerialWorker();
    const done: string[] = [];

    void worker.submit(async () => {
      await delay(2);
      done.push("a");
    });
    void worker.submit(async () => {
      await delay(1);
      done.push("b");
    });

    await worker.onIdle();

    expect(done).toEqual(["a", "b"]);
    expect(worker.size).toBe(0);
    expect(worker.pending).toBe(false);
  });
});
