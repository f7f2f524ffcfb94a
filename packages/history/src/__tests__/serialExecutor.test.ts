import { describe, expect, it } from "vitest";
import { SerialExecutor } from "../utils/serialExecutor";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("SerialExecutor", () => {
  it("runs tasks one at a time in submission order", async () => {
    const executor = new SerialExecutor();
    const events: string[] = [];

    const first = executor.run(async () => {
      events.push("first:start");
      await delay(10);
      events.push("first:end");
      return 1;
    });
    const second = executor.run(() => {
      events.push("second");
      return 2;
    });

    expect(executor.size).toBe(2);
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(["first:start", "first:end", "second"]);
    expect(executor.size).toBe(0);
  });

  it("keeps running after a task fails", async () => {
    const executor = new SerialExecutor();
    const failing = executor.run(() => {
      throw new Error("boom");
    });
    const next = executor.run(() => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("drains queued work", async () => {
    const executor = new SerialExecutor();
    let done = false;
    const task = executor.run(async () => {
      await delay(5);
      done = true;
    });

    await executor.drain();
    expect(done).toBe(true);
    await task;
  });
});
