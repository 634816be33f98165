import { describe, expect, it } from "vitest";
import { ConcurrencyLimiter } from "../src/pipeline/limiter.js";
import { deferred, sleep, type Deferred } from "./helpers.js";

describe("ConcurrencyLimiter", () => {
  it("never runs more than `concurrency` tasks at once", async () => {
    const limiter = new ConcurrencyLimiter(3);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 10 }, (_v, i) =>
        limiter.run(async () => {
          active += 1;
          peak = Math.max(peak, active);
          await sleep(5 + (i % 3) * 5);
          active -= 1;
        })
      )
    );

    expect(peak).toBe(3);
    expect(limiter.activeCount).toBe(0);
    expect(limiter.pendingCount).toBe(0);
  });

  it("starts waiting tasks in FIFO order", async () => {
    const limiter = new ConcurrencyLimiter(1);
    const gates: Deferred[] = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    const all = gates.map((gate, i) =>
      limiter.run(async () => {
        started.push(i);
        await gate.promise;
      })
    );

    await sleep(0);
    expect(started).toEqual([0]);
    expect(limiter.pendingCount).toBe(2);
    gates[0]?.resolve();
    gates[1]?.resolve();
    gates[2]?.resolve();
    await Promise.all(all);
    expect(started).toEqual([0, 1, 2]);
  });

  it("releases the slot when a task throws", async () => {
    const limiter = new ConcurrencyLimiter(1);
    await expect(
      limiter.run(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(limiter.run(async () => "next")).resolves.toBe("next");
  });

  it("clamps concurrency to at least one", () => {
    expect(new ConcurrencyLimiter(0).concurrency).toBe(1);
  });
});
