import { describe, it, expect, vi } from "vitest";
import { SingleFlight } from "../singleflight.js";

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("SingleFlight", () => {
  it("collapses concurrent calls with the same key into one execution", async () => {
    const flights = new SingleFlight<string>();
    const gate = deferred<string>();
    const work = vi.fn(() => gate.promise);

    const calls = Array.from({ length: 5 }, () => flights.run("key", work));
    expect(flights.inFlight).toBe(1);
    gate.resolve("shared");

    await expect(Promise.all(calls)).resolves.toEqual(["shared", "shared", "shared", "shared", "shared"]);
    expect(work).toHaveBeenCalledTimes(1);
    expect(flights.inFlight).toBe(0);
  });

  it("runs different keys independently", async () => {
    const flights = new SingleFlight<string>();
    const work = vi.fn(async () => "value");
    await Promise.all([flights.run("a", work), flights.run("b", work)]);
    expect(work).toHaveBeenCalledTimes(2);
  });

  it("shares failures with every waiter", async () => {
    const flights = new SingleFlight<string>();
    const failure = new Error("boom");
    const work = vi.fn(async () => {
      throw failure;
    });
    const results = await Promise.allSettled([flights.run("key", work), flights.run("key", work)]);
    expect(results).toEqual([
      { status: "rejected", reason: failure },
      { status: "rejected", reason: failure },
    ]);
    expect(work).toHaveBeenCalledTimes(1);
  });

  it("keeps the work running for the others when the first caller abandons", async () => {
    const flights = new SingleFlight<string>();
    const gate = deferred<string>();
    let workSignal: AbortSignal | undefined;
    const work = vi.fn((signal: AbortSignal) => {
      workSignal = signal;
      return gate.promise;
    });

    const leader = new AbortController();
    const first = flights.run("key", work, leader.signal);
    const second = flights.run("key", work);

    leader.abort();
    await expect(first).rejects.toMatchObject({ kind: "Cancelled" });

    gate.resolve("done");
    await expect(second).resolves.toBe("done");
    expect(work).toHaveBeenCalledTimes(1);
    expect(workSignal?.aborted).toBe(false);
  });

  it("aborts the work once every caller has abandoned", async () => {
    const flights = new SingleFlight<string>();
    let workSignal: AbortSignal | undefined;
    const work = vi.fn(
      (signal: AbortSignal) =>
        new Promise<string>((_resolve, reject) => {
          workSignal = signal;
          signal.addEventListener("abort", () => reject(signal.reason));
        }),
    );

    const a = new AbortController();
    const b = new AbortController();
    const first = flights.run("key", work, a.signal);
    const second = flights.run("key", work, b.signal);
    await Promise.resolve();

    a.abort();
    b.abort();
    await expect(first).rejects.toMatchObject({ kind: "Cancelled" });
    await expect(second).rejects.toMatchObject({ kind: "Cancelled" });
    expect(workSignal?.aborted).toBe(true);
    expect(flights.inFlight).toBe(0);
  });

  it("starts a fresh execution after all callers abandoned the previous one", async () => {
    const flights = new SingleFlight<string>();
    let started = 0;
    const work = vi.fn(
      (signal: AbortSignal) =>
        new Promise<string>((resolve, reject) => {
          started++;
          signal.addEventListener("abort", () => reject(signal.reason));
          if (started > 1) resolve("second");
        }),
    );

    const controller = new AbortController();
    const abandoned = flights.run("key", work, controller.signal);
    await Promise.resolve();
    controller.abort();
    await expect(abandoned).rejects.toMatchObject({ kind: "Cancelled" });

    await expect(flights.run("key", work)).resolves.toBe("second");
    expect(work).toHaveBeenCalledTimes(2);
  });

  it("rejects immediately for an already aborted signal", async () => {
    const flights = new SingleFlight<string>();
    const work = vi.fn(async () => "value");
    const controller = new AbortController();
    controller.abort();
    await expect(flights.run("key", work, controller.signal)).rejects.toMatchObject({ kind: "Cancelled" });
    expect(work).not.toHaveBeenCalled();
  });
});
