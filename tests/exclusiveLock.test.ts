import { createExclusiveLock } from "../backend/src/services/exclusiveLock";

function deferred(): { promise: Promise<void>; resolve(): void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("exclusiveLock", () => {
  it("Given two queued sections When the first is still running Then the second waits and they finish in FIFO order", async () => {
    const lock = createExclusiveLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.run(async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
      return 1;
    });
    const second = lock.run(() => {
      order.push("second");
      return 2;
    });

    await Promise.resolve();
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    expect(await first).toBe(1);
    expect(await second).toBe(2);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("Given a section that throws When the next section is queued Then the lock is released and the error reaches the caller", async () => {
    const lock = createExclusiveLock();

    const failing = lock.run(() => {
      throw new Error("boom");
    });
    const next = lock.run(() => "after");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("after");
  });
});
