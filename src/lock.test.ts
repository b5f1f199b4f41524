import { describe, expect, it } from "vitest";
import { SerialLock } from "./lock";
import { RecencyList } from "./lru";

describe("SerialLock", () => {
  it("runs tasks one at a time in call order", async () => {
    const lock = new SerialLock();
    const events: string[] = [];
    const task = (name: string, ms: number) => () =>
      new Promise<string>((resolve) => {
        events.push(`start ${name}`);
        setTimeout(() => {
          events.push(`end ${name}`);
          resolve(name);
        }, ms);
      });

    const results = await Promise.all([lock.run(task("a", 20)), lock.run(task("b", 1))]);
    expect(results).toEqual(["a", "b"]);
    expect(events).toEqual(["start a", "end a", "start b", "end b"]);
    expect(lock.busy).toBe(false);
  });

  it("keeps going after a rejected task", async () => {
    const lock = new SerialLock();
    const failed = lock.run(() => Promise.reject(new Error("boom")));
    const next = lock.run(async () => "ok");
    expect(lock.busy).toBe(true);
    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});

describe("RecencyList", () => {
  it("orders keys by last touch", () => {
    const list = new RecencyList<string>();
    list.touch("a");
    list.touch("b");
    list.touch("c");
    list.touch("a");
    expect(list.oldest()).toBe("b");
    expect(list.keys()).toEqual(["b", "c", "a"]);

    list.delete("b");
    expect(list.oldest()).toBe("c");
    expect(list.keys()).toEqual(["c", "a"]);
    list.clear();
    expect(list.oldest()).toBeUndefined();
  });
});
