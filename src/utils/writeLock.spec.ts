import { WriteLock } from "./writeLock";

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("WriteLock", () => {
  it("runs tasks one at a time in submission order", async () => {
    const lock = new WriteLock();
    const events: string[] = [];

    const task = (name: string, ms: number) => async () => {
      events.push(`start ${name}`);
      await delay(ms);
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([
      lock.run(task("a", 20)),
      lock.run(task("b", 5)),
      lock.run(task("c", 0)),
    ]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["start a", "end a", "start b", "end b", "start c", "end c"]);
  });

  it("keeps going after a failed task", async () => {
    const lock = new WriteLock();

    const failed = lock.run(async () => {
      throw new Error("disk full");
    });
    const next = lock.run(async () => "written");

    await expect(failed).rejects.toThrow("disk full");
    await expect(next).resolves.toBe("written");
  });
});
