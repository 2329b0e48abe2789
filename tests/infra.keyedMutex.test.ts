import { describe, it } from "mocha";
import { expect } from "chai";

import { KeyedMutex } from "../src/infra/keyedMutex.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("serialises tasks sharing a key", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive("a", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive("a", () => {
      order.push("second");
    });

    await Promise.resolve();
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).to.deep.equal(["first:start", "first:end", "second"]);
    expect(mutex.pendingKeys()).to.equal(0);
  });

  it("runs tasks on disjoint keys concurrently", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const blocked = mutex.runExclusive("a", async () => {
      await gate.promise;
      order.push("a");
    });
    await mutex.runExclusive("b", () => {
      order.push("b");
    });
    gate.resolve();
    await blocked;

    expect(order).to.deep.equal(["b", "a"]);
  });

  it("waits for every key of a multi-key task", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const holder = mutex.runExclusive("b", async () => {
      await gate.promise;
      order.push("b");
    });
    const both = mutex.runExclusive(["a", "b"], () => {
      order.push("a+b");
    });
    gate.resolve();
    await Promise.all([holder, both]);

    expect(order).to.deep.equal(["b", "a+b"]);
  });

  it("releases the key when a task throws", async () => {
    const mutex = new KeyedMutex();
    let caught: unknown;
    try {
      await mutex.runExclusive("a", () => {
        throw new Error("boom");
      });
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(Error);
    expect(await mutex.runExclusive("a", () => 42)).to.equal(42);
  });
});
