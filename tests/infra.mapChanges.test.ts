import { describe, it } from "mocha";
import { expect } from "chai";

import { applyMapChanges } from "../src/infra/mapChanges.js";

interface Item {
  n: number;
}

function mapOf(...entries: Array<[string, number]>): Map<string, Item> {
  return new Map(entries.map(([key, n]) => [key, { n }]));
}

function dump(map: Map<string, Item>): Array<[string, number]> {
  return Array.from(map, ([key, item]) => [key, item.n]);
}

describe("applyMapChanges", () => {
  it("sets and deletes keys", () => {
    const map = mapOf(["a", 1], ["b", 2]);
    applyMapChanges(map, [
      ["a", null],
      ["c", { n: 3 }],
    ]);
    expect(dump(map)).to.deep.equal([
      ["b", 2],
      ["c", 3],
    ]);
  });

  it("restores values and iteration order on undo", () => {
    const map = mapOf(["a", 1], ["b", 2], ["c", 3]);
    const undo = applyMapChanges(map, [
      ["a", null],
      ["b", { n: 20 }],
      ["d", { n: 4 }],
      ["b", null],
    ]);
    undo();
    expect(dump(map)).to.deep.equal([
      ["a", 1],
      ["b", 2],
      ["c", 3],
    ]);
  });

  it("keeps keys written by others before the undo", () => {
    const map = mapOf(["a", 1], ["b", 2]);
    const undo = applyMapChanges(map, [["a", { n: 10 }]]);
    map.set("b", { n: 22 });
    map.set("e", { n: 5 });
    undo();
    expect(dump(map)).to.deep.equal([
      ["a", 1],
      ["b", 22],
      ["e", 5],
    ]);
  });
});
