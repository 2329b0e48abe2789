import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { InvalidInputError, NotFoundError } from "../src/errors.js";
import { MemoryStore, normaliseTag, normaliseTags, queryTerms } from "../src/memory/store.js";
import { expectRejection } from "./helpers/assertions.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("MemoryStore", () => {
  let clock: number;
  let store: MemoryStore;
  let logger: RecordingLogger;

  function buildStore(snapshotPath?: string): MemoryStore {
    let sequence = 0;
    return new MemoryStore({
      snapshotPath,
      now: () => clock,
      idFactory: () => `mem-${++sequence}`,
      logger,
    });
  }

  beforeEach(() => {
    clock = 1_000;
    logger = new RecordingLogger();
    store = buildStore();
  });

  function titles(records: Iterable<{ title: string }>): string[] {
    return Array.from(records, (record) => record.title);
  }

  it("ranks a tagged record first for a matching query", async () => {
    const preferences = await store.create({
      title: "User Preferences",
      content: "prefers TypeScript",
      tags: ["preferences", "tech_stack"],
      corpusNames: ["user/project"],
      userTriggered: false,
    });
    clock += 1;
    await store.create({ title: "Deploy notes", content: "run the smoke tests", tags: ["ops"] });

    const hits = Array.from(store.search("preferences"));

    expect(hits.map((record) => record.id)).to.deep.equal([preferences.id]);
    expect(hits[0]).to.deep.equal({
      id: "mem-1",
      title: "User Preferences",
      content: "prefers TypeScript",
      tags: ["preferences", "tech_stack"],
      corpusNames: ["user/project"],
      createdAt: 1_000,
      updatedAt: 1_000,
      userTriggered: false,
    });
  });

  it("orders by tag overlap, then text matches, then recency", async () => {
    await store.create({ title: "Build cache", content: "cache misses on cache warmup", tags: ["perf"] });
    clock += 1;
    await store.create({ title: "Cache policy", content: "evict", tags: ["cache", "perf"] });
    clock += 1;
    await store.create({ title: "Notes", content: "one cache mention" });
    clock += 1;
    await store.create({ title: "Unrelated", content: "nothing to see" });

    expect(titles(store.search("cache"))).to.deep.equal(["Cache policy", "Build cache", "Notes"]);
    expect(titles(store.search("", ["PERF"]))).to.deep.equal(["Cache policy", "Build cache"]);
  });

  it("breaks ties by the most recent update", async () => {
    const older = await store.create({ title: "first", content: "shared topic" });
    clock += 1;
    await store.create({ title: "second", content: "shared topic" });

    expect(titles(store.search("topic"))).to.deep.equal(["second", "first"]);

    clock += 1;
    await store.update(older.id, { content: "shared topic revised" });
    expect(titles(store.search("topic"))).to.deep.equal(["first", "second"]);
  });

  it("lists everything for an empty query and applies corpus and limit", async () => {
    await store.create({ title: "a", content: "x", corpusNames: ["team/alpha"] });
    clock += 1;
    await store.create({ title: "b", content: "y", corpusNames: ["team/beta"] });
    clock += 1;
    await store.create({ title: "c", content: "z", corpusNames: ["team/alpha", "team/beta"] });

    expect(titles(store.search(""))).to.deep.equal(["c", "b", "a"]);
    expect(titles(store.search("", undefined, { corpus: "team/alpha" }))).to.deep.equal(["c", "a"]);
    expect(titles(store.search("", undefined, { limit: 1 }))).to.deep.equal(["c"]);
  });

  it("keeps iterating over the records captured at search time", async () => {
    const record = await store.create({ title: "volatile", content: "soon gone" });
    const results = store.search("volatile");

    await store.delete(record.id);

    expect(titles(results)).to.deep.equal(["volatile"]);
    expect(titles(results)).to.deep.equal(["volatile"]);
    expect(titles(store.search("volatile"))).to.deep.equal([]);
  });

  it("updates only the fields present in the patch", async () => {
    const record = await store.create({ title: "draft", content: "body", tags: ["a"], userTriggered: true });
    clock = 2_000;

    const updated = await store.update(record.id, { title: "final", tags: ["New Tag"] });

    expect(updated).to.deep.equal({
      ...record,
      title: "final",
      tags: ["new_tag"],
      updatedAt: 2_000,
    });
    expect(await expectRejection(store.update("mem-404", { title: "x" }))).to.be.instanceOf(NotFoundError);
  });

  it("applies concurrent updates in call order", async () => {
    const record = await store.create({ title: "race", content: "initial" });

    await Promise.all([
      store.update(record.id, { content: "first writer" }),
      store.update(record.id, { content: "second writer" }),
    ]);

    expect(store.get(record.id)?.content).to.equal("second writer");
  });

  it("merges into the earlier record and removes the later one", async () => {
    const first = await store.create({ title: "Editor", content: "uses vim", tags: ["tools"], corpusNames: ["user"] });
    clock += 1;
    const second = await store.create({
      title: "Editor again",
      content: "uses neovim",
      tags: ["tools", "editor"],
      corpusNames: ["project"],
      userTriggered: true,
    });
    clock = 5_000;

    const merged = await store.merge(second.id, first.id);

    expect(merged).to.deep.equal({
      id: first.id,
      title: "Editor",
      content: "uses vim\n\n--- merged from mem-2 (Editor again) ---\nuses neovim",
      tags: ["tools", "editor"],
      corpusNames: ["user", "project"],
      createdAt: 1_000,
      updatedAt: 5_000,
      userTriggered: true,
    });
    expect(store.get(second.id)).to.equal(undefined);
    expect(store.size()).to.equal(1);
  });

  it("rejects merging a record with itself or with an unknown record", async () => {
    const record = await store.create({ title: "solo", content: "alone" });

    expect(await expectRejection(store.merge(record.id, record.id))).to.be.instanceOf(InvalidInputError);
    expect(await expectRejection(store.merge(record.id, "mem-404"))).to.be.instanceOf(NotFoundError);
    expect(store.get(record.id)?.content).to.equal("alone");
  });

  it("deletes idempotently", async () => {
    const record = await store.create({ title: "temp", content: "x" });

    expect(await store.delete(record.id)).to.equal(true);
    expect(await store.delete(record.id)).to.equal(false);
    expect(logger.messages("info").filter((message) => message === "memory_deleted")).to.have.lengthOf(1);
  });

  describe("persistence", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), "conductor-memory-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("restores records and their ordering from the snapshot", async () => {
      const snapshotPath = path.join(dir, "memory.json");
      const writer = buildStore(snapshotPath);
      await writer.create({ title: "kept", content: "one", tags: ["x"] });
      await writer.create({ title: "also kept", content: "two", tags: ["x"] });

      const reader = buildStore(snapshotPath);
      expect(await reader.load()).to.equal(2);
      expect(reader.list()).to.deep.equal(writer.list());
      expect(titles(reader.search("", ["x"]))).to.deep.equal(["also kept", "kept"]);
    });

    it("leaves the records untouched when the snapshot cannot be written", async () => {
      const snapshotDir = path.join(dir, "state");
      const snapshotPath = path.join(snapshotDir, "memory.json");
      const writer = buildStore(snapshotPath);
      const kept = await writer.create({ title: "kept", content: "one", tags: ["x"] });

      // A regular file where the snapshot directory should be makes every later save fail.
      await rm(snapshotDir, { recursive: true, force: true });
      await writeFile(snapshotDir, "blocked", "utf8");

      await expectRejection(writer.create({ title: "lost", content: "two" }));
      await expectRejection(writer.update(kept.id, { title: "renamed" }));
      await expectRejection(writer.delete(kept.id));

      expect(writer.size()).to.equal(1);
      expect(writer.get(kept.id)).to.deep.equal(kept);
      expect(logger.messages("error")).to.deep.equal([
        "memory_persist_failed",
        "memory_persist_failed",
        "memory_persist_failed",
      ]);
    });
  });
});

describe("memory tag helpers", () => {
  it("normalises tags to lowercase underscore form", () => {
    expect(normaliseTag("  Tech-Stack ")).to.equal("tech_stack");
    expect(normaliseTag("multi  word - tag")).to.equal("multi_word_tag");
    expect(normaliseTags(["A", "a", " ", "b-c"])).to.deep.equal(["a", "b_c"]);
  });

  it("extracts distinct lowercase query terms", () => {
    expect(queryTerms("  Cache cache  WARMUP ")).to.deep.equal(["cache", "warmup"]);
    expect(queryTerms("   ")).to.deep.equal([]);
  });
});
