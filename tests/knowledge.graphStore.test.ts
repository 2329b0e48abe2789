import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { NotFoundError } from "../src/errors.js";
import { DanglingReferenceError, KnowledgeGraphStore } from "../src/knowledge/graphStore.js";
import { ERROR_CODES } from "../src/types.js";
import { expectRejection } from "./helpers/assertions.js";

describe("KnowledgeGraphStore", () => {
  let graph: KnowledgeGraphStore;

  beforeEach(async () => {
    graph = new KnowledgeGraphStore();
    await graph.createEntities([
      { name: "Ada", entityType: "person", observations: ["writes compilers"] },
      { name: "Compiler", entityType: "project", observations: ["targets wasm"] },
    ]);
  });

  it("unions observations when an entity is created twice", async () => {
    await graph.createEntities([{ name: "Ada", entityType: "engineer", observations: ["likes tea", "writes compilers"] }]);
    const [entity] = await graph.createEntities([{ name: "Ada", entityType: "person", observations: ["reviews code"] }]);

    expect(entity).to.deep.equal({
      name: "Ada",
      entityType: "person",
      observations: ["writes compilers", "likes tea", "reviews code"],
    });
  });

  it("merges repeated names within a single call", async () => {
    const touched = await graph.createEntities([
      { name: "Lin", entityType: "person", observations: ["a"] },
      { name: "Lin", entityType: "robot", observations: ["b", "a"] },
    ]);

    expect(touched).to.deep.equal([{ name: "Lin", entityType: "person", observations: ["a", "b"] }]);
  });

  it("creates relations all-or-nothing", async () => {
    const error = await expectRejection(
      graph.createRelations([
        { from: "Ada", to: "Compiler", relationType: "maintains" },
        { from: "Ada", to: "Ghost", relationType: "knows" },
      ]),
    );

    expect(error).to.be.instanceOf(DanglingReferenceError);
    if (error instanceof DanglingReferenceError) {
      expect(error.missing).to.deep.equal(["Ghost"]);
      expect(error.code).to.equal(ERROR_CODES.GRAPH_DANGLING_REFERENCE);
    }
    expect(graph.readGraph().relations).to.deep.equal([]);
  });

  it("skips relations that already exist", async () => {
    const relation = { from: "Ada", to: "Compiler", relationType: "maintains" };
    expect(await graph.createRelations([relation])).to.deep.equal([relation]);
    expect(await graph.createRelations([relation])).to.deep.equal([]);
    expect(graph.readGraph().relations).to.have.lengthOf(1);
  });

  it("adds observations only when every entity exists", async () => {
    const error = await expectRejection(
      graph.addObservations([
        { entityName: "Ada", contents: ["new fact"] },
        { entityName: "Nobody", contents: ["x"] },
      ]),
    );
    expect(error).to.be.instanceOf(NotFoundError);
    expect(graph.getEntity("Ada")?.observations).to.deep.equal(["writes compilers"]);

    const results = await graph.addObservations([{ entityName: "Ada", contents: ["new fact", "writes compilers"] }]);
    expect(results).to.deep.equal([{ entityName: "Ada", addedObservations: ["new fact"] }]);
  });

  it("cascades entity deletion to relations", async () => {
    await graph.createEntities([{ name: "Bob", entityType: "person" }]);
    await graph.createRelations([
      { from: "Ada", to: "Compiler", relationType: "maintains" },
      { from: "Bob", to: "Ada", relationType: "mentors" },
    ]);

    expect(await graph.deleteEntities(["Ada", "Missing"])).to.deep.equal(["Ada"]);

    const snapshot = graph.readGraph();
    expect(snapshot.entities.map((entity) => entity.name)).to.deep.equal(["Compiler", "Bob"]);
    expect(snapshot.relations).to.deep.equal([]);
  });

  it("deletes observations and relations by exact value", async () => {
    await graph.createRelations([{ from: "Ada", to: "Compiler", relationType: "maintains" }]);

    await graph.deleteObservations([
      { entityName: "Ada", observations: ["writes compilers", "not present"] },
      { entityName: "Nobody", observations: ["x"] },
    ]);
    expect(graph.getEntity("Ada")?.observations).to.deep.equal([]);

    expect(
      await graph.deleteRelations([
        { from: "Ada", to: "Compiler", relationType: "maintains" },
        { from: "Ada", to: "Compiler", relationType: "owns" },
      ]),
    ).to.equal(1);
  });

  it("searches names, types and observations case-insensitively", async () => {
    await graph.createEntities([{ name: "Wasm Runtime", entityType: "project" }]);
    await graph.createRelations([
      { from: "Compiler", to: "Wasm Runtime", relationType: "emits_for" },
      { from: "Ada", to: "Compiler", relationType: "maintains" },
    ]);

    const result = graph.searchNodes("WASM");

    expect(result.entities.map((entity) => entity.name)).to.deep.equal(["Compiler", "Wasm Runtime"]);
    expect(result.relations).to.deep.equal([{ from: "Compiler", to: "Wasm Runtime", relationType: "emits_for" }]);
    expect(graph.searchNodes("PERSON").entities.map((entity) => entity.name)).to.deep.equal(["Ada"]);
  });

  it("opens nodes by name and skips unknown names", async () => {
    await graph.createRelations([{ from: "Ada", to: "Compiler", relationType: "maintains" }]);

    const opened = graph.openNodes(["Ada", "Ada", "Unknown"]);

    expect(opened.entities.map((entity) => entity.name)).to.deep.equal(["Ada"]);
    expect(opened.relations).to.deep.equal([]);
  });

  it("returns snapshots unaffected by later writes", async () => {
    const before = graph.readGraph();
    await graph.addObservations([{ entityName: "Ada", contents: ["later"] }]);
    await graph.deleteEntities(["Compiler"]);

    expect(before.entities.map((entity) => entity.name)).to.deep.equal(["Ada", "Compiler"]);
    expect(before.entities[0]?.observations).to.deep.equal(["writes compilers"]);
    expect(Object.isFrozen(before.entities)).to.equal(true);
  });

  describe("persistence", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), "conductor-graph-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("reloads entities and relations", async () => {
      const snapshotPath = path.join(dir, "graph.json");
      const writer = new KnowledgeGraphStore({ snapshotPath });
      await writer.createEntities([
        { name: "A", entityType: "t", observations: ["o"] },
        { name: "B", entityType: "t" },
      ]);
      await writer.createRelations([{ from: "A", to: "B", relationType: "r" }]);

      const reader = new KnowledgeGraphStore({ snapshotPath });
      await reader.load();

      expect(reader.readGraph()).to.deep.equal(writer.readGraph());
    });

    it("rolls back writes whose snapshot cannot be saved", async () => {
      const snapshotDir = path.join(dir, "state");
      const writer = new KnowledgeGraphStore({ snapshotPath: path.join(snapshotDir, "graph.json") });
      await writer.createEntities([
        { name: "A", entityType: "t", observations: ["o"] },
        { name: "B", entityType: "t" },
      ]);
      await writer.createRelations([{ from: "A", to: "B", relationType: "r" }]);
      const before = writer.readGraph();

      await rm(snapshotDir, { recursive: true, force: true });
      await writeFile(snapshotDir, "blocked", "utf8");

      await expectRejection(writer.createEntities([{ name: "C", entityType: "t" }]));
      await expectRejection(writer.createRelations([{ from: "B", to: "A", relationType: "r" }]));
      await expectRejection(writer.addObservations([{ entityName: "A", contents: ["p"] }]));
      await expectRejection(writer.deleteObservations([{ entityName: "A", observations: ["o"] }]));
      await expectRejection(writer.deleteRelations([{ from: "A", to: "B", relationType: "r" }]));
      await expectRejection(writer.deleteEntities(["A"]));

      expect(writer.readGraph()).to.deep.equal(before);
    });
  });
});
