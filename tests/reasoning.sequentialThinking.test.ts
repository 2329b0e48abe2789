import { beforeEach, describe, it } from "mocha";
import { expect } from "chai";

import { InvalidInputError } from "../src/errors.js";
import { SequentialReasoningEngine } from "../src/reasoning/sessionManager.js";
import {
  InvalidBranchOriginError,
  InvalidRevisionTargetError,
  ThoughtCapacityExceededError,
  ThoughtSession,
  type ThoughtSubmission,
} from "../src/reasoning/thoughtSession.js";
import { expectRejection } from "./helpers/assertions.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function step(thoughtNumber: number, extra: Partial<ThoughtSubmission> = {}): ThoughtSubmission {
  return {
    thought: `step${thoughtNumber}`,
    thoughtNumber,
    totalThoughts: 3,
    nextThoughtNeeded: true,
    ...extra,
  };
}

describe("ThoughtSession", () => {
  let session: ThoughtSession;

  beforeEach(() => {
    session = new ThoughtSession("s", 100, () => 42);
  });

  it("forks a branch whose lineage includes the trunk up to the fork point", () => {
    session.submit(step(1));
    const ack = session.submit(step(2, { thought: "alternative", branchFromThought: 1, branchId: "alt" }));

    expect(ack).to.deep.equal({
      sequenceNumber: 2,
      branchId: "alt",
      moreNeeded: true,
      knownBranches: ["alt"],
      totalThoughts: 3,
      branchComplete: false,
      historyLength: 2,
      renumbered: false,
    });
    expect(session.history("alt").map((node) => node.sequenceNumber)).to.deep.equal([2]);
    expect(session.lineage("alt").map((node) => [node.branchId, node.sequenceNumber])).to.deep.equal([
      [null, 1],
      ["alt", 2],
    ]);
    expect(session.history("alt")[0]?.branchFromThought).to.equal(1);
  });

  it("hides sibling branch nodes and trunk nodes past the fork", () => {
    session.submit(step(1));
    session.submit(step(2, { branchFromThought: 1, branchId: "alt" }));
    session.submit(step(2, { parentBranchId: null, branchId: undefined }));
    session.submit(step(3));

    expect(session.lineage("alt").map((node) => node.thought)).to.deep.equal(["step1", "step2"]);
    expect(session.lineage("alt").map((node) => node.branchId)).to.deep.equal([null, "alt"]);
    expect(session.lineage(null).map((node) => node.sequenceNumber)).to.deep.equal([1, 2, 3]);

    expect(() => session.submit(step(3, { branchId: "other", branchFromThought: 2, parentBranchId: "alt" }))).not.to.throw();
    expect(session.lineage("other").map((node) => [node.branchId, node.sequenceNumber])).to.deep.equal([
      [null, 1],
      ["alt", 2],
      ["other", 3],
    ]);
  });

  it("renumbers thoughts that do not move past the branch tail", () => {
    session.submit(step(1));
    const ack = session.submit(step(1, { thought: "again" }));

    expect(ack.sequenceNumber).to.equal(2);
    expect(ack.renumbered).to.equal(true);
    expect(session.submit(step(7)).sequenceNumber).to.equal(7);
  });

  it("rejects invalid branch origins", () => {
    session.submit(step(1));

    expect(() => session.submit(step(2, { branchId: "alt" }))).to.throw(InvalidBranchOriginError, /required/);
    expect(() => session.submit(step(2, { branchId: "alt", branchFromThought: 9 }))).to.throw(
      InvalidBranchOriginError,
      /thought 9/,
    );
    expect(() => session.submit(step(2, { branchId: "alt", branchFromThought: 1, parentBranchId: "ghost" }))).to.throw(
      InvalidBranchOriginError,
      /unknown parent/,
    );
    expect(session.knownBranches()).to.deep.equal([]);
    expect(session.size).to.equal(1);
  });

  it("validates revision targets against the lineage", () => {
    session.submit(step(1));
    session.submit(step(2, { branchFromThought: 1, branchId: "alt" }));

    expect(() => session.submit(step(3, { branchId: "alt", isRevision: true }))).to.throw(InvalidRevisionTargetError);
    expect(() => session.submit(step(3, { isRevision: true, revisesThought: 2 }))).to.throw(InvalidRevisionTargetError);

    const ack = session.submit(step(3, { branchId: "alt", isRevision: true, revisesThought: 1 }));
    expect(ack.sequenceNumber).to.equal(3);
    const [, revision] = session.history("alt");
    expect(revision?.isRevision).to.equal(true);
    expect(revision?.revisesThought).to.equal(1);
  });

  it("treats a revisesThought without the flag as a revision", () => {
    session.submit(step(1));
    session.submit(step(2, { revisesThought: 1 }));

    expect(session.history(null)[1]?.isRevision).to.equal(true);
  });

  it("completes a branch on its terminal thought and reopens it afterwards", () => {
    session.submit(step(1));
    session.submit(step(2));
    const done = session.submit(step(3, { nextThoughtNeeded: false }));
    expect(done.branchComplete).to.equal(true);
    expect(done.moreNeeded).to.equal(false);

    const reopened = session.submit(step(4, { totalThoughts: 5 }));
    expect(reopened.branchComplete).to.equal(false);
    expect(reopened.totalThoughts).to.equal(5);
    expect(reopened.moreNeeded).to.equal(true);
  });

  it("keeps a branch open while the sequence is below the hint", () => {
    const ack = session.submit(step(1, { nextThoughtNeeded: false }));

    expect(ack.branchComplete).to.equal(false);
    expect(ack.moreNeeded).to.equal(true);
  });

  it("rejects non-positive numbers", () => {
    expect(() => session.submit(step(0))).to.throw(InvalidInputError);
    expect(() => session.submit(step(1, { totalThoughts: 1.5 }))).to.throw(InvalidInputError);
  });
});

describe("SequentialReasoningEngine", () => {
  it("isolates sessions", async () => {
    const engine = new SequentialReasoningEngine();
    await engine.submit("a", step(1));
    await engine.submit("b", step(1));
    await engine.submit("b", step(2, { branchFromThought: 1, branchId: "x" }));

    expect(engine.knownBranches("a")).to.deep.equal([]);
    expect(engine.knownBranches("b")).to.deep.equal(["x"]);
    expect(engine.history("a")).to.have.lengthOf(1);
    expect(engine.lineage("b", "x")).to.have.lengthOf(2);
    expect(engine.history("missing")).to.deep.equal([]);
  });

  it("enforces the per-session thought cap", async () => {
    const engine = new SequentialReasoningEngine({ maxThoughtsPerSession: 2 });
    await engine.submit("a", step(1));
    await engine.submit("a", step(2));

    const error = await expectRejection(engine.submit("a", step(3)));
    expect(error).to.be.instanceOf(ThoughtCapacityExceededError);
    if (error instanceof ThoughtCapacityExceededError) {
      expect(error.resource).to.equal("thoughts");
    }
  });

  it("evicts the least recently used session at the cap", async () => {
    const logger = new RecordingLogger();
    const engine = new SequentialReasoningEngine({ maxSessions: 2, logger });
    await engine.submit("s1", step(1));
    await engine.submit("s2", step(1));
    await engine.submit("s1", step(2));
    await engine.submit("s3", step(1));

    expect(engine.hasSession("s1")).to.equal(true);
    expect(engine.hasSession("s2")).to.equal(false);
    expect(engine.sessionCount()).to.equal(2);
    expect(logger.entries.find((entry) => entry.message === "thought_session_evicted")?.payload).to.deep.equal({
      session: "s2",
      max_sessions: 2,
    });
  });

  it("processes submissions to one session in arrival order", async () => {
    const engine = new SequentialReasoningEngine();
    const acks = await Promise.all([engine.submit("a", step(1)), engine.submit("a", step(1)), engine.submit("a", step(1))]);

    expect(acks.map((ack) => ack.sequenceNumber)).to.deep.equal([1, 2, 3]);
  });

  it("closes and resets sessions", async () => {
    const engine = new SequentialReasoningEngine();
    await engine.submit("a", step(1));
    await engine.submit("b", step(1));

    expect(engine.closeSession("a")).to.equal(true);
    expect(engine.closeSession("a")).to.equal(false);
    engine.reset();
    expect(engine.sessionCount()).to.equal(0);
  });
});
