import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { DispatchFailure, DispatchTimeoutError } from "../src/dispatch/errors.js";
import { NotFoundError } from "../src/errors.js";
import {
  MEMORY_ERROR_CODES,
  normaliseDispatchFailure,
  normaliseToolError,
  toolError,
} from "../src/server/toolErrors.js";
import { ERROR_CODES } from "../src/types.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("tool error envelopes", () => {
  it("maps zod failures to the family's invalid-input code", () => {
    const parsed = z.object({ id: z.string() }).safeParse({ id: 3 });
    if (parsed.success) {
      expect.fail("the payload should be rejected");
    }

    const normalised = normaliseToolError(parsed.error, MEMORY_ERROR_CODES);

    expect(normalised.code).to.equal(ERROR_CODES.MEMORY_INVALID_INPUT);
    expect(normalised.hint).to.equal("invalid_input");
    expect(normalised.details).to.deep.equal({ issues: parsed.error.issues });
  });

  it("uses the default code and truncates long messages for foreign errors", () => {
    const normalised = normaliseToolError(new Error("x".repeat(200)), MEMORY_ERROR_CODES);

    expect(normalised).to.deep.equal({ code: ERROR_CODES.MEMORY_UNEXPECTED, message: `${"x".repeat(159)}…` });
  });

  it("surfaces the server's own error for domain failures", () => {
    const failure = new DispatchFailure({
      server: "memory",
      operation: "deleteMemory",
      attempts: 1,
      lastError: new NotFoundError("memory", "m-1"),
    });

    expect(normaliseDispatchFailure(failure, MEMORY_ERROR_CODES)).to.deep.equal({
      code: ERROR_CODES.MEMORY_NOT_FOUND,
      message: "memory 'm-1' does not exist",
      hint: "search memories to obtain a valid id",
      details: { kind: "memory", identifier: "m-1", server: "memory", operation: "deleteMemory", attempts: 1 },
    });
  });

  it("reports exhausted retries as a dispatch failure", () => {
    const failure = new DispatchFailure({
      server: "remote",
      operation: "searchMemory",
      attempts: 3,
      lastError: new DispatchTimeoutError("remote", "searchMemory", 50),
    });

    const normalised = normaliseDispatchFailure(failure, MEMORY_ERROR_CODES);

    expect(normalised.code).to.equal(ERROR_CODES.DISPATCH_FAILED);
    expect(normalised.message).to.equal(
      "remote.searchMemory failed after 3 attempt(s): remote.searchMemory timed out after 50ms",
    );
    expect(normalised.details).to.deep.equal(failure.details);
  });

  it("reports cancellations with the cancelled code", () => {
    const failure = new DispatchFailure({
      server: "remote",
      operation: "searchMemory",
      attempts: 1,
      lastError: new NotFoundError("memory", "m-1"),
      cancelled: true,
    });

    expect(normaliseDispatchFailure(failure, MEMORY_ERROR_CODES).code).to.equal(ERROR_CODES.DISPATCH_CANCELLED);
  });

  it("wraps the error in a tool result and logs it", () => {
    const logger = new RecordingLogger();
    const response = toolError(logger, "deleteMemory", new NotFoundError("memory", "m-9"), MEMORY_ERROR_CODES);

    expect(response.isError).to.equal(true);
    const [content] = response.content;
    expect(JSON.parse(content?.text ?? "null")).to.deep.equal({
      ok: false,
      error: ERROR_CODES.MEMORY_NOT_FOUND,
      tool: "deleteMemory",
      message: "memory 'm-9' does not exist",
      hint: "search memories to obtain a valid id",
      details: { kind: "memory", identifier: "m-9" },
    });
    expect(logger.messages("error")).to.deep.equal(["deleteMemory_failed"]);
  });
});
