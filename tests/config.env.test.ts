import { describe, it } from "mocha";
import { expect } from "chai";

import { readBool, readConductorEnv, readEnum, readOptionalInt } from "../src/config/env.js";

describe("environment helpers", () => {
  it("coerces booleans and falls back on unknown literals", () => {
    expect(readBool("FLAG", false, { FLAG: " Yes " })).to.equal(true);
    expect(readBool("FLAG", true, { FLAG: "off" })).to.equal(false);
    expect(readBool("FLAG", true, { FLAG: "maybe" })).to.equal(true);
    expect(readBool("FLAG", false, {})).to.equal(false);
  });

  it("accepts base-10 integers within bounds only", () => {
    expect(readOptionalInt("N", { min: 1 }, { N: "42" })).to.equal(42);
    expect(readOptionalInt("N", { min: 1 }, { N: "0" })).to.equal(undefined);
    expect(readOptionalInt("N", undefined, { N: "1.5" })).to.equal(undefined);
    expect(readOptionalInt("N", undefined, { N: "0x10" })).to.equal(undefined);
  });

  it("matches enums case-insensitively", () => {
    expect(readEnum("LEVEL", ["debug", "info"] as const, "info", { LEVEL: "DEBUG" })).to.equal("debug");
    expect(readEnum("LEVEL", ["debug", "info"] as const, "info", { LEVEL: "trace" })).to.equal("info");
  });

  it("reads the conductor settings", () => {
    const settings = readConductorEnv({
      CONDUCTOR_CONFIG: "./servers.yaml",
      CONDUCTOR_DATA_DIR: " ",
      CONDUCTOR_LOG_LEVEL: "warn",
      CONDUCTOR_LOCAL_SERVERS: "false",
      CONDUCTOR_DISPATCH_MAX_ATTEMPTS: "5",
      CONDUCTOR_DISPATCH_BASE_DELAY_MS: "-1",
      CONDUCTOR_DISPATCH_PROBE_INTERVAL_MS: "1000",
    });

    expect(settings).to.deep.equal({
      configPath: "./servers.yaml",
      dataDir: undefined,
      logFile: undefined,
      logLevel: "warn",
      localServers: false,
      dispatch: { maxAttempts: 5, probeIntervalMs: 1000 },
    });
  });

  it("uses defaults for an empty environment", () => {
    const settings = readConductorEnv({});

    expect(settings.logLevel).to.equal("info");
    expect(settings.localServers).to.equal(true);
    expect(settings.dispatch).to.deep.equal({});
  });
});
