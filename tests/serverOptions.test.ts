import { describe, it } from "mocha";
import { expect } from "chai";

import { parseConductorCliOptions } from "../src/serverOptions.js";

describe("command line options", () => {
  it("parses separate and inline values", () => {
    expect(
      parseConductorCliOptions(["--config", "servers.yaml", "--data-dir=./data", "--log-level", "DEBUG", "--no-local-servers"]),
    ).to.deep.equal({
      configPath: "servers.yaml",
      dataDir: "./data",
      logLevel: "debug",
      localServers: false,
    });
  });

  it("ignores positional arguments", () => {
    expect(parseConductorCliOptions(["serve", "--log-file", "/tmp/conductor.log"])).to.deep.equal({
      logFile: "/tmp/conductor.log",
    });
  });

  it("rejects unknown flags", () => {
    expect(() => parseConductorCliOptions(["--confg", "x"])).to.throw("unknown flag --confg");
  });

  it("rejects flags missing their value", () => {
    expect(() => parseConductorCliOptions(["--config"])).to.throw("flag --config requires a value");
    expect(() => parseConductorCliOptions(["--data-dir", "--no-local-servers"])).to.throw(
      "flag --data-dir requires a value",
    );
  });

  it("rejects unknown log levels", () => {
    expect(() => parseConductorCliOptions(["--log-level=trace"])).to.throw(
      "flag --log-level expects one of debug, info, warn, error",
    );
  });
});
