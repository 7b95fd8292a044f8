/**
 * Tests for CLI dispatch and exit codes
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { runCli } from "./dispatcher.js";

describe("CLI Dispatcher", () => {
  it("should exit with 0 for version", async () => {
    expect(await runCli(["--version"])).to.equal(0);
  });

  it("should exit with 2 for an unknown command", async () => {
    expect(await runCli(["frobnicate"])).to.equal(2);
  });

  it("should exit with 0 when a name resolves", async () => {
    expect(await runCli(["name", "Pair", "--owner", "com.acme", "-q"])).to.equal(0);
  });

  it("should exit with 1 when the name command has no type", async () => {
    expect(await runCli(["name"])).to.equal(1);
  });

  it("should exit with 1 for a config file that does not exist", async () => {
    expect(
      await runCli(["resolve", "--config", "/nonexistent/recname.json"])
    ).to.equal(1);
  });
});
