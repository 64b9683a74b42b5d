import { describe, it } from "mocha";
import { expect } from "chai";

import { parseIntLiteral, readBool, readEnum, readInt, readOptionalString } from "../../src/config/env.js";
import { DEFAULT_DUMP_TIMEOUT_MS, loadAuditSettings } from "../../src/config/settings.js";

describe("config/env", () => {
  it("parses boolean literals and falls back on unknown values", () => {
    expect(readBool("FLAG", false, { FLAG: " Yes " })).to.equal(true);
    expect(readBool("FLAG", true, { FLAG: "off" })).to.equal(false);
    expect(readBool("FLAG", true, { FLAG: "maybe" })).to.equal(true);
    expect(readBool("FLAG", false, {})).to.equal(false);
  });

  it("parses bounded integers", () => {
    expect(parseIntLiteral("250", { min: 100 })).to.equal(250);
    expect(parseIntLiteral("99", { min: 100 })).to.equal(undefined);
    expect(parseIntLiteral("12.5")).to.equal(undefined);
    expect(parseIntLiteral("99999999999999999999")).to.equal(undefined);
    expect(readInt("N", 7, undefined, { N: "abc" })).to.equal(7);
  });

  it("treats blank strings as unset and matches enums case-insensitively", () => {
    expect(readOptionalString("S", { S: "   " })).to.equal(undefined);
    expect(readEnum("E", ["genmon", "json"] as const, "genmon", { E: "JSON" })).to.equal("json");
    expect(readEnum("E", ["genmon", "json"] as const, "genmon", { E: "xml" })).to.equal("genmon");
  });
});

describe("config/settings", () => {
  it("uses defaults when nothing is configured", () => {
    expect(loadAuditSettings({})).to.deep.equal({
      dumpCommand: "pw-dump",
      timeoutMs: DEFAULT_DUMP_TIMEOUT_MS,
      format: "genmon",
      logLevel: "info",
      logFile: null,
      logToStderr: true,
    });
  });

  it("reads PW_AUDIT_* overrides", () => {
    const settings = loadAuditSettings({
      PW_AUDIT_DUMP_COMMAND: "/usr/local/bin/pw-dump",
      PW_AUDIT_TIMEOUT_MS: "2500",
      PW_AUDIT_FORMAT: "json",
      PW_AUDIT_LOG_LEVEL: "DEBUG",
      PW_AUDIT_LOG_FILE: "/tmp/pw-audit.log",
      PW_AUDIT_LOG_STDERR: "no",
    });

    expect(settings).to.deep.equal({
      dumpCommand: "/usr/local/bin/pw-dump",
      timeoutMs: 2_500,
      format: "json",
      logLevel: "debug",
      logFile: "/tmp/pw-audit.log",
      logToStderr: false,
    });
  });

  it("ignores out-of-range timeouts", () => {
    expect(loadAuditSettings({ PW_AUDIT_TIMEOUT_MS: "5" }).timeoutMs).to.equal(DEFAULT_DUMP_TIMEOUT_MS);
  });
});
