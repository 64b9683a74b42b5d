import { describe, it } from "mocha";
import { expect } from "chai";

import type { AuditOutcome, AuditReport } from "../src/audit/outcome.js";
import { escapeXml, labelFor, outcomeClass, renderGenmon, renderJson, renderStatus } from "../src/render/status.js";

describe("render/status", () => {
  it("maps every outcome to its status label", () => {
    const outcomes: AuditOutcome[] = [
      { kind: "Error", reason: "snapshot-unavailable" },
      { kind: "DeviceNotFound", target: "dac" },
      { kind: "VolumeMismatch", role: "source", nodeId: 3, assessment: { atUnity: false, field: "volume", values: [0.5] } },
      { kind: "AmbiguousSources", count: 3 },
      { kind: "Idle" },
      { kind: "RateMismatch", targetRate: 48_000, sourceRate: 44_100 },
      { kind: "Consistent", rate: 192_000 },
    ];

    expect(outcomes.map((outcome) => `${labelFor(outcome).text}/${labelFor(outcome).color}`)).to.deep.equal([
      "Err/Red",
      "N/A/White",
      "Vol Err/Red",
      "Src Err/Red",
      "Idle/White",
      "Freq Err/Red",
      "192000/White",
    ]);
  });

  it("renders genmon markup with an escaped tooltip", () => {
    const report: AuditReport = {
      outcome: { kind: "Consistent", rate: 48_000 },
      log: ["-> Searching for device: 'a<b>'", "R&D sink found.", ""],
    };

    expect(renderGenmon(report)).to.equal(
      "<txt><span color='White'>48000</span></txt>" +
        "<tool>-&gt; Searching for device: 'a&lt;b&gt;'\nR&amp;D sink found.</tool>",
    );
  });

  it("renders the JSON protocol on a single line", () => {
    const report: AuditReport = { outcome: { kind: "RateMismatch", targetRate: 48_000, sourceRate: 44_100 }, log: ["a", "b"] };

    const line = renderStatus(report, "json");

    expect(line).to.not.include("\n");
    expect(JSON.parse(line)).to.deep.equal({ text: "Freq Err", tooltip: "a\nb", class: "rate-mismatch", alt: "alert" });
    expect(renderJson({ outcome: { kind: "Idle" }, log: [] })).to.equal(
      '{"text":"Idle","tooltip":"","class":"idle","alt":"normal"}',
    );
  });

  it("derives kebab-case classes and escapes XML entities", () => {
    expect(outcomeClass("DeviceNotFound")).to.equal("device-not-found");
    expect(outcomeClass("AmbiguousSources")).to.equal("ambiguous-sources");
    expect(escapeXml("<a & b>")).to.equal("&lt;a &amp; b&gt;");
  });
});
