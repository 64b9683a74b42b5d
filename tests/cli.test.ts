import { fileURLToPath } from "node:url";

import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { __testing, main } from "../src/cli.js";
import type { CommandRunner } from "../src/gateways/commandRunner.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

const { parseArgs } = __testing;

const FIXTURE_PATH = fileURLToPath(new URL("./fixtures/usb-dac-playback.json", import.meta.url));

function captureStream() {
  const chunks: string[] = [];
  return { chunks, stream: { write: (chunk: string) => chunks.push(chunk) } };
}

describe("cli", () => {
  describe("parseArgs", () => {
    it("accepts the device name with optional flags", () => {
      expect(parseArgs(["Topping", "--format", "json", "--dump-file", "g.json", "--timeout-ms", "900"])).to.deep.equal({
        target: "Topping",
        format: "json",
        dumpFile: "g.json",
        timeoutMs: 900,
      });
    });

    it("omits flags that were not supplied", () => {
      const options = parseArgs(["Topping"]);
      expect(Object.hasOwn(options, "format")).to.equal(false);
      expect(Object.hasOwn(options, "timeoutMs")).to.equal(false);
    });

    it("rejects malformed command lines", () => {
      const attempts = [[], ["a", "b"], [""], ["a", "--format", "xml"], ["a", "--timeout-ms", "1"], ["a", "--verbose"]];
      for (const argv of attempts) {
        expect(() => parseArgs(argv), argv.join(" ")).to.throw(Error);
      }
    });
  });

  describe("main", () => {
    it("prints usage and returns 1 on a wrong argument count", async () => {
      const stdout = captureStream();
      const stderr = captureStream();

      const code = await main([], { stdout: stdout.stream, stderr: stderr.stream, env: {} });

      expect(code).to.equal(1);
      expect(stdout.chunks).to.deep.equal([]);
      expect(stderr.chunks.join("")).to.include("Usage: pw-rate-audit <device_name>");
    });

    it("audits a saved dump and prints the genmon status line", async () => {
      const stdout = captureStream();
      const logger = new RecordingLogger();

      const code = await main(["Topping_DAC", "--dump-file", FIXTURE_PATH], { stdout: stdout.stream, env: {}, logger });

      expect(code).to.equal(0);
      expect(stdout.chunks).to.have.lengthOf(1);
      expect(stdout.chunks[0]).to.equal(
        "<txt><span color='Red'>Freq Err</span></txt><tool>" +
          [
            `-&gt; Acquiring audio graph state from '${FIXTURE_PATH}'...`,
            "-&gt; Searching for device: 'Topping_DAC'",
            "Device found.",
            "-&gt; Finding sources connected to device ID 40",
            "-&gt; Filtering sources...",
            "-&gt; Filtering out non-running source: Firefox (state: suspended)",
            "Found 1 relevant source.",
            "-&gt; Checking source 'mpv Media Player' (ID: 71): Device rate is 96000, Source rate is 44100",
            "Mismatch found! Device(96000) != Source(44100)",
          ].join("\n") +
          "</tool>\n",
      );

      const steps = logger.entries.filter((entry) => entry.message === "audit_step");
      expect(steps).to.have.lengthOf(9);
      expect(logger.entries[logger.entries.length - 1]).to.deep.equal({
        level: "info",
        message: "audit_outcome",
        payload: { target: "Topping_DAC", outcome: { kind: "RateMismatch", targetRate: 96_000, sourceRate: 44_100 } },
      });
    });

    it("runs the dump command from the environment and still exits 0 when it fails", async () => {
      const stdout = captureStream();
      const run = sinon
        .stub<Parameters<CommandRunner["run"]>, ReturnType<CommandRunner["run"]>>()
        .resolves({ stdout: "", stderr: "", exitCode: 1, signal: null });

      const code = await main(["Topping_DAC", "--format", "json"], {
        stdout: stdout.stream,
        env: { PW_AUDIT_DUMP_COMMAND: "/opt/pw/pw-dump", PW_AUDIT_TIMEOUT_MS: "750" },
        runner: { run },
        logger: new RecordingLogger(),
      });

      expect(code).to.equal(0);
      expect(run.firstCall.args[0]).to.include({ command: "/opt/pw/pw-dump", timeoutMs: 750 });
      expect(JSON.parse(stdout.chunks[0])).to.deep.equal({
        text: "Err",
        tooltip:
          "-> Acquiring audio graph state from '/opt/pw/pw-dump'...\n" +
          "Error getting or parsing the audio graph: '/opt/pw/pw-dump' exited with code 1",
        class: "error",
        alt: "alert",
      });
    });
  });
});
