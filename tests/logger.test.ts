import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { StructuredLogger, type LogEntry } from "../src/logger.js";

describe("logger", () => {
  afterEach(() => {
    sinon.restore();
  });

  it("writes one JSON line per entry to the sink", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({ level: "info", sink: (line) => lines.push(line) });
    logger.info("route_planned", { total: 12 });

    expect(lines).to.have.length(1);
    expect(lines[0].endsWith("\n")).to.equal(true);
    const entry: LogEntry = JSON.parse(lines[0]);
    expect(entry.level).to.equal("info");
    expect(entry.message).to.equal("route_planned");
    expect(entry.payload).to.deep.equal({ total: 12 });
    expect(Number.isNaN(Date.parse(entry.timestamp))).to.equal(false);
  });

  it("drops entries below the configured level", () => {
    const sink = sinon.spy();
    const logger = new StructuredLogger({ level: "warn", sink });
    logger.debug("ignored");
    logger.info("ignored");
    logger.warn("kept");
    logger.error("kept");
    expect(sink.callCount).to.equal(2);
    expect(logger.isLevelEnabled("info")).to.equal(false);
    expect(logger.isLevelEnabled("error")).to.equal(true);
  });

  it("notifies the entry listener with a copy of the entry", () => {
    const onEntry = sinon.spy();
    const payload = { steps: 3 };
    const logger = new StructuredLogger({ level: "debug", sink: () => undefined, onEntry });
    logger.debug("maze_solved", payload);

    sinon.assert.calledOnce(onEntry);
    const entry: LogEntry = onEntry.firstCall.args[0];
    expect(entry.message).to.equal("maze_solved");
    expect(entry.payload).to.deep.equal(payload);
    expect(entry.payload).to.not.equal(payload);
  });

  it("omits the payload key when none is given", () => {
    const lines: string[] = [];
    new StructuredLogger({ level: "debug", sink: (line) => lines.push(line) }).warn("bare");
    const entry: Record<string, unknown> = JSON.parse(lines[0]);
    expect(Object.keys(entry)).to.deep.equal(["timestamp", "level", "message"]);
  });

  it("mirrors entries to the log file in order", async () => {
    const directory = await mkdtemp(join(tmpdir(), "waypath-logger-"));
    const logFile = join(directory, "nested", "waypath.log");
    try {
      const logger = new StructuredLogger({ level: "info", logFile, sink: () => undefined });
      logger.info("first");
      logger.error("second", { code: "E-MAZE-FORMAT" });
      await logger.flush();

      const lines = (await readFile(logFile, "utf8")).trim().split("\n");
      const entries: LogEntry[] = lines.map((line) => JSON.parse(line));
      expect(entries.map((entry) => entry.message)).to.deep.equal(["first", "second"]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
