import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { createLogger, parseLogLevel } from "./logger.js";

function collect(): { lines: Record<string, unknown>[]; sink: (line: string) => void } {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    sink: (line) => {
      lines.push(JSON.parse(line));
    }
  };
}

describe("createLogger", () => {
  it("writes one JSON object per line with the service name", () => {
    const { lines, sink } = collect();
    const logger = createLogger("camrelay", { level: "info", sink });

    logger.info("service started", { port: 3020 });

    assert.equal(lines.length, 1);
    assert.equal(lines[0]?.level, "info");
    assert.equal(lines[0]?.message, "service started");
    assert.equal(lines[0]?.service, "camrelay");
    assert.equal(lines[0]?.port, 3020);
    assert.equal(typeof lines[0]?.ts, "string");
  });

  it("drops entries below the configured level", () => {
    const { lines, sink } = collect();
    const logger = createLogger("camrelay", { level: "warn", sink });

    logger.debug("noise");
    logger.info("noise");
    logger.warn("kept");

    assert.deepEqual(lines.map((line) => line.message), ["kept"]);
  });

  it("child loggers carry bound fields and call-site fields win", () => {
    const { lines, sink } = collect();
    const logger = createLogger("camrelay", { level: "debug", sink }).child({ camera: "porch", attempt: 1 });

    logger.debug("retrying", { attempt: 2 });

    assert.equal(lines[0]?.camera, "porch");
    assert.equal(lines[0]?.attempt, 2);
    assert.equal(lines[0]?.service, "camrelay");
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels in any case and defaults to info", () => {
    assert.equal(parseLogLevel("DEBUG"), "debug");
    assert.equal(parseLogLevel("error"), "error");
    assert.equal(parseLogLevel("verbose"), "info");
    assert.equal(parseLogLevel(undefined), "info");
  });
});
