import { describe, expect, it } from "vitest";
import { createHumanLogger, createJsonlLogger, createLogger, formatTimestamp } from "../src/logging/logger.js";
import { StringSink } from "./support/fakes.js";

describe("logger", () => {
  it("formats timestamps in local time", () => {
    expect(formatTimestamp(new Date(2026, 2, 1, 9, 5, 7))).toBe("2026-03-01 09:05:07");
  });

  it("writes human lines with a padded level label", () => {
    const sink = new StringSink();
    const logger = createHumanLogger(sink, () => new Date(2026, 2, 1, 9, 5, 7));
    logger.info("Validating git state...");
    logger.warn("Git tag v1.0.3 already exists", { code: "TAG_EXISTS" });
    logger.error("boom");

    expect(sink.lines()).toEqual([
      "[2026-03-01 09:05:07] INFO  Validating git state...",
      "[2026-03-01 09:05:07] WARN  Git tag v1.0.3 already exists",
      "[2026-03-01 09:05:07] ERROR boom",
    ]);
  });

  it("writes one JSON object per line", () => {
    const sink = new StringSink();
    const logger = createJsonlLogger(sink);
    logger.info("Docker buildx is ready");
    logger.error("Git tag v1.0.3 already exists", { code: "TAG_EXISTS", details: { stage: "publish_tag" } });

    expect(sink.lines().map((l) => JSON.parse(l))).toEqual([
      { level: "info", code: "INFO", message: "Docker buildx is ready" },
      {
        level: "error",
        code: "TAG_EXISTS",
        message: "Git tag v1.0.3 already exists",
        details: { stage: "publish_tag" },
      },
    ]);
  });

  it("picks the writer by format", () => {
    const sink = new StringSink();
    createLogger("jsonl", sink).warn("careful");
    expect(sink.data).toBe('{"level":"warn","code":"WARN","message":"careful"}\n');
  });
});
