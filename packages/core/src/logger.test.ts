// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { afterEach, describe, expect, it, vi } from "vitest";
import { bindLogger, createLogger, type LogLevel } from "./logger.js";

function recorder() {
  const entries: [LogLevel, string, string, unknown][] = [];
  const logger = createLogger({
    log: (level, context, message, data) => {
      entries.push([level, context, message, data]);
    },
  });
  return { logger, entries };
}

describe("createLogger()", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should pass entries to a custom log function", () => {
    const { logger, entries } = recorder();

    logger.info("message", "Received", { action: "ping" });

    expect(entries).toEqual([["info", "message", "Received", { action: "ping" }]]);
  });

  it("should drop entries below the minimum level", () => {
    const entries: LogLevel[] = [];
    const logger = createLogger({ minLevel: "warn", log: (level) => entries.push(level) });

    logger.debug("c", "d");
    logger.info("c", "i");
    logger.warn("c", "w");
    logger.error("c", "e");

    expect(entries).toEqual(["warn", "error"]);
  });

  it("should write to the console without a log function", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    createLogger().warn("transport", "Slow publish", { ms: 120 });

    expect(warn).toHaveBeenCalledWith("[transport] Slow publish", { ms: 120 });
  });
});

describe("bindLogger()", () => {
  it("should merge bindings into object data", () => {
    const { logger, entries } = recorder();

    bindLogger(logger, { address: "a1" }).warn("validation", "Rejected", { action: "chat" });

    expect(entries).toEqual([["warn", "validation", "Rejected", { address: "a1", action: "chat" }]]);
  });

  it("should keep other data under a data key", () => {
    const { logger, entries } = recorder();
    const bound = bindLogger(logger, { address: "a1" });

    bound.info("c", "list", [1, 2]);
    bound.info("c", "none");

    expect(entries.map(([, , , data]) => data)).toEqual([
      { address: "a1", data: [1, 2] },
      { address: "a1" },
    ]);
  });
});
