// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import { resolveConfig } from "./config.js";
import { ConstructionError } from "./error.js";

describe("resolveConfig()", () => {
  it("should apply defaults", () => {
    const config = resolveConfig();

    expect(config).toMatchObject({
      discriminatorField: "action",
      completionSignalsEnabled: false,
      logReceivedMessages: true,
      logSentMessages: true,
      sendAuthenticationMessage: false,
      validateOutgoing: true,
      notifyEventErrors: false,
      authRejectionCode: 4003,
    });
    expect(config.ignoredDiscriminatorsForLogging.size).toBe(0);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("should collect ignored discriminators into a set", () => {
    const config = resolveConfig({ ignoredDiscriminatorsForLogging: ["ping", "ping", "pong"] });

    expect(Array.from(config.ignoredDiscriminatorsForLogging)).toEqual(["ping", "pong"]);
  });

  it.each(["", "payload"])("should reject discriminatorField %j", (field) => {
    expect(() => resolveConfig({ discriminatorField: field })).toThrow(ConstructionError);
  });

  it("should accept 1000 and application close codes for rejections", () => {
    expect(resolveConfig({ authRejectionCode: 1000 }).authRejectionCode).toBe(1000);
    expect(resolveConfig({ authRejectionCode: 4999 }).authRejectionCode).toBe(4999);
    expect(() => resolveConfig({ authRejectionCode: 2999 })).toThrow(
      "Invalid authRejectionCode 2999: use 1000 or an application code in 3000-4999.",
    );
  });
});
