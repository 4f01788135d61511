// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type {
  ErrorDetail,
  HandlerInput,
  ValidationResult,
  ValidatorAdapter,
} from "@switchboard/core";
import { z, type ZodType } from "zod";

function payloadSchemaOf(schema: unknown): ZodType | undefined {
  if (typeof schema !== "object" || schema === null) return undefined;
  const value: unknown = Reflect.get(schema, "payloadSchema");
  return value instanceof z.ZodType ? value : undefined;
}

function toIssues(error: z.ZodError): ErrorDetail[] {
  return error.issues.map((issue) => ({
    type: issue.code,
    loc: ["payload", ...issue.path.map((p) => (typeof p === "symbol" ? String(p) : p))],
    msg: issue.message,
  }));
}

function validate(schema: unknown, payload: unknown): ValidationResult {
  const zodSchema = payloadSchemaOf(schema);
  // Schemas without a payload ignore whatever the client sent
  if (!zodSchema) return { ok: true, value: undefined };

  const result = zodSchema.safeParse(payload);
  return result.success
    ? { ok: true, value: result.data }
    : { ok: false, issues: toIssues(result.error) };
}

/**
 * Zod validator adapter.
 *
 * Most applications use `createConsumer()` from this package, which binds
 * the adapter already. The bare adapter is for composing consumers by hand.
 *
 * @example
 * ```ts
 * import { createConsumer } from "@switchboard/core";
 * import { zodValidator } from "@switchboard/zod";
 *
 * const consumer = createConsumer({ validator: zodValidator(), layer });
 * ```
 */
export function zodValidator(): ValidatorAdapter {
  return {
    name: "zod",

    isSchema(value: unknown): value is HandlerInput {
      if (typeof value !== "object" || value === null) return false;
      if (!Object.prototype.hasOwnProperty.call(value, "payloadSchema")) return false;
      const inner: unknown = Reflect.get(value, "payloadSchema");
      return inner === undefined || inner instanceof z.ZodType;
    },

    validatePayload: validate,
    validateOutgoing: validate,
  };
}
