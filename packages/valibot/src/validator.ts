// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type {
  ErrorDetail,
  HandlerInput,
  ValidationResult,
  ValidatorAdapter,
} from "@switchboard/core";
import * as v from "valibot";
import { isValibotSchema } from "./schema.js";

function payloadSchemaOf(schema: unknown): v.GenericSchema | undefined {
  if (typeof schema !== "object" || schema === null) return undefined;
  const value: unknown = Reflect.get(schema, "payloadSchema");
  return isValibotSchema(value) ? value : undefined;
}

function pathKey(key: unknown): string | number {
  return typeof key === "string" || typeof key === "number" ? key : String(key);
}

function toIssues(issues: readonly v.BaseIssue<unknown>[]): ErrorDetail[] {
  return issues.map((issue) => ({
    type: issue.type,
    loc: ["payload", ...(issue.path ?? []).map((item) => pathKey(item.key))],
    msg: issue.message,
  }));
}

function validate(schema: unknown, payload: unknown): ValidationResult {
  const valibotSchema = payloadSchemaOf(schema);
  // Schemas without a payload ignore whatever the client sent
  if (!valibotSchema) return { ok: true, value: undefined };

  const result = v.safeParse(valibotSchema, payload);
  return result.success
    ? { ok: true, value: result.output }
    : { ok: false, issues: toIssues(result.issues) };
}

/**
 * Valibot validator adapter.
 *
 * @example
 * ```ts
 * import { createConsumer } from "@switchboard/core";
 * import { valibotValidator } from "@switchboard/valibot";
 *
 * const consumer = createConsumer({ validator: valibotValidator(), layer });
 * ```
 */
export function valibotValidator(): ValidatorAdapter {
  return {
    name: "valibot",

    isSchema(value: unknown): value is HandlerInput {
      if (typeof value !== "object" || value === null) return false;
      if (!Object.prototype.hasOwnProperty.call(value, "payloadSchema")) return false;
      const inner: unknown = Reflect.get(value, "payloadSchema");
      return inner === undefined || isValibotSchema(inner);
    },

    validatePayload: validate,
    validateOutgoing: validate,
  };
}
