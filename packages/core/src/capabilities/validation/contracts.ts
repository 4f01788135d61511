// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Validator adapter contract (core-level).
 * Actual validators (Zod, Valibot, custom) implement this interface.
 *
 * Core never creates validators; they are injected when a consumer is created.
 */

import type { ErrorDetail } from "../../error.js";
import type {
  AnyMessageSchema,
  HandlerInput,
} from "../../protocol/message-descriptor.js";

export type ValidationResult<T = unknown> =
  | { ok: true; value: T }
  | { ok: false; issues: ErrorDetail[] };

/**
 * Validator: checks message payloads against schemas.
 */
export interface ValidatorAdapter {
  /** Adapter name for logs (e.g. "zod"). */
  readonly name: string;

  /**
   * Was this value built by this adapter's `message()` or `payload()`?
   */
  isSchema(value: unknown): value is HandlerInput;

  /**
   * Validate an incoming payload against a schema.
   * Issue locations start at the frame root (`["payload", ...]`).
   */
  validatePayload(schema: HandlerInput, payload: unknown): ValidationResult;

  /**
   * Validate a payload the server is about to send.
   * Same contract as validatePayload.
   */
  validateOutgoing(schema: AnyMessageSchema, payload: unknown): ValidationResult;
}
