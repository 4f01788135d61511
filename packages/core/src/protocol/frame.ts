// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Wire frames: `{ [discriminatorField]: type, payload?, ...extras }`.
 *
 * Inbound frames are decoded here without validation; the discriminated
 * unions decide whether the type and payload are acceptable.
 */

import type { ErrorDetail } from "../error.js";
import { SYSTEM_ACTIONS } from "../schema/reserved.js";
import { isPlainObject, safeJsonParse } from "../utils/json.js";

export type WireFrame = Record<string, unknown>;

/**
 * Application-level message: what handlers receive and return.
 */
export interface MessageEnvelope {
  type: string;
  payload?: unknown;
}

export type DecodeOutcome =
  | { ok: true; frame: WireFrame }
  | { ok: false; issues: ErrorDetail[] };

/**
 * Decode raw socket data into a frame object.
 * Accepts JSON text or an already-parsed value (in-process callers).
 */
export function decodeFrame(raw: unknown): DecodeOutcome {
  let value: unknown = raw;
  if (typeof raw === "string") {
    const parsed = safeJsonParse(raw);
    if (!parsed.ok) {
      return {
        ok: false,
        issues: [{ type: "json_invalid", loc: [], msg: `Invalid JSON: ${parsed.error}` }],
      };
    }
    value = parsed.value;
  }
  if (!isPlainObject(value)) {
    return {
      ok: false,
      issues: [{ type: "model_type", loc: [], msg: "Frame must be a JSON object" }],
    };
  }
  return { ok: true, frame: value };
}

/**
 * Build an outbound frame from a message.
 */
export function encodeFrame(
  field: string,
  message: MessageEnvelope,
  extras?: object,
): WireFrame {
  const frame: WireFrame = { [field]: message.type };
  if (message.payload !== undefined) {
    frame.payload = message.payload;
  }
  return extras ? { ...frame, ...extras } : frame;
}

/**
 * Read the action of an outbound or inbound frame, if it is a string.
 */
export function actionOf(field: string, frame: WireFrame): string | undefined {
  const value = frame[field];
  return typeof value === "string" ? value : undefined;
}

export function errorFrame(field: string, issues: readonly ErrorDetail[]): WireFrame {
  return { [field]: SYSTEM_ACTIONS.ERROR, payload: issues };
}

export function markerFrame(
  field: string,
  action:
    | typeof SYSTEM_ACTIONS.COMPLETE
    | typeof SYSTEM_ACTIONS.GROUP_COMPLETE
    | typeof SYSTEM_ACTIONS.EVENT_COMPLETE,
): WireFrame {
  return { [field]: action };
}
