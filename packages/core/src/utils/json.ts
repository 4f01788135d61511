// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * JSON utilities: safe parse and plain-object checks for wire frames.
 */

export interface ParseResult<T = unknown> {
  ok: true;
  value: T;
}

export interface ParseError {
  ok: false;
  error: string;
}

export type ParseOutcome<T = unknown> = ParseResult<T> | ParseError;

/**
 * Parse JSON safely. Returns a result object instead of throwing.
 */
export function safeJsonParse(data: string): ParseOutcome {
  try {
    const value: unknown = JSON.parse(data);
    return { ok: true, value };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: message };
  }
}

/**
 * Narrow to a non-array object with string keys.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
