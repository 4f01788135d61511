// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Derive a discriminator value from a handler name.
 *
 * camelCase, PascalCase and kebab-case become snake_case, and a leading
 * `handle` or `on` word is dropped:
 *
 * - `handleSendChat` → `send_chat`
 * - `onPing` → `ping`
 * - `JobDone` → `job_done`
 * - `handle_chat` → `chat`
 */
export function normalizeAction(name: string): string {
  return name
    .replace(/^(handle|on)(?=[A-Z_-])/, "")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/[-\s]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toLowerCase();
}
