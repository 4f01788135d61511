// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Per-connection lifecycle:
 *
 *   connecting → authenticating → open → closing → closed
 *
 * Any state before `closed` may move to `closing`. `closed` is terminal.
 * Only `open` admits client messages and events.
 */

export type ConnectionState =
  | "connecting"
  | "authenticating"
  | "open"
  | "closing"
  | "closed";

const TRANSITIONS: Readonly<Record<ConnectionState, readonly ConnectionState[]>> = {
  connecting: ["authenticating", "closing"],
  authenticating: ["open", "closing"],
  open: ["closing"],
  closing: ["closed"],
  closed: [],
};

export function canTransition(from: ConnectionState, to: ConnectionState): boolean {
  return TRANSITIONS[from].includes(to);
}
