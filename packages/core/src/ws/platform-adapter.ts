// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Platform adapter contract.
 * Concrete implementations: @switchboard/node, the test harness.
 *
 * Core is platform-agnostic; adapters provide the socket and the request
 * details captured at upgrade time.
 */

/**
 * Server-side socket (opaque transport).
 * Only exposes send, close, and readyState.
 */
export interface ServerSocket {
  /**
   * Send a text frame.
   */
  send(data: string): void;

  /**
   * Close connection with optional code + reason.
   */
  close(code?: number, reason?: string): void;

  /**
   * Connection state (CONNECTING | OPEN | CLOSING | CLOSED).
   * Reflects the underlying platform socket's readiness state.
   */
  readonly readyState: "CONNECTING" | "OPEN" | "CLOSING" | "CLOSED";
}

/**
 * Request details the adapter captured when the socket was accepted.
 * Passed to the authentication gate and kept on the connection.
 */
export interface ConnectionRequest {
  readonly url?: string;
  readonly headers: Readonly<Record<string, string | undefined>>;
  readonly remoteAddress?: string;
}

export const EMPTY_REQUEST: ConnectionRequest = Object.freeze({
  headers: Object.freeze({}),
});
