// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { IncomingMessage } from "node:http";
import type { ConnectionRequest, ServerSocket } from "@switchboard/core";
import type { RawData } from "ws";

/**
 * The part of a `ws` WebSocket the adapter uses.
 */
export interface NodeSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData, isBinary: boolean) => void): this;
  on(event: "close", listener: (code: number, reason: Buffer) => void): this;
  on(event: "error", listener: (err: Error) => void): this;
}

// ws readyState constants
const READY_STATES = ["CONNECTING", "OPEN", "CLOSING", "CLOSED"] as const;

/**
 * Adapt a `ws` socket to the core ServerSocket interface.
 */
export function adaptNodeSocket(ws: NodeSocket): ServerSocket {
  return {
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
    get readyState() {
      return READY_STATES[ws.readyState] ?? "CLOSED";
    },
  };
}

/**
 * Decode a `ws` message to text. Binary frames are read as UTF-8.
 */
export function decodeRawData(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

/**
 * Request details captured at upgrade time. Repeated headers are joined
 * with ", ".
 */
export function requestOf(req: IncomingMessage): ConnectionRequest {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    headers[name] = Array.isArray(value) ? value.join(", ") : value;
  }
  return {
    ...(req.url !== undefined && { url: req.url }),
    headers,
    ...(req.socket.remoteAddress !== undefined && {
      remoteAddress: req.socket.remoteAddress,
    }),
  };
}
