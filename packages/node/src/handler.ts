// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { IncomingMessage } from "node:http";
import {
  LOG_CONTEXT,
  describeError,
  type Connection,
  type ConnectionData,
  type Consumer,
} from "@switchboard/core";
import { WebSocketServer, type ServerOptions } from "ws";
import { adaptNodeSocket, decodeRawData, requestOf, type NodeSocket } from "./socket.js";

export interface NodeHandlerOptions<TData extends ConnectionData> {
  /** Runs once the connection is open and has joined its groups */
  onOpen?: (connection: Connection<TData>) => void;

  /** Runs after the consumer has disconnected the connection */
  onClose?: (connection: Connection<TData>, code: number, reason: string) => void;

  /** Socket errors and accept failures */
  onError?: (error: Error, connection?: Connection<TData>) => void;
}

export interface NodeHandler {
  /**
   * Serve one upgraded socket. Resolves once the connection is accepted (or
   * refused); never rejects.
   */
  handleConnection(ws: NodeSocket, req: IncomingMessage): Promise<void>;

  /** Serve every connection of a WebSocketServer. */
  attach(wss: WebSocketServer): void;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Bridge `ws` sockets to a consumer.
 *
 * **Connection flow**:
 * 1. `connection` event → `consumer.accept()` runs the authentication gate
 * 2. Messages arriving before accept settles are held, then queued in order
 * 3. `message` → `consumer.receive()`
 * 4. `close` → `consumer.disconnect()` with the peer's code
 *
 * ```ts
 * const wss = new WebSocketServer({ port: 3000 });
 * createNodeHandler(consumer).attach(wss);
 * ```
 */
export function createNodeHandler<TData extends ConnectionData>(
  consumer: Consumer<TData>,
  options: NodeHandlerOptions<TData> = {},
): NodeHandler {
  const { logger } = consumer;

  function report(err: unknown, connection?: Connection<TData>): void {
    const error = toError(err);
    logger.error(LOG_CONTEXT.CONNECTION, "WebSocket error", {
      address: connection?.address,
      error: describeError(error),
    });
    options.onError?.(error, connection);
  }

  async function handleConnection(ws: NodeSocket, req: IncomingMessage): Promise<void> {
    let connection: Connection<TData> | undefined;
    let peerClose: { code: number; reason: string } | undefined;
    const held: string[] = [];

    const receive = (conn: Connection<TData>, text: string): void => {
      consumer.receive(conn, text).catch((err: unknown) => report(err, conn));
    };

    const disconnect = (conn: Connection<TData>, code: number, reason: string): void => {
      consumer
        .disconnect(conn, code, reason)
        .then(() => options.onClose?.(conn, code, reason))
        .catch((err: unknown) => report(err, conn));
    };

    ws.on("message", (data) => {
      const text = decodeRawData(data);
      if (connection) {
        receive(connection, text);
      } else {
        held.push(text);
      }
    });

    ws.on("close", (code, reason) => {
      const text = reason.toString("utf8");
      if (connection) {
        disconnect(connection, code, text);
      } else {
        peerClose = { code, reason: text };
      }
    });

    ws.on("error", (err) => report(err, connection));

    let accepted: Connection<TData>;
    try {
      accepted = await consumer.accept(adaptNodeSocket(ws), requestOf(req));
    } catch (err) {
      report(err);
      return;
    }

    if (peerClose) {
      disconnect(accepted, peerClose.code, peerClose.reason);
      return;
    }
    if (!accepted.isOpen) {
      // Refused by the authentication gate
      return;
    }

    for (const text of held.splice(0)) {
      receive(accepted, text);
    }
    connection = accepted;
    options.onOpen?.(accepted);
  }

  return {
    handleConnection,

    attach(wss: WebSocketServer): void {
      wss.on("connection", (ws, req) => {
        void handleConnection(ws, req);
      });
    },
  };
}

export interface ServeOptions<TData extends ConnectionData> extends NodeHandlerOptions<TData> {
  /** Passed to `new WebSocketServer()` */
  server: ServerOptions;
}

export interface NodeServer {
  readonly wss: WebSocketServer;
  /** Disconnect every connection, then stop the server. */
  close(): Promise<void>;
}

/**
 * Start a WebSocketServer for a consumer.
 *
 * ```ts
 * const server = serve(consumer, { server: { port: 3000 } });
 * process.on("SIGTERM", () => void server.close());
 * ```
 */
export function serve<TData extends ConnectionData>(
  consumer: Consumer<TData>,
  options: ServeOptions<TData>,
): NodeServer {
  const { server, ...handlerOptions } = options;
  const wss = new WebSocketServer(server);
  createNodeHandler(consumer, handlerOptions).attach(wss);

  return {
    wss,
    async close(): Promise<void> {
      await consumer.close();
      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
