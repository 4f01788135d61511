// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Test harness: connects TestSockets to a consumer and reads what they
 * receive.
 *
 * ```ts
 * const consumer = createConsumer({ layer: memoryChannelLayer(), config: { completionSignalsEnabled: true } });
 * consumer.on(Ping, () => ({ type: "pong" }));
 *
 * const harness = createTestHarness(consumer);
 * const client = await harness.connect();
 * await client.send({ action: "ping" });
 * expect(await client.receiveAll({ stopAction: "complete" })).toEqual([{ action: "pong" }]);
 * ```
 */

import { setImmediate as nextTurn } from "node:timers/promises";
import type { Connection, ConnectionData } from "../connection/connection.js";
import type { Consumer } from "../core/consumer.js";
import type { WireFrame } from "../protocol/frame.js";
import { EMPTY_REQUEST, type ConnectionRequest } from "../ws/platform-adapter.js";
import { TestSocket } from "./test-socket.js";

export interface ReceiveAllOptions {
  /**
   * Stop at the first frame with this action. The stop frame is consumed
   * but not returned.
   */
  stopAction?: string;
}

export interface TestClient<TData extends ConnectionData = ConnectionData> {
  readonly connection: Connection<TData>;
  readonly socket: TestSocket;

  /**
   * Send a frame as the client. Objects are JSON-encoded; strings are sent
   * as is. Resolves once the frame has been processed.
   */
  send(frame: unknown): Promise<void>;

  /** Every frame received so far. */
  frames(): readonly WireFrame[];

  /** Next unread frame, after pending work settles. */
  receiveNext(): Promise<WireFrame | undefined>;

  /** Unread frames, after pending work settles. */
  receiveAll(opts?: ReceiveAllOptions): Promise<WireFrame[]>;

  /** Forget frames received so far. */
  clear(): void;

  /** Disconnect as if the client went away. */
  close(code?: number): Promise<void>;
}

export interface TestHarness<TData extends ConnectionData = ConnectionData> {
  readonly consumer: Consumer<TData>;

  connect(request?: Partial<ConnectionRequest>): Promise<TestClient<TData>>;

  /** Wait until no connection has queued work. */
  flush(): Promise<void>;

  /** Disconnect every client. */
  close(): Promise<void>;
}

export function createTestHarness<TData extends ConnectionData>(
  consumer: Consumer<TData>,
): TestHarness<TData> {
  async function flush(): Promise<void> {
    // Units may queue more units (events sent to a connection), so loop
    // until every mailbox is empty after a macrotask turn.
    for (;;) {
      await consumer.idle();
      await nextTurn();
      const busy = Array.from(consumer.connections.values()).some(
        (c) => c.mailbox.size > 0,
      );
      if (!busy) return;
    }
  }

  async function connect(request: Partial<ConnectionRequest> = {}): Promise<TestClient<TData>> {
    const socket = new TestSocket();
    const connection = await consumer.accept(socket, { ...EMPTY_REQUEST, ...request });
    let cursor = 0;

    const unread = (): WireFrame[] => socket.frames.slice(cursor);

    return {
      connection,
      socket,

      async send(frame) {
        const raw = typeof frame === "string" ? frame : JSON.stringify(frame);
        await consumer.receive(connection, raw);
      },

      frames: () => socket.frames,

      async receiveNext() {
        await flush();
        const frame = socket.frames[cursor];
        if (frame !== undefined) cursor++;
        return frame;
      },

      async receiveAll(opts = {}) {
        await flush();
        const pending = unread();
        const field = consumer.config.discriminatorField;
        const stop =
          opts.stopAction === undefined
            ? -1
            : pending.findIndex((f) => f[field] === opts.stopAction);
        if (stop === -1) {
          cursor += pending.length;
          return pending;
        }
        cursor += stop + 1;
        return pending.slice(0, stop);
      },

      clear() {
        socket.clear();
        cursor = 0;
      },

      close: (code) => consumer.disconnect(connection, code),
    };
  }

  return {
    consumer,
    connect,
    flush,
    close: () => consumer.close(),
  };
}
