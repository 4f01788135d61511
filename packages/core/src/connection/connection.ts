// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * One live socket: identity, unicast address, group memberships, lifecycle
 * state and the serial mailbox its units of work run on.
 *
 * Created by the consumer on accept and destroyed on close. Group membership
 * is changed only by the connection's own units of work (or by the consumer
 * during accept/disconnect), so no locking is needed.
 */

import type { ConsumerConfig } from "../config.js";
import { ConnectionStateError } from "../error.js";
import { LOG_CONTEXT } from "../logger.js";
import { actionOf, type WireFrame } from "../protocol/frame.js";
import type { ConnectionRequest, ServerSocket } from "../ws/platform-adapter.js";
import { Mailbox } from "./mailbox.js";
import { canTransition, type ConnectionState } from "./state.js";

/**
 * Per-connection application state bag.
 */
export type ConnectionData = Record<string, unknown>;

/**
 * Authenticated principal. `id` is what `isMine` compares.
 */
export interface Identity {
  readonly id: string | number;
  readonly [key: string]: unknown;
}

export interface ConnectionInit {
  address: string;
  socket: ServerSocket;
  request: ConnectionRequest;
  config: ConsumerConfig;
  now?: () => number;
}

export class Connection<TData extends ConnectionData = ConnectionData> {
  readonly address: string;
  readonly request: ConnectionRequest;
  readonly data: Partial<TData> = {};
  readonly mailbox = new Mailbox();

  private readonly socket: ServerSocket;
  private readonly config: ConsumerConfig;
  private readonly now: () => number;
  private readonly abort = new AbortController();
  private readonly memberships = new Set<string>();
  private currentState: ConnectionState = "connecting";
  private currentIdentity: Identity | null = null;
  private activity: number;
  private closeInfo: { code: number; reason: string } | undefined;

  constructor(init: ConnectionInit) {
    this.address = init.address;
    this.socket = init.socket;
    this.request = init.request;
    this.config = init.config;
    this.now = init.now ?? Date.now;
    this.activity = this.now();
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get identity(): Identity | null {
    return this.currentIdentity;
  }

  /** Groups this connection currently belongs to. */
  get groups(): ReadonlySet<string> {
    return this.memberships;
  }

  /** Timestamp (ms) of the last frame received or sent. */
  get lastActivity(): number {
    return this.activity;
  }

  /** Aborted when the connection starts closing. */
  get signal(): AbortSignal {
    return this.abort.signal;
  }

  /** Close code and reason, once the connection has started closing. */
  get closedWith(): { code: number; reason: string } | undefined {
    return this.closeInfo;
  }

  get isOpen(): boolean {
    return this.currentState === "open";
  }

  /**
   * Move to another lifecycle state. Throws on illegal transitions.
   * @internal
   */
  transition(to: ConnectionState): void {
    if (!canTransition(this.currentState, to)) {
      throw new ConnectionStateError(
        `Illegal connection state transition ${this.currentState} → ${to}`,
        { address: this.address, from: this.currentState, to },
      );
    }
    this.currentState = to;
  }

  /**
   * Enter `closing`: record the reason, stop the mailbox and abort the
   * running unit's signal. Returns false if already closing or closed.
   * @internal
   */
  beginClose(code: number, reason: string): boolean {
    if (this.currentState === "closing" || this.currentState === "closed") {
      return false;
    }
    this.transition("closing");
    this.closeInfo = { code, reason };
    this.mailbox.close();
    this.abort.abort(new ConnectionStateError(`Connection closing: ${reason}`));
    return true;
  }

  /**
   * Close the socket and enter `closed`.
   * @internal
   */
  finishClose(): void {
    if (this.currentState === "closed") return;
    const { code, reason } = this.closeInfo ?? { code: 1000, reason: "" };
    if (this.socket.readyState === "OPEN" || this.socket.readyState === "CONNECTING") {
      this.socket.close(code, reason);
    }
    if (this.currentState !== "closing") {
      this.transition("closing");
    }
    this.transition("closed");
  }

  /** @internal */
  setIdentity(identity: Identity | null): void {
    this.currentIdentity = identity;
  }

  /** @internal */
  addGroup(group: string): boolean {
    if (this.memberships.has(group)) return false;
    this.memberships.add(group);
    return true;
  }

  /** @internal */
  removeGroup(group: string): boolean {
    return this.memberships.delete(group);
  }

  /** @internal */
  touch(): void {
    this.activity = this.now();
  }

  /**
   * Write a frame to the socket. Frames to a socket that is not open are
   * dropped with a debug log entry; returns whether the frame was written.
   */
  sendFrame(frame: WireFrame): boolean {
    const { logger, discriminatorField } = this.config;
    const action = actionOf(discriminatorField, frame);

    if (this.socket.readyState !== "OPEN") {
      logger.debug(LOG_CONTEXT.CONNECTION, "Dropped frame for socket that is not open", {
        address: this.address,
        action,
        readyState: this.socket.readyState,
      });
      return false;
    }

    this.socket.send(JSON.stringify(frame));
    this.touch();

    if (
      this.config.logSentMessages &&
      (action === undefined || !this.config.ignoredDiscriminatorsForLogging.has(action))
    ) {
      logger.info(LOG_CONTEXT.MESSAGE, "Sent websocket json", {
        address: this.address,
        action,
      });
    }
    return true;
  }
}
