// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Channel layer contract.
 *
 * The channel layer delivers envelopes to connection addresses and groups,
 * possibly across processes. The core only calls these primitives; queuing,
 * retry and persistence belong to the implementation
 * (@switchboard/memory, @switchboard/redis).
 *
 * Envelopes must stay JSON-serializable.
 */

import type { MessageEnvelope } from "../protocol/frame.js";

/**
 * Who a group message came from. Both fields are null for messages sent by
 * code outside any connection.
 */
export interface BroadcastOrigin {
  readonly address: string | null;
  readonly identityId: string | number | null;
}

export const NO_ORIGIN: BroadcastOrigin = Object.freeze({
  address: null,
  identityId: null,
});

/**
 * Message fanned out to the members of a group. Recipients enrich it with
 * `isMine`/`isCurrent` (unless `enrich` is false) before writing it.
 */
export interface GroupMemberEnvelope {
  readonly kind: "group_member";
  readonly group: string;
  readonly message: MessageEnvelope;
  readonly origin: BroadcastOrigin;
  readonly excludeOrigin: boolean;
  readonly enrich: boolean;
}

/**
 * Event unicast to one connection; routed on that connection's mailbox.
 */
export interface EventEnvelope {
  readonly kind: "event";
  readonly event: MessageEnvelope;
}

/**
 * Message pushed to one connection as-is.
 */
export interface FrameEnvelope {
  readonly kind: "frame";
  readonly message: MessageEnvelope;
}

export type LayerEnvelope = GroupMemberEnvelope | EventEnvelope | FrameEnvelope;

/**
 * Local delivery callback registered for an address.
 */
export type Deliver = (envelope: LayerEnvelope) => void | Promise<void>;

export interface ChannelLayer {
  /** Layer name for logs (e.g. "memory", "redis"). */
  readonly name: string;

  /** Start receiving envelopes for an address in this process. */
  register(address: string, deliver: Deliver): Promise<void>;

  /** Stop receiving envelopes for an address. Idempotent. */
  unregister(address: string): Promise<void>;

  /** Deliver to one address, wherever it lives. */
  sendToConnection(address: string, envelope: LayerEnvelope): Promise<void>;

  /** Add an address to a group. Idempotent. */
  joinGroup(group: string, address: string): Promise<void>;

  /** Remove an address from a group. Idempotent. */
  leaveGroup(group: string, address: string): Promise<void>;

  /** Deliver to every member of a group, wherever they live. */
  sendToGroup(group: string, envelope: LayerEnvelope): Promise<void>;

  /** Release resources. */
  close(): Promise<void>;
}

/**
 * Narrow an unknown decoded value to a LayerEnvelope.
 * Used by layers that receive envelopes over the wire.
 */
export function isLayerEnvelope(value: unknown): value is LayerEnvelope {
  if (typeof value !== "object" || value === null) return false;
  const kind: unknown = Reflect.get(value, "kind");
  const hasMessage = (key: string): boolean => {
    const inner: unknown = Reflect.get(value, key);
    return (
      typeof inner === "object" &&
      inner !== null &&
      typeof Reflect.get(inner, "type") === "string"
    );
  };
  switch (kind) {
    case "group_member": {
      const origin: unknown = Reflect.get(value, "origin");
      return (
        hasMessage("message") &&
        typeof Reflect.get(value, "group") === "string" &&
        typeof origin === "object" &&
        origin !== null
      );
    }
    case "event":
      return hasMessage("event");
    case "frame":
      return hasMessage("message");
    default:
      return false;
  }
}
