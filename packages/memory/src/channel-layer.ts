// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  LOG_CONTEXT,
  createLogger,
  isLayerEnvelope,
  type ChannelLayer,
  type Deliver,
  type LayerEnvelope,
  type LoggerAdapter,
} from "@switchboard/core";

export interface MemoryChannelLayerOptions {
  /** Logger for dropped deliveries (default: console, warnings only) */
  logger?: LoggerAdapter;

  /**
   * Pass every envelope through JSON before delivery, the way a networked
   * layer would (default: true).
   */
  serialize?: boolean;
}

/**
 * Memory layer with inspection helpers for tests.
 */
export interface MemoryChannelLayer extends ChannelLayer {
  hasGroup(group: string): boolean;
  listGroups(): readonly string[];
  members(group: string): readonly string[];
  groupsOf(address: string): readonly string[];
  dispose(): void;
}

/**
 * In-process channel layer: address registry + group index + local fan-out.
 *
 * For single-process deployments and tests. Every consumer that should see
 * the same groups and events must share one instance.
 *
 * Usage:
 * ```ts
 * import { memoryChannelLayer } from "@switchboard/memory";
 *
 * const layer = memoryChannelLayer();
 * const chat = createConsumer({ layer, buildGroups: () => ["lobby"] });
 * const notifications = createConsumer({ layer });
 * ```
 */
export function memoryChannelLayer(
  opts: MemoryChannelLayerOptions = {},
): MemoryChannelLayer {
  const logger = opts.logger ?? createLogger({ minLevel: "warn" });
  const serialize = opts.serialize ?? true;

  // Address -> local delivery callback
  const addresses = new Map<string, Deliver>();

  // Group -> addresses in that group
  const groups = new Map<string, Set<string>>();

  // Address -> groups it belongs to (cleanup on unregister)
  const addressGroups = new Map<string, Set<string>>();

  function decode(text: string, kind: string): LayerEnvelope {
    const decoded: unknown = JSON.parse(text);
    if (!isLayerEnvelope(decoded)) {
      throw new TypeError(`Envelope of kind "${kind}" does not survive JSON encoding`);
    }
    return decoded;
  }

  // Encoding errors throw here, before any delivery. Each call yields a
  // fresh copy.
  function copier(envelope: LayerEnvelope): () => LayerEnvelope {
    if (!serialize) return () => envelope;
    const text = JSON.stringify(envelope);
    decode(text, envelope.kind);
    return () => decode(text, envelope.kind);
  }

  async function deliver(
    address: string,
    kind: LayerEnvelope["kind"],
    copy: () => LayerEnvelope,
  ): Promise<void> {
    const target = addresses.get(address);
    if (!target) {
      logger.debug(LOG_CONTEXT.TRANSPORT, "Dropped envelope for unknown address", {
        address,
        kind,
      });
      return;
    }
    await target(copy());
  }

  function leave(group: string, address: string): void {
    const members = groups.get(group);
    if (members) {
      members.delete(address);
      if (members.size === 0) {
        groups.delete(group);
      }
    }
    addressGroups.get(address)?.delete(group);
  }

  return {
    name: "memory",

    async register(address: string, callback: Deliver): Promise<void> {
      addresses.set(address, callback);
    },

    async unregister(address: string): Promise<void> {
      addresses.delete(address);
      for (const group of Array.from(addressGroups.get(address) ?? [])) {
        leave(group, address);
      }
      addressGroups.delete(address);
    },

    async sendToConnection(address: string, envelope: LayerEnvelope): Promise<void> {
      await deliver(address, envelope.kind, copier(envelope));
    },

    async joinGroup(group: string, address: string): Promise<void> {
      const members = groups.get(group) ?? new Set<string>();
      members.add(address);
      groups.set(group, members);

      const memberships = addressGroups.get(address) ?? new Set<string>();
      memberships.add(group);
      addressGroups.set(address, memberships);
    },

    async leaveGroup(group: string, address: string): Promise<void> {
      leave(group, address);
    },

    async sendToGroup(group: string, envelope: LayerEnvelope): Promise<void> {
      const copy = copier(envelope);
      // Snapshot: deliveries may change membership
      const members = Array.from(groups.get(group) ?? []);
      for (const address of members) {
        try {
          await deliver(address, envelope.kind, copy);
        } catch (err) {
          logger.error(LOG_CONTEXT.TRANSPORT, "Group delivery failed", {
            group,
            address,
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
    },

    async close(): Promise<void> {
      addresses.clear();
      groups.clear();
      addressGroups.clear();
    },

    hasGroup(group: string): boolean {
      return (groups.get(group)?.size ?? 0) > 0;
    },

    listGroups(): readonly string[] {
      return Object.freeze(Array.from(groups.keys()));
    },

    members(group: string): readonly string[] {
      return Object.freeze(Array.from(groups.get(group) ?? []));
    },

    groupsOf(address: string): readonly string[] {
      return Object.freeze(Array.from(addressGroups.get(address) ?? []));
    },

    dispose(): void {
      addresses.clear();
      groups.clear();
      addressGroups.clear();
    },
  };
}
