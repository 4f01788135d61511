// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { RedisTransport } from "../src/index.js";

type Listener = (message: string) => void;

/**
 * In-process stand-in for a Redis server's pub/sub. Each `transport()` plays
 * the part of one process's client pair; publishes reach every transport
 * subscribed to the channel, the publisher included.
 */
export class FakeBroker {
  readonly published: { channel: string; message: string }[] = [];
  private readonly subscribers = new Map<string, Set<Listener>>();

  transport(): RedisTransport {
    const own = new Map<string, Listener>();
    return {
      publish: async (channel, message) => {
        this.published.push({ channel, message });
        const listeners = Array.from(this.subscribers.get(channel) ?? []);
        for (const listener of listeners) {
          listener(message);
        }
        return listeners.length;
      },
      subscribe: async (channel, listener) => {
        own.set(channel, listener);
        const set = this.subscribers.get(channel) ?? new Set<Listener>();
        set.add(listener);
        this.subscribers.set(channel, set);
      },
      unsubscribe: async (channel) => {
        const listener = own.get(channel);
        if (!listener) return;
        own.delete(channel);
        this.subscribers.get(channel)?.delete(listener);
      },
    };
  }

  /** Channels with at least one subscriber. */
  channels(): string[] {
    return Array.from(this.subscribers)
      .filter(([, set]) => set.size > 0)
      .map(([channel]) => channel);
  }
}
