// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { createClient } from "redis";

/**
 * Minimal pub/sub surface the Redis layer needs.
 *
 * Redis forbids publishing on a connection in subscriber mode, so real
 * deployments back this with two clients (see `redisTransport`).
 */
export interface RedisTransport {
  publish(channel: string, message: string): Promise<unknown>;
  subscribe(channel: string, listener: (message: string) => void): Promise<unknown>;
  unsubscribe(channel: string): Promise<unknown>;
}

export type RedisClient = ReturnType<typeof createClient>;

/**
 * Adapt a publisher/subscriber pair of node-redis clients.
 *
 * ```ts
 * const publisher = createClient({ url });
 * const subscriber = publisher.duplicate();
 * await Promise.all([publisher.connect(), subscriber.connect()]);
 * const transport = redisTransport(publisher, subscriber);
 * ```
 */
export function redisTransport(
  publisher: RedisClient,
  subscriber: RedisClient,
): RedisTransport {
  if (publisher === subscriber) {
    throw new TypeError("redisTransport needs separate publisher and subscriber clients");
  }
  return {
    publish: (channel, message) => publisher.publish(channel, message),
    subscribe: (channel, listener) =>
      subscriber.subscribe(channel, (message: string) => listener(message)),
    unsubscribe: (channel) => subscriber.unsubscribe(channel),
  };
}
