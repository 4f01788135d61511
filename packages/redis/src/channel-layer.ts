// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  LOG_CONTEXT,
  TransportError,
  createLogger,
  describeError,
  isLayerEnvelope,
  safeJsonParse,
  type ChannelLayer,
  type Deliver,
  type LayerEnvelope,
  type LoggerAdapter,
} from "@switchboard/core";
import { memoryChannelLayer } from "@switchboard/memory";
import { createClient } from "redis";
import { redisTransport, type RedisTransport } from "./transport.js";

export interface RedisChannelLayerOptions {
  transport: RedisTransport;

  /**
   * Prefix for every Redis channel. Isolates deployments sharing one server.
   * @default "switchboard:"
   */
  channelPrefix?: string;

  /** @default JSON.stringify */
  encode?: (envelope: LayerEnvelope) => string;

  /** Returns undefined for data that is not an envelope. */
  decode?: (data: string) => LayerEnvelope | undefined;

  logger?: LoggerAdapter;

  /** Called by close() after subscriptions are released. */
  onClose?: () => Promise<void>;
}

export interface RedisChannelLayer extends ChannelLayer {
  /** Redis channels this process is subscribed to. */
  subscriptions(): readonly string[];
}

function defaultDecode(data: string): LayerEnvelope | undefined {
  const parsed = safeJsonParse(data);
  return parsed.ok && isLayerEnvelope(parsed.value) ? parsed.value : undefined;
}

/**
 * Channel layer over Redis pub/sub: local address and group index plus
 * broker publish.
 *
 * Every address gets a `conn:<address>` channel while registered. A group
 * channel (`group:<name>`) is subscribed while at least one local address
 * belongs to the group, so each process only hears groups it has members in.
 *
 * Usage:
 * ```ts
 * import { createRedisChannelLayer } from "@switchboard/redis";
 *
 * const layer = await createRedisChannelLayer({ url: process.env.REDIS_URL });
 * const consumer = createConsumer({ layer });
 * ```
 */
export function redisChannelLayer(opts: RedisChannelLayerOptions): RedisChannelLayer {
  const {
    transport,
    channelPrefix = "switchboard:",
    encode = JSON.stringify,
    decode = defaultDecode,
    logger = createLogger({ minLevel: "warn" }),
  } = opts;

  // Envelopes arriving from Redis are already fresh objects
  const local = memoryChannelLayer({ logger, serialize: false });
  const subscribed = new Set<string>();

  const connChannel = (address: string): string => `${channelPrefix}conn:${address}`;
  const groupChannel = (group: string): string => `${channelPrefix}group:${group}`;

  function receiver(
    channel: string,
    forward: (envelope: LayerEnvelope) => Promise<void>,
  ): (message: string) => void {
    return (message) => {
      const envelope = decode(message);
      if (!envelope) {
        logger.warn(LOG_CONTEXT.TRANSPORT, "Dropped undecodable Redis message", { channel });
        return;
      }
      forward(envelope).catch((err: unknown) => {
        logger.error(LOG_CONTEXT.TRANSPORT, "Local delivery failed", {
          channel,
          error: describeError(err),
        });
      });
    };
  }

  async function subscribe(
    channel: string,
    forward: (envelope: LayerEnvelope) => Promise<void>,
  ): Promise<void> {
    if (subscribed.has(channel)) return;
    subscribed.add(channel);
    try {
      await transport.subscribe(channel, receiver(channel, forward));
    } catch (err) {
      subscribed.delete(channel);
      throw TransportError.wrap(err, "subscribe", { channel });
    }
  }

  async function unsubscribe(channel: string): Promise<void> {
    if (!subscribed.delete(channel)) return;
    try {
      await transport.unsubscribe(channel);
    } catch (err) {
      throw TransportError.wrap(err, "unsubscribe", { channel });
    }
  }

  async function publish(channel: string, envelope: LayerEnvelope): Promise<void> {
    try {
      await transport.publish(channel, encode(envelope));
    } catch (err) {
      throw TransportError.wrap(err, "publish", { channel, kind: envelope.kind });
    }
  }

  async function leave(group: string, address: string): Promise<void> {
    await local.leaveGroup(group, address);
    if (!local.hasGroup(group)) {
      await unsubscribe(groupChannel(group));
    }
  }

  return {
    name: "redis",

    async register(address: string, deliver: Deliver): Promise<void> {
      await local.register(address, deliver);
      try {
        await subscribe(connChannel(address), (envelope) =>
          local.sendToConnection(address, envelope),
        );
      } catch (err) {
        await local.unregister(address);
        throw err;
      }
    },

    async unregister(address: string): Promise<void> {
      for (const group of local.groupsOf(address)) {
        await leave(group, address);
      }
      await local.unregister(address);
      await unsubscribe(connChannel(address));
    },

    sendToConnection(address: string, envelope: LayerEnvelope): Promise<void> {
      return publish(connChannel(address), envelope);
    },

    async joinGroup(group: string, address: string): Promise<void> {
      await local.joinGroup(group, address);
      await subscribe(groupChannel(group), (envelope) => local.sendToGroup(group, envelope));
    },

    leaveGroup(group: string, address: string): Promise<void> {
      return leave(group, address);
    },

    sendToGroup(group: string, envelope: LayerEnvelope): Promise<void> {
      return publish(groupChannel(group), envelope);
    },

    async close(): Promise<void> {
      for (const channel of Array.from(subscribed)) {
        try {
          await unsubscribe(channel);
        } catch (err) {
          logger.warn(LOG_CONTEXT.TRANSPORT, "Unsubscribe on close failed", {
            channel,
            error: describeError(err),
          });
        }
      }
      local.dispose();
      await opts.onClose?.();
    },

    subscriptions(): readonly string[] {
      return Object.freeze(Array.from(subscribed));
    },
  };
}

export interface CreateRedisChannelLayerOptions
  extends Omit<RedisChannelLayerOptions, "transport" | "onClose"> {
  /** Redis connection URL (default: redis://localhost:6379) */
  url?: string;
}

/**
 * Connect a publisher and a subscriber client and build a layer on them.
 * close() quits both clients.
 */
export async function createRedisChannelLayer(
  opts: CreateRedisChannelLayerOptions = {},
): Promise<RedisChannelLayer> {
  const { url, ...rest } = opts;
  const publisher = createClient({ url });
  const subscriber = publisher.duplicate();
  await Promise.all([publisher.connect(), subscriber.connect()]);

  return redisChannelLayer({
    ...rest,
    transport: redisTransport(publisher, subscriber),
    onClose: async () => {
      await Promise.all([subscriber.quit(), publisher.quit()]);
    },
  });
}
