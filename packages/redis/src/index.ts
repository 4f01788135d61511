// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export { createRedisChannelLayer, redisChannelLayer } from "./channel-layer.js";
export type {
  CreateRedisChannelLayerOptions,
  RedisChannelLayer,
  RedisChannelLayerOptions,
} from "./channel-layer.js";
export { redisTransport } from "./transport.js";
export type { RedisClient, RedisTransport } from "./transport.js";
