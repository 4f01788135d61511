// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @switchboard/zod - Zod schemas for @switchboard/core
 *
 * @example
 * ```typescript
 * import { z, message, createConsumer } from "@switchboard/zod";
 * import { memoryChannelLayer } from "@switchboard/memory";
 *
 * const Chat = message("chat", { text: z.string() });
 * const ChatNotify = message("chat_notify", { text: z.string() });
 *
 * const consumer = createConsumer({ layer: memoryChannelLayer() })
 *   .on(Chat, async (ctx) => {
 *     // ctx.payload: { text: string }
 *     await ctx.broadcast(ChatNotify, { text: ctx.payload.text });
 *   });
 * ```
 */

import {
  createConsumer as createCoreConsumer,
  type Consumer,
  type ConnectionData,
  type CreateConsumerOptions,
} from "@switchboard/core";
import { zodValidator } from "./validator.js";

// Canonical Zod instance (single import source)
export { z } from "zod";

export { message, payload } from "./schema.js";
export type { ZodMessageSchema, ZodPayloadSchema } from "./schema.js";
export { zodValidator } from "./validator.js";

export type {
  InferPayload,
  InferType,
  Message,
  MessageOf,
} from "@switchboard/core";

/**
 * Create a consumer that validates with Zod.
 */
export function createConsumer<TData extends ConnectionData = ConnectionData>(
  opts: Omit<CreateConsumerOptions<TData>, "validator">,
): Consumer<TData> {
  return createCoreConsumer<TData>({ ...opts, validator: zodValidator() });
}
