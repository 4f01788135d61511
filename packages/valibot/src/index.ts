// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @switchboard/valibot - Valibot schemas for @switchboard/core
 *
 * @example
 * ```typescript
 * import { v, message, createConsumer } from "@switchboard/valibot";
 *
 * const Join = message("join", { room: v.string() });
 *
 * const consumer = createConsumer({ layer }).on(Join, async (ctx) => {
 *   await ctx.join(ctx.payload.room);
 * });
 * ```
 */

import {
  createConsumer as createCoreConsumer,
  type Consumer,
  type ConnectionData,
  type CreateConsumerOptions,
} from "@switchboard/core";
import { valibotValidator } from "./validator.js";

// Canonical Valibot instance (single import source)
export * as v from "valibot";

export { message, payload } from "./schema.js";
export type { ValibotMessageSchema, ValibotPayloadSchema } from "./schema.js";
export { valibotValidator } from "./validator.js";

export type {
  InferPayload,
  InferType,
  Message,
  MessageOf,
} from "@switchboard/core";

/**
 * Create a consumer that validates with Valibot.
 */
export function createConsumer<TData extends ConnectionData = ConnectionData>(
  opts: Omit<CreateConsumerOptions<TData>, "validator">,
): Consumer<TData> {
  return createCoreConsumer<TData>({ ...opts, validator: valibotValidator() });
}
