// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  attachDescriptor,
  type MessageSchema,
  type PayloadSchema,
  type SchemaOpts,
} from "@switchboard/core";
import { z, type ZodObject, type ZodRawShape, type ZodType } from "zod";

/**
 * Message schema built by `message()`: a discriminator value plus an
 * optional Zod payload schema.
 */
export interface ZodMessageSchema<
  T extends string = string,
  S extends ZodType | undefined = ZodType | undefined,
> extends MessageSchema<T, S extends ZodType ? z.output<S> : undefined> {
  readonly payloadSchema: S;
}

/**
 * Payload-only schema built by `payload()`. Handlers declared with one take
 * their discriminator from their name or the `action` option.
 */
export interface ZodPayloadSchema<S extends ZodType = ZodType>
  extends PayloadSchema<z.output<S>> {
  readonly payloadSchema: S;
}

/**
 * Define a message (or event) type.
 *
 * @example
 * ```ts
 * const Ping = message("ping");
 * const Chat = message("chat", { text: z.string().min(1) });
 * const Job = message("job_done", z.object({ id: z.string() }), { validateOutgoing: false });
 * ```
 */
export function message<T extends string>(
  type: T,
  payload?: undefined,
  opts?: SchemaOpts,
): ZodMessageSchema<T, undefined>;
export function message<T extends string, S extends ZodType>(
  type: T,
  payload: S,
  opts?: SchemaOpts,
): ZodMessageSchema<T, S>;
export function message<T extends string, P extends ZodRawShape>(
  type: T,
  payload: P,
  opts?: SchemaOpts,
): ZodMessageSchema<T, ZodObject<P>>;
export function message(
  type: string,
  payload?: ZodType | ZodRawShape,
  opts?: SchemaOpts,
): ZodMessageSchema<string, ZodType | undefined> {
  if (type.length === 0) {
    throw new TypeError("message() type must be a non-empty string");
  }
  const schema = {
    messageType: type,
    payloadSchema: payload === undefined ? undefined : toZod(payload),
  };
  return Object.freeze(attachDescriptor(schema, type, opts));
}

/**
 * Define a payload without a message type of its own.
 *
 * @example
 * ```ts
 * consumer.on(payload({ text: z.string() }), function handleEcho(ctx) { ... });
 * // discriminator: "echo"
 * ```
 */
export function payload<S extends ZodType>(schema: S): ZodPayloadSchema<S>;
export function payload<P extends ZodRawShape>(shape: P): ZodPayloadSchema<ZodObject<P>>;
export function payload(schema: ZodType | ZodRawShape): ZodPayloadSchema {
  return Object.freeze({ payloadSchema: toZod(schema) });
}

function toZod(schema: ZodType | ZodRawShape): ZodType {
  return schema instanceof z.ZodType ? schema : z.object(schema);
}
