// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  attachDescriptor,
  type MessageSchema,
  type PayloadSchema,
  type SchemaOpts,
} from "@switchboard/core";
import * as v from "valibot";

/**
 * Message schema built by `message()`: a discriminator value plus an
 * optional Valibot payload schema.
 */
export interface ValibotMessageSchema<
  T extends string = string,
  S extends v.GenericSchema | undefined = v.GenericSchema | undefined,
> extends MessageSchema<T, S extends v.GenericSchema ? v.InferOutput<S> : undefined> {
  readonly payloadSchema: S;
}

export interface ValibotPayloadSchema<S extends v.GenericSchema = v.GenericSchema>
  extends PayloadSchema<v.InferOutput<S>> {
  readonly payloadSchema: S;
}

/**
 * Synchronous Valibot schema check. Async schemas are not accepted: payload
 * validation runs inline with dispatch.
 * @internal
 */
export function isValibotSchema(value: unknown): value is v.GenericSchema {
  return (
    typeof value === "object" &&
    value !== null &&
    Reflect.get(value, "kind") === "schema" &&
    Reflect.get(value, "async") === false
  );
}

/**
 * Define a message (or event) type.
 *
 * @example
 * ```ts
 * const Ping = message("ping");
 * const Chat = message("chat", { text: v.pipe(v.string(), v.minLength(1)) });
 * ```
 */
export function message<T extends string>(
  type: T,
  payload?: undefined,
  opts?: SchemaOpts,
): ValibotMessageSchema<T, undefined>;
export function message<T extends string, S extends v.GenericSchema>(
  type: T,
  payload: S,
  opts?: SchemaOpts,
): ValibotMessageSchema<T, S>;
export function message<T extends string, E extends v.ObjectEntries>(
  type: T,
  payload: E,
  opts?: SchemaOpts,
): ValibotMessageSchema<T, v.ObjectSchema<E, undefined>>;
export function message(
  type: string,
  payload?: v.GenericSchema | v.ObjectEntries,
  opts?: SchemaOpts,
): ValibotMessageSchema<string, v.GenericSchema | undefined> {
  if (type.length === 0) {
    throw new TypeError("message() type must be a non-empty string");
  }
  const schema = {
    messageType: type,
    payloadSchema: payload === undefined ? undefined : toValibot(payload),
  };
  return Object.freeze(attachDescriptor(schema, type, opts));
}

/**
 * Define a payload without a message type of its own.
 */
export function payload<S extends v.GenericSchema>(schema: S): ValibotPayloadSchema<S>;
export function payload<E extends v.ObjectEntries>(
  entries: E,
): ValibotPayloadSchema<v.ObjectSchema<E, undefined>>;
export function payload(schema: v.GenericSchema | v.ObjectEntries): ValibotPayloadSchema {
  return Object.freeze({ payloadSchema: toValibot(schema) });
}

function toValibot(schema: v.GenericSchema | v.ObjectEntries): v.GenericSchema {
  return isValibotSchema(schema) ? schema : v.object(schema);
}
