// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * MessageDescriptor: stable runtime contract.
 *
 * Every message or event schema has this shape, regardless of validator.
 * Core reads only these fields; never introspects validator ASTs.
 *
 * Fields:
 * - messageType: discriminator value → handler lookup key
 * - __payload: phantom field carrying the payload type for inference
 */

import { getDescriptor } from "../schema/metadata.js";

export interface MessageDescriptor {
  readonly messageType: string;
}

/**
 * A message schema as produced by a validator package's `message()` builder.
 *
 * `__payload` never exists at runtime; it lets handlers infer their payload
 * type from the schema they are registered with.
 */
export interface MessageSchema<
  TType extends string = string,
  TPayload = unknown,
> extends MessageDescriptor {
  readonly messageType: TType;
  readonly __payload?: TPayload;
}

export type AnyMessageSchema = MessageSchema<string, unknown>;

/**
 * A payload schema without a discriminator of its own. Handlers declared with
 * one take their discriminator from the handler name.
 */
export interface PayloadSchema<TPayload = unknown> {
  readonly messageType?: undefined;
  readonly __payload?: TPayload;
}

/** Anything a handler can be declared with. */
export type HandlerInput = AnyMessageSchema | PayloadSchema;

/** Discriminator value of a schema (`string` for payload-only schemas). */
export type InferType<S> =
  S extends MessageSchema<infer T, unknown> ? T : string;

/** Validated payload type of a schema. */
export type InferPayload<S> = S extends { readonly __payload?: infer P }
  ? P
  : never;

/**
 * Payload argument list for a schema: optional when the schema carries no
 * payload.
 */
export type PayloadArgs<S> = undefined extends InferPayload<S>
  ? [payload?: InferPayload<S>]
  : [payload: InferPayload<S>];

/**
 * Application-level message built from a schema.
 * `payload` may be omitted when the schema carries none.
 */
export type Message<S> = S extends MessageSchema<infer T, infer P>
  ? undefined extends P
    ? { readonly type: T; readonly payload?: P }
    : { readonly type: T; readonly payload: P }
  : never;

/**
 * Union of messages for a list (or single) schema.
 */
export type MessageOf<S> = S extends readonly (infer E)[] ? Message<E> : Message<S>;

/**
 * Type guard: does this value look like a MessageDescriptor?
 */
export function isMessageDescriptor(obj: unknown): obj is MessageDescriptor {
  if ((typeof obj !== "object" && typeof obj !== "function") || obj === null) {
    return false;
  }
  const messageType: unknown = Reflect.get(obj, "messageType");
  return typeof messageType === "string" && messageType.length > 0;
}

/**
 * Assert a value is a MessageDescriptor whose symbol descriptor (when
 * present) agrees with its `messageType` property.
 */
export function assertMessageDescriptor(
  obj: unknown,
): asserts obj is MessageDescriptor {
  if (!isMessageDescriptor(obj)) {
    throw new TypeError(
      "Invalid MessageDescriptor.messageType: must be non-empty string",
    );
  }
  const desc = getDescriptor(obj);
  if (desc && desc.messageType !== obj.messageType) {
    throw new TypeError(
      `MessageDescriptor mismatch: "${obj.messageType}" vs descriptor "${desc.messageType}"`,
    );
  }
}
