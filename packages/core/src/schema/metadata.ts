// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Symbol-based metadata for runtime schema hints.
 *
 * Uses Symbol.for() so validator packages and core agree on the key without
 * importing each other's internals. Values are attached as non-enumerable
 * properties and never show up when a schema is spread or serialized.
 *
 * @internal
 */

/**
 * Symbol for the message type descriptor.
 * Stores the discriminator value (e.g., "chat", "job_done").
 */
export const DESCRIPTOR = Symbol.for("@switchboard/descriptor");

/**
 * Per-schema behavior overrides.
 */
export interface SchemaOpts {
  /**
   * Validate payloads built from this schema before they are sent.
   * Overrides the consumer default if set.
   */
  validateOutgoing?: boolean;
}

/**
 * Symbol for schema option metadata.
 */
export const SCHEMA_OPTS = Symbol.for("@switchboard/schema-opts");

/**
 * Descriptor shape stored under the DESCRIPTOR symbol.
 */
export interface DescriptorValue {
  readonly messageType: string;
}

function readSymbol(value: unknown, key: symbol): unknown {
  if ((typeof value !== "object" && typeof value !== "function") || value === null) {
    return undefined;
  }
  return Reflect.get(value, key);
}

/**
 * Attach the descriptor and options to a schema object.
 *
 * @internal
 */
export function attachDescriptor<T extends object>(
  schema: T,
  messageType: string,
  opts?: SchemaOpts,
): T {
  Object.defineProperty(schema, DESCRIPTOR, {
    value: Object.freeze({ messageType }),
    enumerable: false,
  });
  if (opts) {
    Object.defineProperty(schema, SCHEMA_OPTS, {
      value: Object.freeze({ ...opts }),
      enumerable: false,
      configurable: true,
    });
  }
  return schema;
}

/**
 * Get the message type descriptor from a schema.
 * @internal
 */
export function getDescriptor(schema: unknown): DescriptorValue | undefined {
  const value = readSymbol(schema, DESCRIPTOR);
  if (typeof value !== "object" || value === null) return undefined;
  const messageType: unknown = Reflect.get(value, "messageType");
  return typeof messageType === "string" ? { messageType } : undefined;
}

/**
 * Retrieve schema options attached to a schema.
 * @internal
 */
export function getSchemaOpts(schema: unknown): SchemaOpts | undefined {
  const value = readSymbol(schema, SCHEMA_OPTS);
  if (typeof value !== "object" || value === null) return undefined;
  const validateOutgoing: unknown = Reflect.get(value, "validateOutgoing");
  return typeof validateOutgoing === "boolean" ? { validateOutgoing } : {};
}

/**
 * Dereference the message type of a schema, or undefined when it has none.
 * @internal
 */
export function typeOf(schema: unknown): string | undefined {
  return getDescriptor(schema)?.messageType;
}
