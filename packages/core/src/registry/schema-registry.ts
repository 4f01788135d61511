// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Schema registry: collects handler declarations into two independent
 * tables (client messages, events) and builds their discriminated unions.
 *
 * Construction has no side effects beyond building the tables; it is safe to
 * run at process startup before any connection exists.
 */

import type { ValidatorAdapter } from "../capabilities/validation/contracts.js";
import { ConstructionError } from "../error.js";
import type {
  AnyMessageSchema,
  HandlerInput,
} from "../protocol/message-descriptor.js";
import { isMessageDescriptor } from "../protocol/message-descriptor.js";
import { DiscriminatedUnion } from "./discriminated-union.js";
import { HandlerTable, type HandlerTableOptions } from "./handler-table.js";
import { normalizeAction } from "./normalize.js";
import type {
  BindingDescription,
  Direction,
  HandlerBinding,
  HandlerOptions,
  ReturnsSpec,
} from "./types.js";

function toList(spec: ReturnsSpec | undefined): readonly AnyMessageSchema[] {
  if (spec === undefined) return [];
  return isMessageDescriptor(spec) ? [spec] : [...spec];
}

/**
 * Build an immutable binding from a declaration, checking it against its
 * input schema and its declared outputs.
 */
export function createBinding<H extends (...args: never[]) => unknown>(
  direction: Direction,
  input: HandlerInput,
  handler: H,
  options: HandlerOptions<ReturnsSpec | undefined> = {},
): HandlerBinding<H> {
  const name = options.name ?? handler.name;
  const schemaType = input.messageType;

  if (options.action !== undefined && schemaType !== undefined && options.action !== schemaType) {
    throw new ConstructionError(
      `Handler "${name}" is bound to action "${options.action}" but its input schema has type "${schemaType}".`,
      { action: options.action, schemaType },
    );
  }

  const action = options.action ?? schemaType ?? (name ? normalizeAction(name) : "");

  const returns = toList(options.returns);
  const output = options.output === undefined ? returns : toList(options.output);

  if (options.output !== undefined) {
    const documented = new Set(output.map((s) => s.messageType));
    const missing = returns
      .map((s) => s.messageType)
      .filter((type) => !documented.has(type));
    if (missing.length > 0) {
      throw new ConstructionError(
        `Handler "${name || action}" returns ${missing.map((t) => `"${t}"`).join(", ")} which its declared output does not include.`,
        { action, missing },
      );
    }
  }

  const metadata = Object.freeze({
    name: name || action,
    tags: Object.freeze([...(options.tags ?? [])]),
    ...(options.summary !== undefined && { summary: options.summary }),
    ...(options.description !== undefined && { description: options.description }),
  });

  return Object.freeze({
    action,
    direction,
    handler,
    input,
    returns: Object.freeze([...returns]),
    output: Object.freeze([...output]),
    metadata,
  });
}

export interface RegistryUnions<C, E> {
  readonly client: DiscriminatedUnion<C>;
  readonly event: DiscriminatedUnion<E>;
}

/**
 * Two-direction registry. Client and event discriminators live in separate
 * namespaces, so the same value may appear in both.
 */
export class SchemaRegistry<C, E> {
  readonly client = new HandlerTable<C>("client");
  readonly event = new HandlerTable<E>("event");
  private unions: RegistryUnions<C, E> | undefined;

  addClient(binding: HandlerBinding<C>): void {
    this.client.register(binding);
  }

  addEvent(binding: HandlerBinding<E>): void {
    this.event.register(binding);
  }

  /**
   * Merge another registry's declarations into this one.
   */
  merge(other: SchemaRegistry<C, E>, opts?: HandlerTableOptions): void {
    this.client.merge(other.client, opts);
    this.event.merge(other.event, opts);
  }

  get isSealed(): boolean {
    return this.unions !== undefined;
  }

  /**
   * Seal both tables and build their unions. Idempotent.
   */
  seal(field: string, validator: ValidatorAdapter): RegistryUnions<C, E> {
    if (!this.unions) {
      this.client.seal();
      this.event.seal();
      this.unions = Object.freeze({
        client: new DiscriminatedUnion(this.client, field, validator),
        event: new DiscriminatedUnion(this.event, field, validator),
      });
    }
    return this.unions;
  }

  /**
   * Describe all bindings for documentation tooling.
   */
  describe(): readonly BindingDescription[] {
    return [...this.client.list(), ...this.event.list()].map(([, b]) =>
      Object.freeze({
        action: b.action,
        direction: b.direction,
        name: b.metadata.name,
        returns: b.returns.map((s) => s.messageType),
        output: b.output.map((s) => s.messageType),
        tags: b.metadata.tags,
        ...(b.metadata.summary !== undefined && { summary: b.metadata.summary }),
        ...(b.metadata.description !== undefined && {
          description: b.metadata.description,
        }),
      }),
    );
  }
}
