// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Handler table: stores bindings by discriminator value, one per direction.
 * Implements conflict resolution for merge().
 */

import { ConstructionError } from "../error.js";
import { assertMessageDescriptor } from "../protocol/message-descriptor.js";
import { isReserved } from "../schema/reserved.js";
import type { Direction, HandlerBinding } from "./types.js";

export interface HandlerTableOptions {
  onConflict?: "error" | "skip" | "replace";
}

/**
 * Mapping from discriminator value to handler binding.
 *
 * Registration is fail-fast: duplicates, reserved actions and malformed
 * schemas raise ConstructionError. After seal() the table is read-only.
 *
 * Merge conflict policies:
 * - "error" (default): throw on collision
 * - "skip": keep existing binding, ignore incoming
 * - "replace": replace existing with incoming
 */
export class HandlerTable<H = unknown> {
  private bindings = new Map<string, HandlerBinding<H>>();
  private sealed = false;

  constructor(readonly direction: Direction) {}

  /**
   * Register a binding. Throws if the discriminator is already taken.
   */
  register(binding: HandlerBinding<H>): this {
    this.assertWritable();
    const { action } = binding;

    if (binding.direction !== this.direction) {
      throw new ConstructionError(
        `Cannot register ${binding.direction} handler "${action}" in the ${this.direction} table.`,
        { action },
      );
    }

    if (!action) {
      throw new ConstructionError(
        `Cannot derive a discriminator for ${this.direction} handler "${binding.metadata.name}".`,
      );
    }

    if (isReserved(action)) {
      throw new ConstructionError(
        `Action "${action}" is reserved and cannot be bound to a ${this.direction} handler.`,
        { action },
      );
    }

    for (const schema of [...binding.returns, ...binding.output]) {
      try {
        assertMessageDescriptor(schema);
      } catch (err) {
        throw new ConstructionError(
          `Invalid output schema for "${action}": ${err instanceof Error ? err.message : String(err)}`,
          { action },
        );
      }
    }

    if (this.bindings.has(action)) {
      throw new ConstructionError(
        `Duplicate ${this.direction} handler for action "${action}".`,
        {
          action,
          existing: this.bindings.get(action)?.metadata.name,
          incoming: binding.metadata.name,
        },
      );
    }

    this.bindings.set(action, binding);
    return this;
  }

  /**
   * Get the binding for a discriminator value.
   */
  get(action: string): HandlerBinding<H> | undefined {
    return this.bindings.get(action);
  }

  /**
   * Check if a binding exists for a discriminator value.
   */
  has(action: string): boolean {
    return this.bindings.has(action);
  }

  /**
   * Get the number of registered bindings.
   */
  size(): number {
    return this.bindings.size;
  }

  /**
   * List all registered [action, binding] pairs in registration order.
   */
  list(): readonly [string, HandlerBinding<H>][] {
    return Array.from(this.bindings.entries());
  }

  /**
   * Merge another table of the same direction into this one.
   */
  merge(other: HandlerTable<H>, opts: HandlerTableOptions = {}): this {
    this.assertWritable();
    const { onConflict = "error" } = opts;

    if (other.direction !== this.direction) {
      throw new ConstructionError(
        `Cannot merge a ${other.direction} table into a ${this.direction} table.`,
      );
    }

    for (const [action, binding] of other.list()) {
      if (this.bindings.has(action)) {
        switch (onConflict) {
          case "error":
            throw new ConstructionError(
              `merge() conflict: ${this.direction} handler for action "${action}" already exists (policy: "error").`,
              { action },
            );
          case "skip":
            continue;
          case "replace":
            this.bindings.set(action, binding);
            break;
        }
      } else {
        this.bindings.set(action, binding);
      }
    }
    return this;
  }

  /**
   * Freeze the table. Further register()/merge() calls throw.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  private assertWritable(): void {
    if (this.sealed) {
      throw new ConstructionError(
        `The ${this.direction} handler table is sealed; declare handlers before accepting connections.`,
      );
    }
  }
}
