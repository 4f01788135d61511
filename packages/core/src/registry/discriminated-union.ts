// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Discriminated union over the bindings of one direction.
 *
 * Finds the unique binding whose discriminator matches the frame's
 * discriminator field, then validates the payload against that binding's
 * input schema. Built once from a sealed table and shared read-only by every
 * connection of the consumer.
 */

import type { ValidatorAdapter } from "../capabilities/validation/contracts.js";
import type { ErrorDetail } from "../error.js";
import type { MessageEnvelope, WireFrame } from "../protocol/frame.js";
import type { HandlerTable } from "./handler-table.js";
import type { Direction, HandlerBinding } from "./types.js";

export type UnionMatch<H> =
  | {
      ok: true;
      binding: HandlerBinding<H>;
      message: MessageEnvelope & { payload: unknown };
    }
  | { ok: false; action: string | undefined; issues: ErrorDetail[] };

export class DiscriminatedUnion<H = unknown> {
  readonly direction: Direction;
  private readonly bindings: ReadonlyMap<string, HandlerBinding<H>>;

  constructor(
    table: HandlerTable<H>,
    private readonly field: string,
    private readonly validator: ValidatorAdapter,
  ) {
    this.direction = table.direction;
    this.bindings = new Map(table.list());
  }

  /** Discriminator values accepted by this union, in registration order. */
  get actions(): readonly string[] {
    return Array.from(this.bindings.keys());
  }

  /**
   * Match a decoded frame to a binding and validate its payload.
   */
  match(frame: WireFrame): UnionMatch<H> {
    const value = frame[this.field];

    if (value === undefined) {
      return {
        ok: false,
        action: undefined,
        issues: [
          {
            type: "missing_discriminator",
            loc: [this.field],
            msg: `Unable to extract tag using discriminator '${this.field}'`,
          },
        ],
      };
    }

    const binding = typeof value === "string" ? this.bindings.get(value) : undefined;
    if (typeof value !== "string" || !binding) {
      const expected = this.actions.map((a) => `'${a}'`).join(", ");
      return {
        ok: false,
        action: typeof value === "string" ? value : undefined,
        issues: [
          {
            type: "unknown_discriminator",
            loc: [this.field],
            msg: `Input tag '${String(value)}' found using '${this.field}' does not match any of the expected tags: ${expected}`,
          },
        ],
      };
    }

    const result = this.validator.validatePayload(binding.input, frame.payload);
    if (!result.ok) {
      return { ok: false, action: value, issues: result.issues };
    }

    return {
      ok: true,
      binding,
      message: { type: value, payload: result.value },
    };
  }
}
