// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Outbound message construction: builds messages from schemas and checks
 * handler return values against the binding's declared outputs.
 */

import type { ValidatorAdapter } from "../capabilities/validation/contracts.js";
import type { ConsumerConfig } from "../config.js";
import { HandlerError } from "../error.js";
import type { MessageEnvelope } from "../protocol/frame.js";
import type { AnyMessageSchema } from "../protocol/message-descriptor.js";
import { getSchemaOpts } from "../schema/metadata.js";
import type { HandlerBinding } from "../registry/types.js";
import { isPlainObject } from "../utils/json.js";

export class Outbound {
  constructor(
    private readonly config: ConsumerConfig,
    private readonly validator: ValidatorAdapter,
  ) {}

  /**
   * Build a message from a schema, validating the payload unless outgoing
   * validation is off (per schema, then per consumer).
   */
  build(schema: AnyMessageSchema, payload: unknown): MessageEnvelope {
    const validate =
      getSchemaOpts(schema)?.validateOutgoing ?? this.config.validateOutgoing;
    if (!validate) {
      return { type: schema.messageType, payload };
    }

    const result = this.validator.validateOutgoing(schema, payload);
    if (!result.ok) {
      throw new HandlerError(
        `Outgoing "${schema.messageType}" payload failed validation`,
        { action: schema.messageType, issues: result.issues },
      );
    }
    return { type: schema.messageType, payload: result.value };
  }

  /**
   * Interpret a handler's return value.
   *
   * - undefined/null: nothing to send
   * - declared `returns`: the message type must be one of them; the payload
   *   is validated like build()
   * - nothing declared: any `{ type, payload? }` object is accepted as is
   *
   * Anything else is a HandlerError.
   */
  resolveReturn(
    binding: HandlerBinding<unknown>,
    value: unknown,
  ): MessageEnvelope | undefined {
    if (value === undefined || value === null) return undefined;

    if (!isPlainObject(value) || typeof value.type !== "string") {
      throw new HandlerError(
        `Handler "${binding.metadata.name}" returned a value that is not a message`,
        { action: binding.action },
      );
    }

    const type = value.type;
    if (binding.returns.length === 0) {
      return { type, payload: value.payload };
    }

    const schema = binding.returns.find((s) => s.messageType === type);
    if (!schema) {
      throw new HandlerError(
        `Handler "${binding.metadata.name}" returned "${type}", expected ${binding.returns
          .map((s) => `"${s.messageType}"`)
          .join(" | ")}`,
        { action: binding.action, returned: type },
      );
    }
    return this.build(schema, value.payload);
  }
}
