// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Client message dispatch: decode → match → middleware → handler → reply →
 * completion. Runs as one unit of work on the connection's mailbox.
 *
 * Validation failures are answered with an error frame only. Handler
 * failures are logged, answered with a generic error frame and followed by
 * `complete` like any other unit. Transport failures propagate to the caller.
 */

import type { Connection, ConnectionData } from "../connection/connection.js";
import { GENERIC_HANDLER_ERROR } from "../constants.js";
import {
  ConnectionStateError,
  TransportError,
  ValidationError,
  describeError,
} from "../error.js";
import { LOG_CONTEXT } from "../logger.js";
import {
  actionOf,
  decodeFrame,
  encodeFrame,
  errorFrame,
  markerFrame,
} from "../protocol/frame.js";
import type { HandlerInput } from "../protocol/message-descriptor.js";
import type { DiscriminatedUnion } from "../registry/discriminated-union.js";
import { SYSTEM_ACTIONS } from "../schema/reserved.js";
import {
  createMessageContext,
  createUnit,
  type DispatchRuntime,
  type UnitOfWork,
} from "./context.js";
import type { AnyClientHandler, HandlerContext } from "./types.js";

type Pipeline<TData extends ConnectionData> = (
  ctx: HandlerContext<HandlerInput, TData>,
  next: () => Promise<void>,
) => Promise<void>;

export class Dispatcher<TData extends ConnectionData> {
  constructor(
    private readonly rt: DispatchRuntime<TData>,
    private readonly union: DiscriminatedUnion<AnyClientHandler<TData>>,
    private readonly pipeline: Pipeline<TData>,
  ) {}

  /**
   * Process one raw client frame for a connection.
   */
  async dispatch(connection: Connection<TData>, raw: unknown): Promise<void> {
    const { config } = this.rt;
    const field = config.discriminatorField;
    const unit = createUnit(config.logger, { address: connection.address });

    const decoded = decodeFrame(raw);
    if (!decoded.ok) {
      this.reject(connection, unit, new ValidationError(decoded.issues));
      return;
    }

    const action = actionOf(field, decoded.frame);
    if (
      config.logReceivedMessages &&
      (action === undefined || !config.ignoredDiscriminatorsForLogging.has(action))
    ) {
      unit.logger.info(LOG_CONTEXT.MESSAGE, "Received websocket json", { action });
    }

    const match = this.union.match(decoded.frame);
    if (!match.ok) {
      this.reject(connection, unit, new ValidationError(match.issues, { action }));
      return;
    }

    const { binding, message } = match;
    const ctx = createMessageContext(this.rt, connection, unit, message);

    try {
      let result: unknown;
      await this.pipeline(ctx, async () => {
        result = await binding.handler(ctx);
      });
      const reply = this.rt.outbound.resolveReturn(binding, result);
      if (reply) {
        connection.sendFrame(encodeFrame(field, reply));
      }
    } catch (err) {
      if (err instanceof TransportError || err instanceof ConnectionStateError) {
        throw err;
      }
      unit.logger.error(LOG_CONTEXT.MESSAGE, GENERIC_HANDLER_ERROR, {
        action: binding.action,
        handler: binding.metadata.name,
        error: describeError(err),
      });
      connection.sendFrame(
        errorFrame(field, [{ type: "handler_error", loc: [], msg: GENERIC_HANDLER_ERROR }]),
      );
    }

    this.complete(connection, unit);
  }

  private reject(
    connection: Connection<TData>,
    unit: UnitOfWork,
    error: ValidationError,
  ): void {
    unit.logger.warn(LOG_CONTEXT.VALIDATION, "Rejected client message", {
      ...error.details,
      issues: error.issues,
    });
    connection.sendFrame(errorFrame(this.rt.config.discriminatorField, error.issues));
  }

  private complete(connection: Connection<TData>, unit: UnitOfWork): void {
    const { completionSignalsEnabled, discriminatorField } = this.rt.config;
    if (!completionSignalsEnabled) return;
    connection.sendFrame(markerFrame(discriminatorField, SYSTEM_ACTIONS.COMPLETE));
    if (unit.broadcasts > 0) {
      connection.sendFrame(markerFrame(discriminatorField, SYSTEM_ACTIONS.GROUP_COMPLETE));
    }
  }
}
