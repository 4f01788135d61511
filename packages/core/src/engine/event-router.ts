// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Event routing: validates an event against the event union, runs its
 * handler and sends the handler's result according to how the event
 * arrived.
 *
 * - unicast: result goes to the target connection; runs on its mailbox
 * - broadcast: result goes through the enricher to the event's groups,
 *   with the event's origin; runs once, outside any connection
 *
 * Routing failures are logged and never close a connection. The client is
 * only told about them for unicast events, and only when
 * `notifyEventErrors` is on.
 */

import type { BroadcastOrigin } from "../channel-layer/contracts.js";
import type { Connection, ConnectionData } from "../connection/connection.js";
import {
  ConnectionStateError,
  RoutingError,
  TransportError,
  describeError,
  type ErrorDetail,
} from "../error.js";
import { LOG_CONTEXT } from "../logger.js";
import { decodeFrame, encodeFrame, errorFrame, markerFrame } from "../protocol/frame.js";
import type { DiscriminatedUnion } from "../registry/discriminated-union.js";
import { SYSTEM_ACTIONS } from "../schema/reserved.js";
import {
  createBroadcastEventContext,
  createUnicastEventContext,
  createUnit,
  type DispatchRuntime,
  type UnitOfWork,
} from "./context.js";
import type { AnyEventHandler } from "./types.js";

export type EventRouteTarget<TData extends ConnectionData> =
  | { readonly mode: "unicast"; readonly connection: Connection<TData> }
  | {
      readonly mode: "broadcast";
      readonly groups: readonly string[];
      readonly origin: BroadcastOrigin;
    };

const ROUTING_FAILED = "Failed to process channel event";

export class EventRouter<TData extends ConnectionData> {
  constructor(
    private readonly rt: DispatchRuntime<TData>,
    private readonly union: DiscriminatedUnion<AnyEventHandler<TData>>,
  ) {}

  /**
   * Route one raw event. Resolves once the handler and its output have been
   * handed off; rejects only with TransportError or ConnectionStateError.
   */
  async route(raw: unknown, target: EventRouteTarget<TData>): Promise<void> {
    const { config } = this.rt;
    const unit = createUnit(
      config.logger,
      target.mode === "unicast"
        ? { address: target.connection.address, mode: "unicast" }
        : { groups: target.groups, mode: "broadcast" },
    );

    try {
      await this.run(raw, target, unit);
    } catch (err) {
      if (err instanceof TransportError || err instanceof ConnectionStateError) {
        throw err;
      }
      const issues: readonly ErrorDetail[] =
        err instanceof RoutingError
          ? err.issues
          : [{ type: "handler_error", loc: [], msg: ROUTING_FAILED }];
      unit.logger.error(LOG_CONTEXT.EVENT, ROUTING_FAILED, { error: describeError(err) });
      if (target.mode === "unicast" && config.notifyEventErrors) {
        target.connection.sendFrame(errorFrame(config.discriminatorField, issues));
      }
    }

    if (target.mode === "unicast" && config.completionSignalsEnabled) {
      const field = config.discriminatorField;
      target.connection.sendFrame(markerFrame(field, SYSTEM_ACTIONS.EVENT_COMPLETE));
      if (unit.broadcasts > 0) {
        target.connection.sendFrame(markerFrame(field, SYSTEM_ACTIONS.GROUP_COMPLETE));
      }
    }
  }

  private async run(
    raw: unknown,
    target: EventRouteTarget<TData>,
    unit: UnitOfWork,
  ): Promise<void> {
    const field = this.rt.config.discriminatorField;

    const decoded = decodeFrame(raw);
    if (!decoded.ok) {
      throw new RoutingError("Event frame could not be decoded", decoded.issues);
    }

    const match = this.union.match(decoded.frame);
    if (!match.ok) {
      throw new RoutingError(
        match.action === undefined
          ? "Event has no usable discriminator"
          : `Event "${match.action}" failed validation`,
        match.issues,
        { action: match.action },
      );
    }

    const { binding, message } = match;
    unit.logger.debug(LOG_CONTEXT.EVENT, "Routing channel event", {
      action: binding.action,
    });

    if (target.mode === "unicast") {
      const ctx = createUnicastEventContext(this.rt, target.connection, unit, message);
      const reply = this.rt.outbound.resolveReturn(binding, await binding.handler(ctx));
      if (reply) {
        target.connection.sendFrame(encodeFrame(field, reply));
      }
      return;
    }

    const ctx = createBroadcastEventContext(
      this.rt,
      target.groups,
      target.origin,
      unit,
      message,
    );
    const reply = this.rt.outbound.resolveReturn(binding, await binding.handler(ctx));
    if (reply) {
      unit.broadcasts += await this.rt.enricher.broadcast(target.origin, reply, target.groups);
    }
  }
}
