// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Context factories for client message handlers and event handlers.
 *
 * A context is built per unit of work. Its operations go through the
 * runtime the consumer provides (outbound builder, enricher, channel layer)
 * and record broadcasts on the unit so the caller knows whether to emit
 * `group_complete`.
 */

import { v4 as uuidv4 } from "uuid";
import type { BroadcastOrigin, LayerEnvelope } from "../channel-layer/contracts.js";
import type { ConsumerConfig } from "../config.js";
import type { Connection, ConnectionData } from "../connection/connection.js";
import { MESSAGE_ID_LENGTH } from "../constants.js";
import { bindLogger, type LoggerAdapter } from "../logger.js";
import { encodeFrame } from "../protocol/frame.js";
import type {
  AnyMessageSchema,
  HandlerInput,
  InferPayload,
  PayloadArgs,
} from "../protocol/message-descriptor.js";
import type { BroadcastOptions, GroupBroadcastEnricher } from "./enricher.js";
import type { Outbound } from "./outbound.js";
import type {
  BroadcastEventContext,
  HandlerContext,
  InboundMessage,
  UnicastEventContext,
} from "./types.js";

/**
 * What contexts need from the consumer.
 * @internal
 */
export interface DispatchRuntime<TData extends ConnectionData> {
  readonly config: ConsumerConfig;
  readonly outbound: Outbound;
  readonly enricher: GroupBroadcastEnricher;
  joinGroup(connection: Connection<TData>, group: string): Promise<void>;
  leaveGroup(connection: Connection<TData>, group: string): Promise<void>;
  deliverTo(address: string, envelope: LayerEnvelope): Promise<void>;
}

/**
 * Bookkeeping for one unit of work.
 * @internal
 */
export interface UnitOfWork {
  readonly messageId: string;
  readonly logger: LoggerAdapter;
  broadcasts: number;
}

export function createUnit(
  logger: LoggerAdapter,
  bindings: Record<string, unknown>,
): UnitOfWork {
  const messageId = uuidv4().slice(0, MESSAGE_ID_LENGTH);
  return {
    messageId,
    logger: bindLogger(logger, { ...bindings, messageId }),
    broadcasts: 0,
  };
}

/** Broadcast origin for a connection. */
export function originOf(connection: Connection<ConnectionData>): BroadcastOrigin {
  return {
    address: connection.address,
    identityId: connection.identity?.id ?? null,
  };
}

function sharedOps<TData extends ConnectionData>(
  rt: DispatchRuntime<TData>,
  unit: UnitOfWork,
  origin: () => BroadcastOrigin,
  defaultGroups: () => Iterable<string>,
) {
  return {
    async broadcast<M extends AnyMessageSchema>(
      schema: M,
      payload: InferPayload<M>,
      options: BroadcastOptions = {},
    ): Promise<void> {
      const message = rt.outbound.build(schema, payload);
      unit.broadcasts += await rt.enricher.broadcast(
        origin(),
        message,
        options.groups ?? defaultGroups(),
        options,
      );
    },

    async sendTo<M extends AnyMessageSchema>(
      address: string,
      schema: M,
      payload: InferPayload<M>,
    ): Promise<void> {
      const message = rt.outbound.build(schema, payload);
      await rt.deliverTo(address, { kind: "frame", message });
    },
  };
}

function connectionOps<TData extends ConnectionData>(
  rt: DispatchRuntime<TData>,
  connection: Connection<TData>,
) {
  return {
    connection,
    identity: connection.identity,
    signal: connection.signal,

    send<M extends AnyMessageSchema>(schema: M, ...args: PayloadArgs<M>): void {
      const message = rt.outbound.build(schema, args[0]);
      connection.sendFrame(encodeFrame(rt.config.discriminatorField, message));
    },

    join: (group: string) => rt.joinGroup(connection, group),
    leave: (group: string) => rt.leaveGroup(connection, group),
  };
}

export function createMessageContext<TData extends ConnectionData>(
  rt: DispatchRuntime<TData>,
  connection: Connection<TData>,
  unit: UnitOfWork,
  message: InboundMessage,
): HandlerContext<HandlerInput, TData> {
  return {
    kind: "message",
    action: message.type,
    payload: message.payload,
    message,
    messageId: unit.messageId,
    logger: unit.logger,
    ...sharedOps(
      rt,
      unit,
      () => originOf(connection),
      () => connection.groups,
    ),
    ...connectionOps(rt, connection),
  };
}

export function createUnicastEventContext<TData extends ConnectionData>(
  rt: DispatchRuntime<TData>,
  connection: Connection<TData>,
  unit: UnitOfWork,
  event: InboundMessage,
): UnicastEventContext<HandlerInput, TData> {
  return {
    kind: "event",
    mode: "unicast",
    action: event.type,
    payload: event.payload,
    message: event,
    messageId: unit.messageId,
    logger: unit.logger,
    ...sharedOps(
      rt,
      unit,
      () => originOf(connection),
      () => connection.groups,
    ),
    ...connectionOps(rt, connection),
  };
}

export function createBroadcastEventContext<TData extends ConnectionData>(
  rt: DispatchRuntime<TData>,
  groups: readonly string[],
  origin: BroadcastOrigin,
  unit: UnitOfWork,
  event: InboundMessage,
): BroadcastEventContext<HandlerInput> {
  return {
    kind: "event",
    mode: "broadcast",
    connection: null,
    groups,
    origin,
    action: event.type,
    payload: event.payload,
    message: event,
    messageId: unit.messageId,
    logger: unit.logger,
    ...sharedOps(
      rt,
      unit,
      () => origin,
      () => groups,
    ),
  };
}
