// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Handler, context and middleware types for the dispatch pipeline.
 */

import type { BroadcastOrigin } from "../channel-layer/contracts.js";
import type {
  Connection,
  ConnectionData,
  Identity,
} from "../connection/connection.js";
import type { LoggerAdapter } from "../logger.js";
import type { MessageEnvelope } from "../protocol/frame.js";
import type {
  AnyMessageSchema,
  HandlerInput,
  InferPayload,
  MessageOf,
  PayloadArgs,
} from "../protocol/message-descriptor.js";
import type { ReturnsSpec } from "../registry/types.js";
import type { BroadcastOptions } from "./enricher.js";

export type Awaitable<T> = T | Promise<T>;

/**
 * What a handler may return: a message matching its declared `returns`, any
 * message when nothing is declared, or nothing.
 */
export type HandlerReturn<R extends ReturnsSpec | undefined> = [R] extends [undefined]
  ? void | MessageEnvelope
  : void | MessageOf<R>;

/**
 * Validated inbound message or event.
 */
export interface InboundMessage<TPayload = unknown> {
  readonly type: string;
  readonly payload: TPayload;
}

/**
 * Operations shared by every handler context.
 */
interface ContextBase<S extends HandlerInput> {
  /** Discriminator value that selected this handler */
  readonly action: string;

  /** Validated payload */
  readonly payload: InferPayload<S>;

  /** The validated message as a whole */
  readonly message: InboundMessage<InferPayload<S>>;

  /** Short id of this unit of work, bound into its log entries */
  readonly messageId: string;

  /** Logger bound to this unit of work */
  readonly logger: LoggerAdapter;

  /**
   * Broadcast to groups through the enricher. Defaults to the origin's
   * groups (or the event's groups for broadcast events).
   */
  broadcast<M extends AnyMessageSchema>(
    schema: M,
    payload: InferPayload<M>,
    options?: BroadcastOptions,
  ): Promise<void>;

  /**
   * Push a message to any connection address through the channel layer.
   */
  sendTo<M extends AnyMessageSchema>(
    address: string,
    schema: M,
    payload: InferPayload<M>,
  ): Promise<void>;
}

/**
 * Operations available while a specific connection is being served.
 */
interface ConnectionScope<TData extends ConnectionData> {
  readonly connection: Connection<TData>;
  readonly identity: Identity | null;

  /** Aborted when the connection starts closing */
  readonly signal: AbortSignal;

  /** Send a message to this connection only. */
  send<M extends AnyMessageSchema>(schema: M, ...args: PayloadArgs<M>): void;

  /** Join a group (layer + local membership). */
  join(group: string): Promise<void>;

  /** Leave a group (layer + local membership). */
  leave(group: string): Promise<void>;
}

/**
 * Context passed to client message handlers.
 */
export interface HandlerContext<
  S extends HandlerInput = HandlerInput,
  TData extends ConnectionData = ConnectionData,
> extends ContextBase<S>,
    ConnectionScope<TData> {
  readonly kind: "message";
}

/**
 * Context for an event delivered to one connection via sendEvent().
 */
export interface UnicastEventContext<
  S extends HandlerInput = HandlerInput,
  TData extends ConnectionData = ConnectionData,
> extends ContextBase<S>,
    ConnectionScope<TData> {
  readonly kind: "event";
  readonly mode: "unicast";
}

/**
 * Context for an event dispatched to groups via broadcastEvent().
 * There is no single connection; results go back to the same groups.
 */
export interface BroadcastEventContext<S extends HandlerInput = HandlerInput>
  extends ContextBase<S> {
  readonly kind: "event";
  readonly mode: "broadcast";
  readonly connection: null;
  readonly groups: readonly string[];
  readonly origin: BroadcastOrigin;
}

export type EventContext<
  S extends HandlerInput = HandlerInput,
  TData extends ConnectionData = ConnectionData,
> = UnicastEventContext<S, TData> | BroadcastEventContext<S>;

export type ClientHandler<
  S extends HandlerInput,
  R extends ReturnsSpec | undefined,
  TData extends ConnectionData,
> = (ctx: HandlerContext<S, TData>) => Awaitable<HandlerReturn<R>>;

export type EventHandler<
  S extends HandlerInput,
  R extends ReturnsSpec | undefined,
  TData extends ConnectionData,
> = (ctx: EventContext<S, TData>) => Awaitable<HandlerReturn<R>>;

// Method syntax keeps parameters bivariant so handlers declared for a specific
// schema can be stored next to each other.
type Bivariant<Ctx> = { bivarianceHack(ctx: Ctx): unknown }["bivarianceHack"];

/** Type-erased client handler as stored in a binding. */
export type AnyClientHandler<TData extends ConnectionData = ConnectionData> =
  Bivariant<HandlerContext<HandlerInput, TData>>;

/** Type-erased event handler as stored in a binding. */
export type AnyEventHandler<TData extends ConnectionData = ConnectionData> =
  Bivariant<EventContext<HandlerInput, TData>>;

/**
 * Middleware around client handlers.
 * Order: registration order → handler. Not calling `next()` skips the
 * handler (and its reply).
 */
export type Middleware<TData extends ConnectionData = ConnectionData> = (
  ctx: HandlerContext<HandlerInput, TData>,
  next: () => Promise<void>,
) => Awaitable<void>;
