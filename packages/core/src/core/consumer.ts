// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Consumer: the handler declarations of one kind of connection, plus the
 * live connections this process serves for it.
 *
 * Declarations (`on`, `event`, `use`, `include`) are accepted until the
 * consumer is sealed, either explicitly or by the first accepted connection.
 * Sealing builds the two discriminated unions, which are then shared
 * read-only by every connection.
 */

import { v7 as uuidv7 } from "uuid";
import type { ValidatorAdapter } from "../capabilities/validation/contracts.js";
import {
  NO_ORIGIN,
  type BroadcastOrigin,
  type ChannelLayer,
  type LayerEnvelope,
} from "../channel-layer/contracts.js";
import type { ConsumerConfig } from "../config.js";
import {
  Connection,
  type ConnectionData,
} from "../connection/connection.js";
import { CLOSE_CODES } from "../constants.js";
import { Dispatcher } from "../engine/dispatch.js";
import { resolveGroupDelivery, GroupBroadcastEnricher } from "../engine/enricher.js";
import { EventRouter } from "../engine/event-router.js";
import { composePipeline } from "../engine/middleware.js";
import { Outbound } from "../engine/outbound.js";
import type { DispatchRuntime } from "../engine/context.js";
import type {
  AnyClientHandler,
  AnyEventHandler,
  Awaitable,
  ClientHandler,
  EventHandler,
  Middleware,
} from "../engine/types.js";
import { ConstructionError, TransportError, describeError } from "../error.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import { encodeFrame, markerFrame, type MessageEnvelope } from "../protocol/frame.js";
import type {
  AnyMessageSchema,
  HandlerInput,
  InferPayload,
} from "../protocol/message-descriptor.js";
import type { HandlerTableOptions } from "../registry/handler-table.js";
import { SchemaRegistry, createBinding } from "../registry/schema-registry.js";
import type {
  BindingDescription,
  HandlerOptions,
  ReturnsSpec,
} from "../registry/types.js";
import { SYSTEM_ACTIONS } from "../schema/reserved.js";
import {
  EMPTY_REQUEST,
  type ConnectionRequest,
  type ServerSocket,
} from "../ws/platform-adapter.js";
import {
  AUTH_OK,
  AuthRejection,
  authenticationFrame,
  type AuthOutcome,
  type Authenticate,
} from "./auth.js";

export interface ConsumerHooks<TData extends ConnectionData> {
  /** Authentication gate (default: every connection is anonymous) */
  authenticate?: Authenticate<TData>;

  /** Groups an authenticated connection joins */
  buildGroups?: (connection: Connection<TData>) => Awaitable<Iterable<string>>;

  /** Runs after the groups are joined */
  onAuthenticated?: (connection: Connection<TData>) => Awaitable<void>;

  /** Runs while the connection is closing, after it left its groups */
  onDisconnect?: (connection: Connection<TData>) => Awaitable<void>;
}

export interface ConsumerInit<TData extends ConnectionData>
  extends ConsumerHooks<TData> {
  validator: ValidatorAdapter;
  layer: ChannelLayer;
  config: ConsumerConfig;
}

/**
 * Event calls observed by taps (see `captureBroadcastEvents`).
 */
export type EventCall =
  | { readonly mode: "unicast"; readonly address: string; readonly event: MessageEnvelope }
  | {
      readonly mode: "broadcast";
      readonly groups: readonly string[];
      readonly origin: BroadcastOrigin;
      readonly event: MessageEnvelope;
    };

export interface EventTap {
  readonly record: (call: EventCall) => void;
  /** Skip delivery while the tap is installed */
  readonly suppress: boolean;
}

export interface BroadcastEventOptions {
  /** Origin used for isMine/isCurrent (default: none) */
  origin?: BroadcastOrigin;
}

export interface SendToGroupsOptions extends BroadcastEventOptions {
  excludeOrigin?: boolean;
  enrich?: boolean;
}

interface Sealed<TData extends ConnectionData> {
  readonly dispatcher: Dispatcher<TData>;
  readonly router: EventRouter<TData>;
}

function isClosing(connection: { readonly state: string }): boolean {
  return connection.state === "closing" || connection.state === "closed";
}

export class Consumer<TData extends ConnectionData = ConnectionData>
  implements DispatchRuntime<TData>
{
  readonly config: ConsumerConfig;
  readonly layer: ChannelLayer;
  readonly validator: ValidatorAdapter;
  readonly outbound: Outbound;
  readonly enricher: GroupBroadcastEnricher;

  private readonly registry = new SchemaRegistry<
    AnyClientHandler<TData>,
    AnyEventHandler<TData>
  >();
  private readonly middlewares: Middleware<TData>[] = [];
  private readonly hooks: ConsumerHooks<TData>;
  private readonly live = new Map<string, Connection<TData>>();
  private readonly taps = new Set<EventTap>();
  private sealedState: Sealed<TData> | undefined;

  constructor(init: ConsumerInit<TData>) {
    this.config = init.config;
    this.layer = init.layer;
    this.validator = init.validator;
    this.hooks = {
      ...(init.authenticate && { authenticate: init.authenticate }),
      ...(init.buildGroups && { buildGroups: init.buildGroups }),
      ...(init.onAuthenticated && { onAuthenticated: init.onAuthenticated }),
      ...(init.onDisconnect && { onDisconnect: init.onDisconnect }),
    };
    this.outbound = new Outbound(this.config, this.validator);
    this.enricher = new GroupBroadcastEnricher(this.layer, this.logger);
  }

  get logger(): LoggerAdapter {
    return this.config.logger;
  }

  /** Connections served by this process, by address. */
  get connections(): ReadonlyMap<string, Connection<TData>> {
    return this.live;
  }

  get isSealed(): boolean {
    return this.sealedState !== undefined;
  }

  // Declarations

  /**
   * Declare a client message handler.
   *
   * ```ts
   * consumer.on(Ping, () => ({ type: "pong" }), { returns: Pong });
   * ```
   */
  on<S extends HandlerInput, R extends ReturnsSpec | undefined = undefined>(
    input: S,
    handler: ClientHandler<S, R, TData>,
    options?: HandlerOptions<R>,
  ): this {
    this.assertSchema(input, options?.name ?? handler.name);
    this.registry.addClient(
      createBinding<AnyClientHandler<TData>>("client", input, handler, options),
    );
    return this;
  }

  /**
   * Declare an event handler. Events reach it through sendEvent() or
   * broadcastEvent(), never from the client socket.
   */
  event<S extends HandlerInput, R extends ReturnsSpec | undefined = undefined>(
    input: S,
    handler: EventHandler<S, R, TData>,
    options?: HandlerOptions<R>,
  ): this {
    this.assertSchema(input, options?.name ?? handler.name);
    this.registry.addEvent(
      createBinding<AnyEventHandler<TData>>("event", input, handler, options),
    );
    return this;
  }

  /**
   * Add middleware around client message handlers.
   */
  use(middleware: Middleware<TData>): this {
    this.assertOpenForDeclarations();
    this.middlewares.push(middleware);
    return this;
  }

  /**
   * Merge another consumer's handler declarations into this one. Only
   * handlers are taken: middleware the other consumer registered with
   * `use()` stays behind, and this consumer's own middleware wraps the
   * included client handlers.
   */
  include(other: Consumer<TData>, options?: HandlerTableOptions): this {
    this.assertOpenForDeclarations();
    this.registry.merge(other.registry, options);
    return this;
  }

  describe(): readonly BindingDescription[] {
    return this.registry.describe();
  }

  /**
   * Seal declarations and build the unions. Idempotent; called by the first
   * accept().
   */
  seal(): this {
    this.sealed();
    return this;
  }

  // Connection lifecycle

  /**
   * Accept a socket: register its address, run the authentication gate and
   * either open the connection (joining its groups) or close it.
   */
  async accept(
    socket: ServerSocket,
    request: ConnectionRequest = EMPTY_REQUEST,
  ): Promise<Connection<TData>> {
    this.sealed();
    const connection = new Connection<TData>({
      address: uuidv7(),
      socket,
      request,
      config: this.config,
    });
    const log = { address: connection.address };

    try {
      await this.layer.register(connection.address, (envelope) =>
        this.deliver(connection, envelope),
      );
    } catch (err) {
      connection.beginClose(CLOSE_CODES.INTERNAL_ERROR, "Channel layer unavailable");
      connection.finishClose();
      throw TransportError.wrap(err, "register", { ...log, layer: this.layer.name });
    }
    this.live.set(connection.address, connection);
    this.logger.debug(LOG_CONTEXT.CONNECTION, "Connection accepted", log);

    connection.transition("authenticating");
    const outcome = await this.runGate(connection);
    if (connection.state !== "authenticating") {
      // Closed while the gate was running
      return connection;
    }

    if (outcome instanceof AuthRejection) {
      this.logger.info(LOG_CONTEXT.AUTH, "Authentication rejected", {
        ...log,
        statusCode: outcome.statusCode,
        reason: outcome.reason,
      });
      if (this.config.sendAuthenticationMessage) {
        connection.sendFrame(authenticationFrame(this.config.discriminatorField, outcome));
      }
      await this.disconnect(
        connection,
        outcome.code ?? this.config.authRejectionCode,
        outcome.reason,
      );
      return connection;
    }

    connection.setIdentity(outcome);
    connection.transition("open");

    try {
      await connection.mailbox.enqueue(() => this.completeAuthentication(connection));
    } catch (err) {
      this.logger.error(LOG_CONTEXT.CONNECTION, "Failed to set up connection", {
        ...log,
        error: describeError(err),
      });
      await this.disconnect(connection, CLOSE_CODES.INTERNAL_ERROR, "Setup failed");
      throw err;
    }
    return connection;
  }

  /**
   * Queue a raw client frame for dispatch. Frames for a connection that is
   * not open are dropped.
   */
  receive(connection: Connection<TData>, raw: unknown): Promise<void> {
    if (!connection.isOpen) {
      this.logger.debug(LOG_CONTEXT.CONNECTION, "Dropped message for connection that is not open", {
        address: connection.address,
        state: connection.state,
      });
      return Promise.resolve();
    }
    connection.touch();
    const { dispatcher } = this.sealed();
    return connection.mailbox
      .enqueue(() => dispatcher.dispatch(connection, raw))
      .then(() => undefined);
  }

  /**
   * Close a connection: leave its groups, unregister its address, run
   * onDisconnect and close the socket. Idempotent. Channel-layer failures
   * during cleanup are logged, not thrown.
   */
  async disconnect(
    connection: Connection<TData>,
    code: number = CLOSE_CODES.NORMAL,
    reason = "",
  ): Promise<void> {
    if (!connection.beginClose(code, reason)) return;
    const log = { address: connection.address, code, reason };

    for (const group of Array.from(connection.groups)) {
      try {
        await this.layer.leaveGroup(group, connection.address);
      } catch (err) {
        this.logger.warn(LOG_CONTEXT.TRANSPORT, "Failed to leave group on disconnect", {
          ...log,
          group,
          error: describeError(err),
        });
      }
      connection.removeGroup(group);
    }

    try {
      await this.layer.unregister(connection.address);
    } catch (err) {
      this.logger.warn(LOG_CONTEXT.TRANSPORT, "Failed to unregister connection", {
        ...log,
        error: describeError(err),
      });
    }
    this.live.delete(connection.address);

    if (this.hooks.onDisconnect) {
      try {
        await this.hooks.onDisconnect(connection);
      } catch (err) {
        this.logger.error(LOG_CONTEXT.CONNECTION, "onDisconnect failed", {
          ...log,
          error: describeError(err),
        });
      }
    }

    connection.finishClose();
    this.logger.debug(LOG_CONTEXT.CONNECTION, "Connection closed", log);
  }

  // Group membership

  /**
   * Join a group. A connection that is closing or closed never joins; a
   * disconnect that lands while the layer call is pending undoes the join.
   */
  async joinGroup(connection: Connection<TData>, group: string): Promise<void> {
    const log = { group, address: connection.address };
    if (isClosing(connection)) {
      this.logger.debug(LOG_CONTEXT.CONNECTION, "Ignored group join after close", log);
      return;
    }
    try {
      await this.layer.joinGroup(group, connection.address);
    } catch (err) {
      throw TransportError.wrap(err, "joinGroup", { ...log, layer: this.layer.name });
    }
    if (isClosing(connection)) {
      try {
        await this.layer.leaveGroup(group, connection.address);
      } catch (err) {
        this.logger.warn(LOG_CONTEXT.TRANSPORT, "Failed to leave group on disconnect", {
          ...log,
          error: describeError(err),
        });
      }
      return;
    }
    connection.addGroup(group);
  }

  async leaveGroup(connection: Connection<TData>, group: string): Promise<void> {
    try {
      await this.layer.leaveGroup(group, connection.address);
    } catch (err) {
      throw TransportError.wrap(err, "leaveGroup", {
        group,
        address: connection.address,
        layer: this.layer.name,
      });
    }
    connection.removeGroup(group);
  }

  // Sending from outside a connection

  /**
   * Send an event to one connection. Its handler runs on that connection's
   * mailbox, wherever the connection lives.
   */
  async sendEvent<M extends AnyMessageSchema>(
    address: string,
    schema: M,
    payload: InferPayload<M>,
  ): Promise<void> {
    const event = eventOf(schema, payload);
    if (this.tap({ mode: "unicast", address, event })) return;
    await this.deliverTo(address, { kind: "event", event });
  }

  /**
   * Run an event handler once for a set of groups, in the calling process.
   * The handler gets no recipient connection (`ctx.connection` is null), so
   * it cannot read or close a member. A returned message is broadcast to the
   * same groups with the given origin. For work on each member's own
   * connection, call `sendEvent` once per address.
   */
  async broadcastEvent<M extends AnyMessageSchema>(
    groups: string | Iterable<string>,
    schema: M,
    payload: InferPayload<M>,
    options: BroadcastEventOptions = {},
  ): Promise<void> {
    const event = eventOf(schema, payload);
    const targets = Array.from(new Set(typeof groups === "string" ? [groups] : groups));
    const origin = options.origin ?? NO_ORIGIN;
    if (this.tap({ mode: "broadcast", groups: targets, origin, event })) return;

    const { router } = this.sealed();
    await router.route(encodeFrame(this.config.discriminatorField, event), {
      mode: "broadcast",
      groups: targets,
      origin,
    });
  }

  /**
   * Send a message to groups from outside any connection. Recipients see
   * `isMine`/`isCurrent` computed against `options.origin` (both false by
   * default).
   */
  async sendToGroups<M extends AnyMessageSchema>(
    groups: string | Iterable<string>,
    schema: M,
    payload: InferPayload<M>,
    options: SendToGroupsOptions = {},
  ): Promise<void> {
    const message = this.outbound.build(schema, payload);
    await this.enricher.broadcast(
      options.origin ?? NO_ORIGIN,
      message,
      typeof groups === "string" ? [groups] : groups,
      options,
    );
  }

  /**
   * Push a message to one connection, wherever it lives.
   */
  async sendToConnection<M extends AnyMessageSchema>(
    address: string,
    schema: M,
    payload: InferPayload<M>,
  ): Promise<void> {
    const message = this.outbound.build(schema, payload);
    await this.deliverTo(address, { kind: "frame", message });
  }

  /** @internal */
  async deliverTo(address: string, envelope: LayerEnvelope): Promise<void> {
    try {
      await this.layer.sendToConnection(address, envelope);
    } catch (err) {
      throw TransportError.wrap(err, "sendToConnection", {
        address,
        kind: envelope.kind,
        layer: this.layer.name,
      });
    }
  }

  /**
   * Observe sendEvent()/broadcastEvent() calls. Returns a function that
   * removes the tap.
   */
  tapEvents(tap: EventTap): () => void {
    this.taps.add(tap);
    return () => {
      this.taps.delete(tap);
    };
  }

  /**
   * Resolve once every unit queued on the local connections has settled.
   */
  async idle(): Promise<void> {
    await Promise.all(Array.from(this.live.values(), (c) => c.mailbox.idle()));
  }

  /**
   * Disconnect every local connection (1001 Going Away).
   */
  async close(): Promise<void> {
    for (const connection of Array.from(this.live.values())) {
      await this.disconnect(connection, CLOSE_CODES.GOING_AWAY, "Server shutting down");
    }
  }

  // Internals

  /**
   * Layer delivery callback for one local connection.
   */
  private deliver(connection: Connection<TData>, envelope: LayerEnvelope): void {
    if (!connection.isOpen) {
      this.logger.debug(LOG_CONTEXT.CONNECTION, "Dropped delivery for connection that is not open", {
        address: connection.address,
        kind: envelope.kind,
        state: connection.state,
      });
      return;
    }

    const field = this.config.discriminatorField;
    switch (envelope.kind) {
      case "group_member": {
        const delivery = resolveGroupDelivery(envelope, {
          address: connection.address,
          identity: connection.identity,
        });
        if (!delivery) return;
        connection.sendFrame(encodeFrame(field, envelope.message, delivery.flags));
        if (this.config.completionSignalsEnabled && !delivery.isCurrent) {
          connection.sendFrame(markerFrame(field, SYSTEM_ACTIONS.GROUP_COMPLETE));
        }
        return;
      }
      case "frame":
        connection.sendFrame(encodeFrame(field, envelope.message));
        return;
      case "event": {
        const { router } = this.sealed();
        const raw = encodeFrame(field, envelope.event);
        void connection.mailbox
          .enqueue(() => router.route(raw, { mode: "unicast", connection }))
          .catch((err: unknown) => {
            this.logger.error(LOG_CONTEXT.EVENT, "Failed to process channel event", {
              address: connection.address,
              action: envelope.event.type,
              error: describeError(err),
            });
          });
        return;
      }
      default: {
        const unknownKind: never = envelope;
        this.logger.warn(LOG_CONTEXT.TRANSPORT, "Unknown envelope kind", {
          envelope: unknownKind,
        });
      }
    }
  }

  private async runGate(connection: Connection<TData>): Promise<AuthOutcome> {
    const { authenticate } = this.hooks;
    if (!authenticate) return null;
    try {
      return await authenticate(connection.request, connection);
    } catch (err) {
      this.logger.error(LOG_CONTEXT.AUTH, "Authentication gate failed", {
        address: connection.address,
        error: describeError(err),
      });
      return new AuthRejection({ reason: "Authentication failed", statusCode: 500 });
    }
  }

  private async completeAuthentication(connection: Connection<TData>): Promise<void> {
    const groups = this.hooks.buildGroups ? await this.hooks.buildGroups(connection) : [];
    for (const group of groups) {
      await this.joinGroup(connection, group);
    }
    if (this.hooks.onAuthenticated) {
      await this.hooks.onAuthenticated(connection);
    }
    if (this.config.sendAuthenticationMessage) {
      connection.sendFrame(authenticationFrame(this.config.discriminatorField, AUTH_OK));
    }
    this.logger.info(LOG_CONTEXT.AUTH, "Connection authenticated", {
      address: connection.address,
      identity: connection.identity?.id ?? null,
      groups: Array.from(connection.groups),
    });
  }

  private tap(call: EventCall): boolean {
    let suppressed = false;
    for (const tap of this.taps) {
      tap.record(call);
      suppressed ||= tap.suppress;
    }
    return suppressed;
  }

  private sealed(): Sealed<TData> {
    if (!this.sealedState) {
      const unions = this.registry.seal(this.config.discriminatorField, this.validator);
      this.sealedState = {
        dispatcher: new Dispatcher(this, unions.client, composePipeline(this.middlewares)),
        router: new EventRouter(this, unions.event),
      };
    }
    return this.sealedState;
  }

  private assertSchema(input: HandlerInput, name: string): void {
    if (!this.validator.isSchema(input)) {
      throw new ConstructionError(
        `Handler "${name}" was declared with a schema the ${this.validator.name} validator does not recognise.`,
      );
    }
  }

  private assertOpenForDeclarations(): void {
    if (this.isSealed) {
      throw new ConstructionError(
        "The consumer is sealed; declare handlers and middleware before accepting connections.",
      );
    }
  }
}

function eventOf(schema: AnyMessageSchema, payload: unknown): MessageEnvelope {
  return payload === undefined
    ? { type: schema.messageType }
    : { type: schema.messageType, payload };
}
