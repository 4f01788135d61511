// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @switchboard/core - typed message and event dispatch for WebSocket
 * connections.
 *
 * Public API surface:
 * - createConsumer() → Consumer (on/event/use/include/accept/receive/...)
 * - MessageDescriptor → runtime shape every validator package produces
 * - ValidatorAdapter, ChannelLayer → contracts for validators and transports
 * - Errors, logger and configuration
 *
 * Validator packages (@switchboard/zod, @switchboard/valibot) re-export
 * createConsumer with their validator pre-bound.
 */

// Consumer
export { createConsumer } from "./core/createConsumer.js";
export type { CreateConsumerOptions } from "./core/createConsumer.js";
export { Consumer } from "./core/consumer.js";
export type {
  BroadcastEventOptions,
  ConsumerHooks,
  ConsumerInit,
  EventCall,
  EventTap,
  SendToGroupsOptions,
} from "./core/consumer.js";
export { AuthRejection, reject } from "./core/auth.js";
export type {
  Authenticate,
  AuthOutcome,
  AuthRejectionInit,
  AuthStatus,
} from "./core/auth.js";

// Connections
export { Connection } from "./connection/connection.js";
export type {
  ConnectionData,
  ConnectionInit,
  Identity,
} from "./connection/connection.js";
export { canTransition } from "./connection/state.js";
export type { ConnectionState } from "./connection/state.js";
export { Mailbox } from "./connection/mailbox.js";

// Handlers and middleware
export type {
  AnyClientHandler,
  AnyEventHandler,
  Awaitable,
  BroadcastEventContext,
  ClientHandler,
  EventContext,
  EventHandler,
  HandlerContext,
  HandlerReturn,
  InboundMessage,
  Middleware,
  UnicastEventContext,
} from "./engine/types.js";
export { composePipeline } from "./engine/middleware.js";
export { resolveGroupDelivery } from "./engine/enricher.js";
export type {
  BroadcastOptions,
  Recipient,
  RelevanceFlags,
} from "./engine/enricher.js";
export type { EventRouteTarget } from "./engine/event-router.js";

// Registry
export { normalizeAction } from "./registry/normalize.js";
export { HandlerTable } from "./registry/handler-table.js";
export type { HandlerTableOptions } from "./registry/handler-table.js";
export { DiscriminatedUnion } from "./registry/discriminated-union.js";
export type { UnionMatch } from "./registry/discriminated-union.js";
export { SchemaRegistry, createBinding } from "./registry/schema-registry.js";
export type {
  BindingDescription,
  Direction,
  HandlerBinding,
  HandlerMetadata,
  HandlerOptions,
  ReturnsSpec,
} from "./registry/types.js";

// Schema runtime shape
export {
  assertMessageDescriptor,
  isMessageDescriptor,
} from "./protocol/message-descriptor.js";
export type {
  AnyMessageSchema,
  HandlerInput,
  InferPayload,
  InferType,
  Message,
  MessageDescriptor,
  MessageOf,
  MessageSchema,
  PayloadArgs,
  PayloadSchema,
} from "./protocol/message-descriptor.js";
export {
  DESCRIPTOR,
  SCHEMA_OPTS,
  attachDescriptor,
  getDescriptor,
  getSchemaOpts,
  typeOf,
} from "./schema/metadata.js";
export type { DescriptorValue, SchemaOpts } from "./schema/metadata.js";
export { SYSTEM_ACTIONS, isCompletionAction, isReserved } from "./schema/reserved.js";
export type { SystemAction } from "./schema/reserved.js";

// Wire frames
export {
  actionOf,
  decodeFrame,
  encodeFrame,
  errorFrame,
  markerFrame,
} from "./protocol/frame.js";
export type { DecodeOutcome, MessageEnvelope, WireFrame } from "./protocol/frame.js";

// Capability contracts
export type {
  ValidationResult,
  ValidatorAdapter,
} from "./capabilities/validation/contracts.js";
export { NO_ORIGIN, isLayerEnvelope } from "./channel-layer/contracts.js";
export type {
  BroadcastOrigin,
  ChannelLayer,
  Deliver,
  EventEnvelope,
  FrameEnvelope,
  GroupMemberEnvelope,
  LayerEnvelope,
} from "./channel-layer/contracts.js";
export { EMPTY_REQUEST } from "./ws/platform-adapter.js";
export type { ConnectionRequest, ServerSocket } from "./ws/platform-adapter.js";

// Configuration
export { resolveConfig } from "./config.js";
export type { ConsumerConfig, ConsumerConfigOptions } from "./config.js";
export { CLOSE_CODES, DEFAULTS, GENERIC_HANDLER_ERROR } from "./constants.js";

// Errors
export {
  ConnectionStateError,
  ConstructionError,
  ERROR_CODE_META,
  ErrorCode,
  HandlerError,
  RoutingError,
  SwitchboardError,
  TransportError,
  ValidationError,
  describeError,
  isSwitchboardError,
} from "./error.js";
export type { ErrorCodeMetadata, ErrorCodeValue, ErrorDetail } from "./error.js";

// Logging
export {
  DefaultLoggerAdapter,
  LOG_CONTEXT,
  bindLogger,
  createLogger,
} from "./logger.js";
export type { LoggerAdapter, LoggerOptions, LogLevel } from "./logger.js";

// Utilities
export { isPlainObject, safeJsonParse } from "./utils/json.js";
export type { ParseOutcome } from "./utils/json.js";
