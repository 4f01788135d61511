// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Handler bindings: the immutable association between a discriminator value
 * and the function that processes messages or events of that type.
 */

import type {
  AnyMessageSchema,
  HandlerInput,
} from "../protocol/message-descriptor.js";

export type Direction = "client" | "event";

/**
 * Documentation metadata carried by a binding.
 */
export interface HandlerMetadata {
  /** Handler name (function name unless given explicitly) */
  readonly name: string;
  readonly summary?: string;
  readonly description?: string;
  readonly tags: readonly string[];
}

/**
 * Schemas a handler may return, as one schema or a list.
 */
export type ReturnsSpec = AnyMessageSchema | readonly AnyMessageSchema[];

/**
 * Options accepted next to a handler when it is declared.
 */
export interface HandlerOptions<R extends ReturnsSpec | undefined = undefined> {
  /**
   * Discriminator value. Defaults to the input schema's type, or to the
   * normalized handler name for payload-only schemas.
   */
  action?: string;

  /** Handler name for metadata and the default discriminator */
  name?: string;

  /**
   * Schemas the returned value must match. The return value is validated
   * and unicast to the originating connection.
   */
  returns?: R;

  /**
   * Documented output schemas for handlers that produce output themselves
   * (e.g. broadcasts). Documentation only; must cover `returns` when both
   * are given.
   */
  output?: ReturnsSpec;

  summary?: string;
  description?: string;
  tags?: readonly string[];
}

/**
 * Immutable handler binding, owned by a HandlerTable.
 */
export interface HandlerBinding<H = unknown> {
  readonly action: string;
  readonly direction: Direction;
  readonly handler: H;
  readonly input: HandlerInput;
  /** Schemas a returned value is checked against (empty: unchecked) */
  readonly returns: readonly AnyMessageSchema[];
  /** Documented outputs: `output` when given, else `returns` */
  readonly output: readonly AnyMessageSchema[];
  readonly metadata: HandlerMetadata;
}

/**
 * Serializable view of a binding for documentation tooling.
 */
export interface BindingDescription {
  readonly action: string;
  readonly direction: Direction;
  readonly name: string;
  readonly returns: readonly string[];
  readonly output: readonly string[];
  readonly summary?: string;
  readonly description?: string;
  readonly tags: readonly string[];
}
