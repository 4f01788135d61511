// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Factory: createConsumer(opts) → Consumer<TData>
 *
 * Validator packages (@switchboard/zod, @switchboard/valibot) wrap this with
 * their validator pre-bound.
 */

import type { ValidatorAdapter } from "../capabilities/validation/contracts.js";
import type { ChannelLayer } from "../channel-layer/contracts.js";
import { resolveConfig, type ConsumerConfigOptions } from "../config.js";
import type { ConnectionData } from "../connection/connection.js";
import { Consumer, type ConsumerHooks } from "./consumer.js";

export interface CreateConsumerOptions<TData extends ConnectionData = ConnectionData>
  extends ConsumerHooks<TData> {
  /** Validator adapter for message and event schemas */
  validator: ValidatorAdapter;

  /** Channel layer shared by every consumer that exchanges groups and events */
  layer: ChannelLayer;

  config?: ConsumerConfigOptions;
}

/**
 * Create a consumer.
 *
 * Example:
 * ```ts
 * const consumer = createConsumer<{ room?: string }>({
 *   validator: zodValidator(),
 *   layer: memoryChannelLayer(),
 *   config: { completionSignalsEnabled: true },
 *   buildGroups: () => ["lobby"],
 * });
 * ```
 */
export function createConsumer<TData extends ConnectionData = ConnectionData>(
  opts: CreateConsumerOptions<TData>,
): Consumer<TData> {
  const { config, ...rest } = opts;
  return new Consumer<TData>({ ...rest, config: resolveConfig(config) });
}
