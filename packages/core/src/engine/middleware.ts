// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Runs client-message middleware around the handler, outermost first.
 * Errors thrown anywhere in the chain reach the dispatcher unchanged.
 */

import type { ConnectionData } from "../connection/connection.js";
import type { HandlerInput } from "../protocol/message-descriptor.js";
import type { HandlerContext, Middleware } from "./types.js";

/**
 * Fold `consumer.use()` middleware into one function that ends in `handler`.
 *
 * ```ts
 * const run = composePipeline([
 *   async (ctx, next) => {
 *     const started = Date.now();
 *     await next();
 *     ctx.logger.debug("message", "Handled", { action: ctx.action, ms: Date.now() - started });
 *   },
 *   (ctx, next) => (ctx.identity ? next() : undefined),
 * ]);
 * await run(ctx, () => invokeHandler(ctx));
 * ```
 */
export function composePipeline<TData extends ConnectionData = ConnectionData>(
  middlewares: readonly Middleware<TData>[],
): (
  ctx: HandlerContext<HandlerInput, TData>,
  next: () => Promise<void>,
) => Promise<void> {
  return async (ctx, next) => {
    let reached = -1;

    const step = async (position: number): Promise<void> => {
      if (position <= reached) {
        throw new Error("next() called multiple times");
      }
      reached = position;
      const middleware = middlewares[position];
      if (middleware === undefined) return next();
      await middleware(ctx, () => step(position + 1));
    };

    await step(0);
  };
}
