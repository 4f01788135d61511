// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @switchboard/node - serve a consumer with the `ws` library
 *
 * @example
 * ```ts
 * import { serve } from "@switchboard/node";
 *
 * serve(consumer, { server: { port: 3000 } });
 * ```
 */

export { createNodeHandler, serve } from "./handler.js";
export type {
  NodeHandler,
  NodeHandlerOptions,
  NodeServer,
  ServeOptions,
} from "./handler.js";
export { adaptNodeSocket, decodeRawData, requestOf } from "./socket.js";
export type { NodeSocket } from "./socket.js";
