// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * In-memory channel layer for single-process deployments and tests.
 *
 * Exports:
 * - `memoryChannelLayer()` - address registry, group index and local fan-out
 */

export {
  memoryChannelLayer,
  type MemoryChannelLayer,
  type MemoryChannelLayerOptions,
} from "./channel-layer.js";
export type { ChannelLayer, LayerEnvelope } from "@switchboard/core";
