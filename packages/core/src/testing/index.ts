// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Test helpers: TestSocket, createTestHarness, captureBroadcastEvents.
 * Import from "@switchboard/core/testing".
 */

export { captureBroadcastEvents } from "./capture.js";
export type { CaptureOptions, CapturedEvents } from "./capture.js";
export { createTestHarness } from "./test-harness.js";
export type {
  ReceiveAllOptions,
  TestClient,
  TestHarness,
} from "./test-harness.js";
export { TestSocket } from "./test-socket.js";
