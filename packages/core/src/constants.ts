// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Global constants: default values, close codes, generic messages.
 */

// Default configuration
export const DEFAULTS = {
  DISCRIMINATOR_FIELD: "action",
  AUTH_REJECTION_CODE: 4003,
  CLOSE_CODE: 1000,
} as const;

// WebSocket close codes used by the consumer
export const CLOSE_CODES = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  INTERNAL_ERROR: 1011,
  UNAUTHORIZED: 4001,
  FORBIDDEN: 4003,
} as const;

// Text sent to the client when a handler throws; the real error stays in the logs
export const GENERIC_HANDLER_ERROR = "Failed to process message";

// Length of the per-unit message id bound into log entries
export const MESSAGE_ID_LENGTH = 8;
