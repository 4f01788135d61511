// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Reserved discriminator values.
 *
 * These actions are produced by the framework itself (errors, completion
 * markers, authentication status) and cannot be bound to user handlers in
 * either direction.
 */

export const SYSTEM_ACTIONS = {
  ERROR: "error",
  COMPLETE: "complete",
  GROUP_COMPLETE: "group_complete",
  EVENT_COMPLETE: "event_complete",
  AUTHENTICATION: "authentication",
} as const;

export type SystemAction = (typeof SYSTEM_ACTIONS)[keyof typeof SYSTEM_ACTIONS];

const RESERVED = new Set<string>(Object.values(SYSTEM_ACTIONS));

/**
 * Check if an action is reserved for framework use.
 */
export function isReserved(action: string): boolean {
  return RESERVED.has(action);
}

/**
 * Check if an action is one of the completion markers.
 */
export function isCompletionAction(action: string): boolean {
  return (
    action === SYSTEM_ACTIONS.COMPLETE ||
    action === SYSTEM_ACTIONS.GROUP_COMPLETE ||
    action === SYSTEM_ACTIONS.EVENT_COMPLETE
  );
}
