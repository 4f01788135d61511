// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Authentication gate types.
 *
 * The gate runs once per connection before it opens. It returns an
 * identity, `null` for an anonymous connection, or an AuthRejection.
 */

import type { Connection, ConnectionData, Identity } from "../connection/connection.js";
import { SYSTEM_ACTIONS } from "../schema/reserved.js";
import type { ConnectionRequest } from "../ws/platform-adapter.js";
import type { WireFrame } from "../protocol/frame.js";

export interface AuthRejectionInit {
  /** Close code (default: config.authRejectionCode) */
  code?: number;
  /** Close reason (default: "Unauthorized") */
  reason?: string;
  /** Status reported in the authentication message (default: 401) */
  statusCode?: number;
  statusText?: string;
  /** Extra details for the authentication message */
  data?: unknown;
}

export class AuthRejection {
  readonly code: number | undefined;
  readonly reason: string;
  readonly statusCode: number;
  readonly statusText: string;
  readonly data: unknown;

  constructor(init: AuthRejectionInit = {}) {
    this.code = init.code;
    this.reason = init.reason ?? "Unauthorized";
    this.statusCode = init.statusCode ?? 401;
    this.statusText = init.statusText ?? this.reason;
    this.data = init.data;
  }
}

/**
 * Reject a connection from an authentication gate.
 *
 * ```ts
 * authenticate: (req) =>
 *   req.headers["x-user-id"] ? { id: req.headers["x-user-id"] } : reject({ statusCode: 403 }),
 * ```
 */
export function reject(init?: AuthRejectionInit): AuthRejection {
  return new AuthRejection(init);
}

export type AuthOutcome = Identity | null | AuthRejection;

export type Authenticate<TData extends ConnectionData> = (
  request: ConnectionRequest,
  connection: Connection<TData>,
) => AuthOutcome | Promise<AuthOutcome>;

export interface AuthStatus {
  readonly statusCode: number;
  readonly statusText: string;
  readonly data?: unknown;
}

export const AUTH_OK: AuthStatus = Object.freeze({ statusCode: 200, statusText: "OK" });

export function authenticationFrame(field: string, status: AuthStatus): WireFrame {
  const payload: Record<string, unknown> = {
    statusCode: status.statusCode,
    statusText: status.statusText,
  };
  if (status.data !== undefined) {
    payload.data = status.data;
  }
  return { [field]: SYSTEM_ACTIONS.AUTHENTICATION, payload };
}
