// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Consumer configuration.
 *
 * Resolved once per consumer when it is created and frozen; the dispatcher,
 * enricher and event router read it but never change it.
 */

import { CLOSE_CODES, DEFAULTS } from "./constants.js";
import { ConstructionError } from "./error.js";
import { createLogger, type LoggerAdapter } from "./logger.js";

export interface ConsumerConfigOptions {
  /** Wire field carrying the discriminator (default: "action") */
  discriminatorField?: string;

  /** Emit complete / group_complete / event_complete markers (default: false) */
  completionSignalsEnabled?: boolean;

  /** Actions left out of received/sent message logs */
  ignoredDiscriminatorsForLogging?: Iterable<string>;

  /** Log every received client message (default: true) */
  logReceivedMessages?: boolean;

  /** Log every frame sent to a client (default: true) */
  logSentMessages?: boolean;

  /** Send an `authentication` frame with the gate's outcome (default: false) */
  sendAuthenticationMessage?: boolean;

  /** Validate returned and sent payloads against their schemas (default: true) */
  validateOutgoing?: boolean;

  /** Send an error frame when a unicast event cannot be routed (default: false) */
  notifyEventErrors?: boolean;

  /** Close code used when authentication rejects a connection (default: 4003) */
  authRejectionCode?: number;

  /** Logger (default: console) */
  logger?: LoggerAdapter;
}

export interface ConsumerConfig {
  readonly discriminatorField: string;
  readonly completionSignalsEnabled: boolean;
  readonly ignoredDiscriminatorsForLogging: ReadonlySet<string>;
  readonly logReceivedMessages: boolean;
  readonly logSentMessages: boolean;
  readonly sendAuthenticationMessage: boolean;
  readonly validateOutgoing: boolean;
  readonly notifyEventErrors: boolean;
  readonly authRejectionCode: number;
  readonly logger: LoggerAdapter;
}

/**
 * Resolve options into a frozen configuration.
 * Throws ConstructionError on invalid values.
 */
export function resolveConfig(options: ConsumerConfigOptions = {}): ConsumerConfig {
  const discriminatorField = options.discriminatorField ?? DEFAULTS.DISCRIMINATOR_FIELD;
  if (discriminatorField.length === 0 || discriminatorField === "payload") {
    throw new ConstructionError(
      `Invalid discriminatorField "${discriminatorField}": must be non-empty and not "payload".`,
    );
  }

  const authRejectionCode = options.authRejectionCode ?? DEFAULTS.AUTH_REJECTION_CODE;
  if (
    !Number.isInteger(authRejectionCode) ||
    (authRejectionCode !== CLOSE_CODES.NORMAL &&
      (authRejectionCode < 3000 || authRejectionCode > 4999))
  ) {
    throw new ConstructionError(
      `Invalid authRejectionCode ${authRejectionCode}: use 1000 or an application code in 3000-4999.`,
    );
  }

  const ignored = new Set(options.ignoredDiscriminatorsForLogging ?? []);

  return Object.freeze({
    discriminatorField,
    completionSignalsEnabled: options.completionSignalsEnabled ?? false,
    ignoredDiscriminatorsForLogging: ignored,
    logReceivedMessages: options.logReceivedMessages ?? true,
    logSentMessages: options.logSentMessages ?? true,
    sendAuthenticationMessage: options.sendAuthenticationMessage ?? false,
    validateOutgoing: options.validateOutgoing ?? true,
    notifyEventErrors: options.notifyEventErrors ?? false,
    authRejectionCode,
    logger: options.logger ?? createLogger(),
  });
}
