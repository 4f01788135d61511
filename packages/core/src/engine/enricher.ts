// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Group broadcast enricher.
 *
 * Sender side: packages a message with its origin and hands one group-send
 * per target group to the channel layer. It never delivers per recipient.
 *
 * Recipient side: decides whether a delivered group message reaches this
 * connection and computes its relevance flags:
 * - isMine: recipient identity equals origin identity (both non-null)
 * - isCurrent: recipient is the origin connection
 *
 * No ordering is promised across connections; two broadcasts from the same
 * origin may reach a third connection in either order if the layer delivers
 * them through different paths.
 */

import type {
  BroadcastOrigin,
  ChannelLayer,
  GroupMemberEnvelope,
} from "../channel-layer/contracts.js";
import type { Identity } from "../connection/connection.js";
import { TransportError } from "../error.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import type { MessageEnvelope } from "../protocol/frame.js";

export interface BroadcastOptions {
  /** Target groups. Defaults to the origin connection's groups. */
  groups?: Iterable<string>;

  /** Leave the origin connection out entirely (default: false). */
  excludeOrigin?: boolean;

  /** Inject isMine/isCurrent (default: true). */
  enrich?: boolean;
}

export interface RelevanceFlags {
  readonly isMine: boolean;
  readonly isCurrent: boolean;
}

export interface Recipient {
  readonly address: string;
  readonly identity: Identity | null;
}

/**
 * Recipient-side decision for one delivered group message.
 * `null` means the recipient must not receive it.
 */
export function resolveGroupDelivery(
  envelope: GroupMemberEnvelope,
  recipient: Recipient,
): { flags: RelevanceFlags | undefined; isCurrent: boolean } | null {
  const isCurrent =
    envelope.origin.address !== null && envelope.origin.address === recipient.address;

  if (envelope.excludeOrigin && isCurrent) {
    return null;
  }

  if (!envelope.enrich) {
    return { flags: undefined, isCurrent };
  }

  const isMine =
    recipient.identity !== null &&
    envelope.origin.identityId !== null &&
    recipient.identity.id === envelope.origin.identityId;

  return { flags: { isMine, isCurrent }, isCurrent };
}

export class GroupBroadcastEnricher {
  constructor(
    private readonly layer: ChannelLayer,
    private readonly logger: LoggerAdapter,
  ) {}

  /**
   * Send a message to each target group through the channel layer.
   * Returns the number of group sends issued. Transport failures propagate
   * as TransportError.
   */
  async broadcast(
    origin: BroadcastOrigin,
    message: MessageEnvelope,
    groups: Iterable<string>,
    options: { excludeOrigin?: boolean; enrich?: boolean } = {},
  ): Promise<number> {
    const targets = Array.from(new Set(groups));
    if (targets.length === 0) {
      this.logger.debug(LOG_CONTEXT.BROADCAST, "Broadcast has no target groups", {
        action: message.type,
        origin: origin.address,
      });
      return 0;
    }

    const excludeOrigin = options.excludeOrigin ?? false;
    const enrich = options.enrich ?? true;

    for (const group of targets) {
      const envelope: GroupMemberEnvelope = {
        kind: "group_member",
        group,
        message,
        origin,
        excludeOrigin,
        enrich,
      };
      try {
        await this.layer.sendToGroup(group, envelope);
      } catch (err) {
        throw TransportError.wrap(err, "sendToGroup", {
          group,
          action: message.type,
          layer: this.layer.name,
        });
      }
    }

    this.logger.debug(LOG_CONTEXT.BROADCAST, "Broadcast sent", {
      action: message.type,
      groups: targets,
      origin: origin.address,
    });
    return targets.length;
  }
}
