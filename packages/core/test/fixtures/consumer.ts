// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Shared schemas and consumer setup for core tests.
 */

import {
  createLogger,
  type ConnectionData,
  type ConsumerConfigOptions,
  type Consumer,
  type CreateConsumerOptions,
  type LogLevel,
} from "@switchboard/core";
import { memoryChannelLayer, type MemoryChannelLayer } from "@switchboard/memory";
import { createConsumer, message, z } from "@switchboard/zod";

export const Ping = message("ping");
export const Pong = message("pong");
export const Chat = message("chat", { text: z.string() });
export const ChatNotify = message("chat_notify", { text: z.string() });
export const JobDone = message("job_done", { jobId: z.string() });
export const JobStatus = message("job_status", {
  jobId: z.string(),
  status: z.enum(["done", "failed"]),
});

export interface LogEntry {
  level: LogLevel;
  context: string;
  message: string;
  data: unknown;
}

/**
 * Logger that records entries instead of printing them.
 */
export function recordingLogger() {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    log: (level, context, msg, data) => {
      entries.push({ level, context, message: msg, data });
    },
  });
  return { logger, entries };
}

export interface TestConsumerOptions<TData extends ConnectionData>
  extends Omit<CreateConsumerOptions<TData>, "validator" | "layer" | "config"> {
  layer?: MemoryChannelLayer;
  config?: ConsumerConfigOptions;
}

/**
 * Zod consumer over a memory layer with completion signals on and logs
 * recorded.
 */
export function testConsumer<TData extends ConnectionData = ConnectionData>(
  opts: TestConsumerOptions<TData> = {},
) {
  const { layer = memoryChannelLayer(), config, ...hooks } = opts;
  const { logger, entries } = recordingLogger();
  const consumer: Consumer<TData> = createConsumer<TData>({
    ...hooks,
    layer,
    config: { completionSignalsEnabled: true, logger, ...config },
  });
  return { consumer, layer, logs: entries };
}
