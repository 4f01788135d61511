// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Client message dispatch through a consumer.
 *
 * Scenarios:
 * - Reply unicast to the sender, followed by `complete`
 * - Validation failures: one error frame, no handler, no completion
 * - Handler failures: generic error frame, then `complete`
 * - Return values checked against `returns`
 * - Strict per-connection ordering
 */

import { ConstructionError, SYSTEM_ACTIONS } from "@switchboard/core";
import { createTestHarness } from "@switchboard/core/testing";
import { message, payload, z } from "@switchboard/zod";
import { describe, expect, it } from "vitest";
import { Chat, ChatNotify, Ping, Pong, testConsumer } from "../fixtures/consumer.js";

describe("Dispatch", () => {
  describe("replies", () => {
    it("should answer ping with pong then complete", async () => {
      const { consumer } = testConsumer();
      consumer.on(Ping, () => ({ type: "pong" }), { returns: Pong });

      const harness = createTestHarness(consumer);
      const client = await harness.connect();
      await client.send({ action: "ping" });

      expect(await client.receiveAll()).toEqual([
        { action: "pong" },
        { action: "complete" },
      ]);
    });

    it("should send a returned message with its payload", async () => {
      const { consumer } = testConsumer();
      const Echo = message("echo", { text: z.string() });
      consumer.on(Echo, (ctx) => ({ type: "echo", payload: { text: ctx.payload.text } }), {
        returns: Echo,
      });

      const client = await createTestHarness(consumer).connect();
      await client.send({ action: "echo", payload: { text: "hello" } });

      expect(await client.receiveAll({ stopAction: "complete" })).toEqual([
        { action: "echo", payload: { text: "hello" } },
      ]);
    });

    it("should send nothing but complete when the handler returns nothing", async () => {
      const { consumer } = testConsumer();
      let calls = 0;
      consumer.on(Ping, () => {
        calls++;
      });

      const client = await createTestHarness(consumer).connect();
      await client.send({ action: "ping" });

      expect(calls).toBe(1);
      expect(await client.receiveAll()).toEqual([{ action: "complete" }]);
    });

    it("should send messages with ctx.send before the reply", async () => {
      const { consumer } = testConsumer();
      const Progress = message("progress", { percent: z.number() });
      consumer.on(
        Ping,
        (ctx) => {
          ctx.send(Progress, { percent: 50 });
          ctx.send(Pong);
          return { type: "pong" };
        },
        { returns: Pong },
      );

      const client = await createTestHarness(consumer).connect();
      await client.send({ action: "ping" });

      expect(await client.receiveAll()).toEqual([
        { action: "progress", payload: { percent: 50 } },
        { action: "pong" },
        { action: "pong" },
        { action: "complete" },
      ]);
    });

    it("should pass through any message when no returns are declared", async () => {
      const { consumer } = testConsumer();
      consumer.on(Ping, () => ({ type: "anything", payload: [1, 2] }));

      const client = await createTestHarness(consumer).connect();
      await client.send({ action: "ping" });

      expect(await client.receiveNext()).toEqual({ action: "anything", payload: [1, 2] });
    });

    it("should not emit completion markers when completion is disabled", async () => {
      const { consumer } = testConsumer({ config: { completionSignalsEnabled: false } });
      consumer.on(Ping, () => ({ type: "pong" }), { returns: Pong });

      const client = await createTestHarness(consumer).connect();
      await client.send({ action: "ping" });

      expect(await client.receiveAll()).toEqual([{ action: "pong" }]);
    });

    it("should use a custom discriminator field", async () => {
      const { consumer } = testConsumer({ config: { discriminatorField: "type" } });
      consumer.on(Ping, () => ({ type: "pong" }), { returns: Pong });

      const client = await createTestHarness(consumer).connect();
      await client.send({ type: "ping" });

      expect(await client.receiveAll()).toEqual([{ type: "pong" }, { type: "complete" }]);
    });
  });

  describe("validation failures", () => {
    it("should reject an unknown action with one error frame", async () => {
      const { consumer } = testConsumer();
      let invoked = false;
      consumer.on(Ping, () => ({ type: "pong" }), { returns: Pong });
      consumer.on(Chat, () => {
        invoked = true;
      });

      const client = await createTestHarness(consumer).connect();
      await client.send({ action: "unknown_action" });

      expect(invoked).toBe(false);
      expect(await client.receiveAll()).toEqual([
        {
          action: "error",
          payload: [
            {
              type: "unknown_discriminator",
              loc: ["action"],
              msg: "Input tag 'unknown_action' found using 'action' does not match any of the expected tags: 'ping', 'chat'",
            },
          ],
        },
      ]);
    });

    it("should reject a frame without a discriminator", async () => {
      const { consumer } = testConsumer();
      consumer.on(Ping, () => undefined);

      const client = await createTestHarness(consumer).connect();
      await client.send({ payload: { text: "hi" } });

      expect(await client.receiveAll()).toEqual([
        {
          action: "error",
          payload: [
            {
              type: "missing_discriminator",
              loc: ["action"],
              msg: "Unable to extract tag using discriminator 'action'",
            },
          ],
        },
      ]);
    });

    it("should reject a payload that does not match the schema", async () => {
      const { consumer } = testConsumer();
      let invoked = false;
      consumer.on(Chat, () => {
        invoked = true;
      });

      const client = await createTestHarness(consumer).connect();
      await client.send({ action: "chat", payload: { text: 42 } });

      expect(invoked).toBe(false);
      const frames = await client.receiveAll();
      expect(frames).toHaveLength(1);
      expect(frames[0]).toEqual({
        action: "error",
        payload: [{ type: "invalid_type", loc: ["payload", "text"], msg: expect.any(String) }],
      });
    });

    it("should reject text that is not JSON", async () => {
      const { consumer } = testConsumer();
      consumer.on(Ping, () => undefined);

      const client = await createTestHarness(consumer).connect();
      await client.send("{not json");

      const frames = await client.receiveAll();
      expect(frames).toEqual([
        {
          action: "error",
          payload: [{ type: "json_invalid", loc: [], msg: expect.stringMatching(/^Invalid JSON: /) }],
        },
      ]);
    });

    it("should reject JSON that is not an object", async () => {
      const { consumer } = testConsumer();
      consumer.on(Ping, () => undefined);

      const client = await createTestHarness(consumer).connect();
      await client.send("[1,2,3]");

      expect(await client.receiveAll()).toEqual([
        {
          action: "error",
          payload: [{ type: "model_type", loc: [], msg: "Frame must be a JSON object" }],
        },
      ]);
    });

    it("should keep the connection open after a validation failure", async () => {
      const { consumer } = testConsumer();
      consumer.on(Ping, () => ({ type: "pong" }), { returns: Pong });

      const client = await createTestHarness(consumer).connect();
      await client.send({ action: "nope" });
      await client.send({ action: "ping" });

      const frames = await client.receiveAll();
      expect(frames.map((f) => f.action)).toEqual(["error", "pong", "complete"]);
      expect(client.connection.state).toBe("open");
    });

    it("should log rejected messages as warnings", async () => {
      const { consumer, logs } = testConsumer();
      consumer.on(Ping, () => undefined);

      const client = await createTestHarness(consumer).connect();
      await client.send({ action: "nope" });

      const warning = logs.find((e) => e.message === "Rejected client message");
      expect(warning?.level).toBe("warn");
      expect(warning?.context).toBe("validation");
    });

    it("should not log traffic for ignored actions", async () => {
      const { consumer, logs } = testConsumer({
        config: { ignoredDiscriminatorsForLogging: ["ping", "pong"] },
      });
      consumer.on(Ping, () => ({ type: "pong" })).on(Chat, () => undefined);
      const client = await createTestHarness(consumer).connect();

      await client.send({ action: "ping" });
      await client.send({ action: "chat", payload: { text: "hi" } });

      const traffic = logs.filter(
        (e) => e.message === "Received websocket json" || e.message === "Sent websocket json",
      );
      expect(traffic).toEqual([
        expect.objectContaining({
          message: "Sent websocket json",
          data: expect.objectContaining({ action: "complete" }),
        }),
        expect.objectContaining({
          message: "Received websocket json",
          data: expect.objectContaining({ action: "chat" }),
        }),
        expect.objectContaining({
          message: "Sent websocket json",
          data: expect.objectContaining({ action: "complete" }),
        }),
      ]);
    });
  });

  describe("handler failures", () => {
    it("should send a generic error and complete when the handler throws", async () => {
      const { consumer, logs } = testConsumer();
      consumer.on(Ping, function failingPing() {
        throw new Error("database down");
      });

      const client = await createTestHarness(consumer).connect();
      await client.send({ action: "ping" });

      expect(await client.receiveAll()).toEqual([
        {
          action: "error",
          payload: [{ type: "handler_error", loc: [], msg: "Failed to process message" }],
        },
        { action: "complete" },
      ]);
      const entry = logs.find((e) => e.level === "error");
      expect(entry?.message).toBe("Failed to process message");
      expect(entry?.data).toMatchObject({
        address: client.connection.address,
        action: "ping",
        handler: "failingPing",
        error: { name: "Error", message: "database down" },
      });
      expect(client.connection.state).toBe("open");
    });

    it("should treat a reply that fails outgoing validation as a handler error", async () => {
      const { consumer } = testConsumer();
      const Result = message("result", { n: z.number() });
      consumer.on(Ping, () => ({ type: "result", payload: { n: Number.NaN } }), {
        returns: Result,
      });

      const client = await createTestHarness(consumer).connect();
      await client.send({ action: "ping" });

      expect((await client.receiveAll()).map((f) => f.action)).toEqual(["error", "complete"]);
    });

    it("should skip outgoing validation when the schema opts out", async () => {
      const { consumer } = testConsumer();
      const Result = message("result", { n: z.number() }, { validateOutgoing: false });
      consumer.on(Ping, () => ({ type: "result", payload: { n: Number.NaN } }), {
        returns: Result,
      });

      const client = await createTestHarness(consumer).connect();
      await client.send({ action: "ping" });

      // NaN serializes as null
      expect(await client.receiveAll()).toEqual([
        { action: "result", payload: { n: null } },
        { action: "complete" },
      ]);
    });
  });

  describe("payload-only schemas", () => {
    it("should derive the discriminator from the handler name", async () => {
      const { consumer } = testConsumer();
      consumer.on(payload({ text: z.string() }), function handleSendEcho(ctx) {
        return { type: "echoed", payload: ctx.payload };
      });

      const client = await createTestHarness(consumer).connect();
      await client.send({ action: "send_echo", payload: { text: "hey" } });

      expect(await client.receiveNext()).toEqual({ action: "echoed", payload: { text: "hey" } });
      expect(consumer.describe().map((b) => b.action)).toEqual(["send_echo"]);
    });

    it("should ignore a payload sent for a message that declares none", async () => {
      const { consumer } = testConsumer();
      const seen: unknown[] = [];
      consumer.on(Ping, (ctx) => {
        seen.push(ctx.payload);
      });

      const client = await createTestHarness(consumer).connect();
      await client.send({ action: "ping", payload: { extra: true } });

      expect(seen).toEqual([undefined]);
    });
  });

  describe("ordering", () => {
    it("should not start the next message before the previous handler finishes", async () => {
      const { consumer } = testConsumer();
      const calls: string[] = [];
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      consumer.on(message("slow"), async () => {
        calls.push("slow:start");
        await gate;
        calls.push("slow:end");
      });
      consumer.on(message("fast"), () => {
        calls.push("fast");
      });

      const client = await createTestHarness(consumer).connect();
      const first = client.send({ action: "slow" });
      const second = client.send({ action: "fast" });
      await new Promise((resolve) => setImmediate(resolve));

      expect(calls).toEqual(["slow:start"]);
      release();
      await Promise.all([first, second]);

      expect(calls).toEqual(["slow:start", "slow:end", "fast"]);
    });

    it("should keep the order of replies across messages", async () => {
      const { consumer } = testConsumer({ config: { completionSignalsEnabled: false } });
      const Num = message("num", { n: z.number() });
      consumer.on(
        Num,
        async (ctx) => {
          // Later messages resolve sooner
          await new Promise((resolve) => setTimeout(resolve, 10 - ctx.payload.n * 3));
          return { type: "num", payload: { n: ctx.payload.n } };
        },
        { returns: Num },
      );

      const client = await createTestHarness(consumer).connect();
      await Promise.all([1, 2, 3].map((n) => client.send({ action: "num", payload: { n } })));

      expect(await client.receiveAll()).toEqual([
        { action: "num", payload: { n: 1 } },
        { action: "num", payload: { n: 2 } },
        { action: "num", payload: { n: 3 } },
      ]);
    });
  });

  describe("construction", () => {
    it("should reject two handlers for the same action", () => {
      const { consumer } = testConsumer();
      consumer.on(Chat, () => undefined);

      expect(() => consumer.on(Chat, () => undefined)).toThrow(ConstructionError);
    });

    it("should reject handlers for reserved actions", () => {
      const { consumer } = testConsumer();

      for (const action of Object.values(SYSTEM_ACTIONS)) {
        expect(() => consumer.on(message(action), () => undefined)).toThrow(
          `Action "${action}" is reserved and cannot be bound to a client handler.`,
        );
      }
    });

    it("should allow the same action for a client message and an event", () => {
      const { consumer } = testConsumer();
      consumer.on(ChatNotify, () => undefined);
      consumer.event(ChatNotify, () => undefined);

      expect(consumer.describe().map((b) => `${b.direction}:${b.action}`)).toEqual([
        "client:chat_notify",
        "event:chat_notify",
      ]);
    });

    it("should refuse declarations once a connection was accepted", async () => {
      const { consumer } = testConsumer();
      consumer.on(Ping, () => undefined);
      await createTestHarness(consumer).connect();

      expect(() => consumer.on(Chat, () => undefined)).toThrow(ConstructionError);
      expect(() => consumer.use(async (_ctx, next) => next())).toThrow(ConstructionError);
    });

    it("should refuse a schema from another validator", () => {
      const { consumer } = testConsumer();
      const foreign = { messageType: "foreign" };

      expect(() => consumer.on(foreign, function handleForeign() {})).toThrow(
        'Handler "handleForeign" was declared with a schema the zod validator does not recognise.',
      );
    });
  });
});
