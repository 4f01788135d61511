// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { createLogger, type LayerEnvelope } from "@switchboard/core";
import { describe, expect, it } from "vitest";
import { memoryChannelLayer } from "../src/index.js";

const frame: LayerEnvelope = { kind: "frame", message: { type: "ping" } };

function groupMessage(group: string): LayerEnvelope {
  return {
    kind: "group_member",
    group,
    message: { type: "chat_notify", payload: { text: "hi" } },
    origin: { address: null, identityId: null },
    excludeOrigin: false,
    enrich: true,
  };
}

describe("memoryChannelLayer()", () => {
  describe("addresses", () => {
    it("should deliver a JSON copy to a registered address", async () => {
      const layer = memoryChannelLayer();
      const received: LayerEnvelope[] = [];
      await layer.register("a1", (envelope) => {
        received.push(envelope);
      });

      await layer.sendToConnection("a1", frame);

      expect(received).toEqual([frame]);
      expect(received[0]).not.toBe(frame);
    });

    it("should pass the envelope itself when serialize is off", async () => {
      const layer = memoryChannelLayer({ serialize: false });
      const received: LayerEnvelope[] = [];
      await layer.register("a1", (envelope) => {
        received.push(envelope);
      });

      await layer.sendToConnection("a1", frame);

      expect(received[0]).toBe(frame);
    });

    it("should drop envelopes for unknown addresses", async () => {
      const layer = memoryChannelLayer();

      await expect(layer.sendToConnection("nobody", frame)).resolves.toBeUndefined();
    });

    it("should stop delivering after unregister", async () => {
      const layer = memoryChannelLayer();
      let calls = 0;
      await layer.register("a1", () => {
        calls++;
      });

      await layer.unregister("a1");
      await layer.unregister("a1");
      await layer.sendToConnection("a1", frame);

      expect(calls).toBe(0);
    });
  });

  describe("groups", () => {
    it("should fan out to every member", async () => {
      const layer = memoryChannelLayer();
      const received: string[] = [];
      for (const address of ["a1", "a2", "a3"]) {
        await layer.register(address, () => {
          received.push(address);
        });
      }
      await layer.joinGroup("room", "a1");
      await layer.joinGroup("room", "a2");
      await layer.joinGroup("room", "a2");

      await layer.sendToGroup("room", groupMessage("room"));

      expect(received).toEqual(["a1", "a2"]);
      expect(layer.members("room")).toEqual(["a1", "a2"]);
    });

    it("should track memberships per address", async () => {
      const layer = memoryChannelLayer();
      await layer.joinGroup("room", "a1");
      await layer.joinGroup("lobby", "a1");

      expect(layer.groupsOf("a1")).toEqual(["room", "lobby"]);
      expect(layer.listGroups()).toEqual(["room", "lobby"]);

      await layer.leaveGroup("room", "a1");
      await layer.leaveGroup("room", "a1");

      expect(layer.groupsOf("a1")).toEqual(["lobby"]);
      expect(layer.hasGroup("room")).toBe(false);
    });

    it("should remove an address from its groups on unregister", async () => {
      const layer = memoryChannelLayer();
      await layer.register("a1", () => undefined);
      await layer.joinGroup("room", "a1");
      await layer.joinGroup("room", "a2");

      await layer.unregister("a1");

      expect(layer.members("room")).toEqual(["a2"]);
      expect(layer.groupsOf("a1")).toEqual([]);
    });

    it("should log a failing member and keep delivering to the rest", async () => {
      const errors: unknown[] = [];
      const layer = memoryChannelLayer({
        logger: createLogger({
          log: (level, _context, message, data) => {
            if (level === "error") errors.push({ message, data });
          },
        }),
      });
      const received: string[] = [];
      await layer.register("a1", () => {
        throw new Error("socket gone");
      });
      await layer.register("a2", () => {
        received.push("a2");
      });
      await layer.joinGroup("room", "a1");
      await layer.joinGroup("room", "a2");

      await layer.sendToGroup("room", groupMessage("room"));

      expect(received).toEqual(["a2"]);
      expect(errors).toEqual([
        {
          message: "Group delivery failed",
          data: { group: "room", address: "a1", error: "socket gone" },
        },
      ]);
    });

    it("should reject a group message that cannot be encoded before delivering it", async () => {
      const errors: string[] = [];
      const layer = memoryChannelLayer({
        logger: createLogger({
          log: (level, _context, message) => {
            if (level === "error") errors.push(message);
          },
        }),
      });
      let deliveries = 0;
      for (const address of ["a1", "a2"]) {
        await layer.register(address, () => {
          deliveries++;
        });
        await layer.joinGroup("room", address);
      }
      const envelope: LayerEnvelope = {
        kind: "group_member",
        group: "room",
        message: { type: "chat_notify", payload: { count: 1n } },
        origin: { address: null, identityId: null },
        excludeOrigin: false,
        enrich: true,
      };

      await expect(layer.sendToGroup("room", envelope)).rejects.toBeInstanceOf(TypeError);
      await expect(layer.sendToConnection("a1", envelope)).rejects.toBeInstanceOf(TypeError);
      expect(deliveries).toBe(0);
      expect(errors).toEqual([]);
    });

    it("should tolerate members leaving during fan-out", async () => {
      const layer = memoryChannelLayer();
      const received: string[] = [];
      await layer.register("a1", async () => {
        received.push("a1");
        await layer.leaveGroup("room", "a2");
      });
      await layer.register("a2", () => {
        received.push("a2");
      });
      await layer.joinGroup("room", "a1");
      await layer.joinGroup("room", "a2");

      await layer.sendToGroup("room", groupMessage("room"));

      expect(received).toEqual(["a1", "a2"]);
      expect(layer.members("room")).toEqual(["a1"]);
    });
  });

  it("should forget everything on close", async () => {
    const layer = memoryChannelLayer();
    await layer.register("a1", () => undefined);
    await layer.joinGroup("room", "a1");

    await layer.close();

    expect(layer.listGroups()).toEqual([]);
    expect(layer.name).toBe("memory");
  });
});
