// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { Mailbox } from "./mailbox.js";

describe("Mailbox", () => {
  it("should run units one at a time in arrival order", async () => {
    const mailbox = new Mailbox();
    const log: string[] = [];

    const first = mailbox.enqueue(async () => {
      log.push("a:start");
      await sleep(10);
      log.push("a:end");
    });
    const second = mailbox.enqueue(async () => {
      log.push("b:start");
      log.push("b:end");
    });
    await Promise.all([first, second]);

    expect(log).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("should resolve each unit with its own result", async () => {
    const mailbox = new Mailbox();

    await expect(mailbox.enqueue(async () => 42)).resolves.toBe(42);
  });

  it("should keep going after a failed unit", async () => {
    const mailbox = new Mailbox();

    const failed = mailbox.enqueue(async () => {
      throw new Error("boom");
    });
    const next = mailbox.enqueue(async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("should count queued and running units", async () => {
    const mailbox = new Mailbox();
    const pending = mailbox.enqueue(() => sleep(5));
    void mailbox.enqueue(async () => undefined);

    expect(mailbox.size).toBe(2);
    await pending;
    await mailbox.idle();
    expect(mailbox.size).toBe(0);
  });

  it("should drop units that have not started when closed", async () => {
    const mailbox = new Mailbox();
    let ran = false;
    let started: () => void = () => undefined;
    const didStart = new Promise<void>((resolve) => {
      started = resolve;
    });
    const running = mailbox.enqueue(async () => {
      started();
      await sleep(5);
      return "finished";
    });
    const dropped = mailbox.enqueue(async () => {
      ran = true;
      return "late";
    });

    await didStart;
    mailbox.close();

    await expect(running).resolves.toBe("finished");
    await expect(dropped).resolves.toBeUndefined();
    expect(ran).toBe(false);
    await expect(mailbox.enqueue(async () => "after")).resolves.toBeUndefined();
    expect(mailbox.isClosed).toBe(true);
  });
});
