// ── Tests: notify.ts ──────────────────────────────────────────────────────────
// Telegram is replaced by an in-process fetch that records each request.

import { describe, it, expect, vi } from "vitest";
import { Response } from "node-fetch";
import { createCourse, toCourseRecord } from "../course.js";
import { compareSnapshots } from "../diff.js";
import { chunkMessage, notifyDiff, TelegramError, TelegramNotifier, type Notifier } from "../notify.js";
import type { Fetch } from "../session.js";

// ── chunkMessage ──────────────────────────────────────────────────────────────

describe("chunkMessage", () => {
  it("keeps short text in one chunk", () => {
    expect(chunkMessage("hello\nworld")).toEqual(["hello\nworld"]);
  });

  it("splits at the last newline before the limit", () => {
    expect(chunkMessage("aaaa\nbbbb\ncccc", 10)).toEqual(["aaaa\nbbbb", "cccc"]);
  });

  it("drops the blank line that would start a continuation", () => {
    expect(chunkMessage("aaaa\n\nbbbb", 6)).toEqual(["aaaa\n", "bbbb"]);
  });

  it("cuts a line longer than the limit", () => {
    expect(chunkMessage("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("does not cut through an HTML entity", () => {
    expect(chunkMessage("abc&amp;def", 5)).toEqual(["abc", "&amp;", "def"]);
    expect(chunkMessage("a&lt;bcdefg", 5)).toEqual(["a&lt;", "bcdef", "g"]);
  });

  it("never exceeds the limit", () => {
    const text = Array.from({ length: 500 }, (_, i) => `- course ${i} (ID: ${i}-1)`).join("\n");
    const chunks = chunkMessage(text);
    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.every(c => c.length <= 4000)).toBe(true);
    expect(chunks.join("\n")).toBe(text);
  });
});

// ── TelegramNotifier ──────────────────────────────────────────────────────────

function fakeFetch(status = 200, body = "{}") {
  return vi.fn<Fetch>(async () => new Response(body, { status }));
}

describe("TelegramNotifier", () => {
  it("posts escaped HTML text to the bot API", async () => {
    const fetch = fakeFetch();
    const notifier = new TelegramNotifier({ token: "test-token", chatId: "test-chat", fetch, delayMs: 0 });

    await notifier.sendText("a < b & c");

    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe("https://api.telegram.org/bottest-token/sendMessage");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: "test-chat",
      text: "a &lt; b &amp; c",
      parse_mode: "HTML",
    });
  });

  it("splits a long escaped line outside its entities", async () => {
    const fetch = fakeFetch();
    const notifier = new TelegramNotifier({ token: "test-token", chatId: "test-chat", fetch, delayMs: 0 });

    await notifier.sendText("x".repeat(3998) + "&y");

    const texts = fetch.mock.calls.map(([, init]) => JSON.parse(String(init?.body)).text);
    expect(texts).toEqual(["x".repeat(3998), "&amp;y"]);
  });

  it("sends the time range as a MarkdownV2 code block", async () => {
    const fetch = fakeFetch();
    const notifier = new TelegramNotifier({ token: "test-token", chatId: "test-chat", fetch, delayMs: 0 });

    await notifier.sendCode("Time [a] ➡️ [b]");

    const [, init] = fetch.mock.calls[0];
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: "test-chat",
      text: "```\nTime [a] ➡️ [b]\n```",
      parse_mode: "MarkdownV2",
    });
  });

  it("throws TelegramError on a failed request", async () => {
    const notifier = new TelegramNotifier({
      token: "test-token",
      chatId: "test-chat",
      fetch: fakeFetch(400, "Bad Request: chat not found"),
      delayMs: 0,
    });

    await expect(notifier.sendText("x")).rejects.toBeInstanceOf(TelegramError);
  });
});

// ── notifyDiff ────────────────────────────────────────────────────────────────

describe("notifyDiff", () => {
  function recorder() {
    const sent: string[] = [];
    const notifier: Notifier = {
      sendText: async text => { sent.push(`text:${text}`); },
      sendCode: async text => { sent.push(`code:${text}`); },
    };
    return { sent, notifier };
  }

  it("sends nothing for an empty diff", async () => {
    const { sent, notifier } = recorder();
    expect(await notifyDiff(notifier, { added: {}, removed: {}, updated: {} }, { old: "a", new: "b" })).toBe(0);
    expect(sent).toEqual([]);
  });

  it("sends the time range and then one message per department", async () => {
    const { sent, notifier } = recorder();
    const rec = (code: string, department: string) =>
      toCourseRecord(createCourse({ code, group: 1, name: code, department }));
    const diff = compareSnapshots({}, { "1-1": rec("1", "B"), "2-1": rec("2", "A") });

    expect(await notifyDiff(notifier, diff, { old: "t0", new: "t1" })).toBe(2);
    expect(sent).toEqual([
      "code:Time [t0] ➡️ [t1]",
      "text:🏛️ A:\n🟢 Added Courses:\n- 2 (ID: 2-1)\n",
      "text:🏛️ B:\n🟢 Added Courses:\n- 1 (ID: 1-1)\n",
    ]);
  });
});
