// src/notify.ts
import fetch from "node-fetch";
import { isEmptyDiff } from "./diff.js";
import { renderReport, renderTimeRange } from "./report.js";
import type { Fetch } from "./session.js";
import type { DiffResult } from "./types.js";
import { escapeHtml, sleep } from "./utils.js";

// Telegram の上限 4096 より少し小さく
export const MAX_LENGTH = 4000;

export class TelegramError extends Error {
  constructor(readonly status: number, readonly description: string) {
    super(`Telegram API error ${status}: ${description}`);
    this.name = "TelegramError";
  }
}

// エスケープ後のテキストを切るので、&amp; などの途中では切らない
const ENTITY_MAX = 8;

function hardSplit(text: string, max: number): number {
  const amp = text.lastIndexOf("&", max - 1);
  if (amp > 0 && max - amp < ENTITY_MAX && !text.slice(amp, max).includes(";")) return amp;
  return max;
}

/**
 * Splits `text` into chunks of at most `max` characters, at the last newline
 * before the limit. Continuations lose their leading newlines.
 */
export function chunkMessage(text: string, max = MAX_LENGTH): string[] {
  const chunks: string[] = [];
  let rest = text;
  while (rest) {
    if (rest.length <= max) {
      chunks.push(rest);
      break;
    }
    let splitPos = rest.lastIndexOf("\n", max - 1);
    if (splitPos <= 0) splitPos = hardSplit(rest, max);
    chunks.push(rest.slice(0, splitPos));
    rest = rest.slice(splitPos).replace(/^\n+/, "");
  }
  return chunks;
}

export interface Notifier {
  sendText(text: string): Promise<void>;
  sendCode(text: string): Promise<void>;
}

export type TelegramOptions = {
  token: string;
  chatId: string;
  fetch?: Fetch;
  /** Pause after each message. */
  delayMs?: number;
};

export class TelegramNotifier implements Notifier {
  private readonly fetch: Fetch;

  constructor(private readonly opts: TelegramOptions) {
    this.fetch = opts.fetch ?? fetch;
  }

  async sendText(text: string): Promise<void> {
    for (const chunk of chunkMessage(escapeHtml(text))) {
      await this.post({ text: chunk, parse_mode: "HTML" });
    }
  }

  async sendCode(text: string): Promise<void> {
    // MarkdownV2 のコードブロック内では ` と \ だけエスケープが必要
    await this.post({ text: "```\n" + text.replace(/[`\\]/g, m => "\\" + m) + "\n```", parse_mode: "MarkdownV2" });
  }

  private async post(payload: { text: string; parse_mode: string }) {
    const res = await this.fetch(`https://api.telegram.org/bot${this.opts.token}/sendMessage`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ chat_id: this.opts.chatId, ...payload }),
    });
    if (!res.ok) {
      throw new TelegramError(res.status, await res.text());
    }
    await sleep(this.opts.delayMs ?? 500);
  }
}

/** Sends the time range, then one message per department. Nothing when the diff is empty. */
export async function notifyDiff(notifier: Notifier, diff: DiffResult, times: { old: string; new: string }): Promise<number> {
  if (isEmptyDiff(diff)) return 0;

  await notifier.sendCode(renderTimeRange(times.old, times.new));
  const messages = renderReport(diff);
  for (const msg of messages) {
    await notifier.sendText(msg);
  }
  return messages.length;
}
