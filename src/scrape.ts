// src/scrape.ts
import "dotenv/config";
import { pathToFileURL } from "node:url";
import { loadConfig, type Config } from "./config.js";
import { loadDepartments, type Department } from "./departments.js";
import { compareSnapshots, countDiff } from "./diff.js";
import { extractCourses, loadDocument } from "./extract.js";
import { notifyDiff, TelegramNotifier, type Notifier } from "./notify.js";
import { RegistrationSession } from "./session.js";
import { createSnapshot, toSnapshotFile } from "./snapshot.js";
import { fileTime, loadSnapshot, previousPath, saveSnapshot } from "./storage.js";
import type { SnapshotFile } from "./types.js";
import { sleep } from "./utils.js";

export type PassDeps = {
  session: Pick<RegistrationSession, "login" | "fetchDepartment">;
  departments: Department[];
  signal?: AbortSignal;
};

/** Logs in and extracts every department into a fresh snapshot. */
export async function scrapeDepartments(config: Config, deps: PassDeps): Promise<SnapshotFile> {
  const { session, departments, signal } = deps;
  try {
    await session.login(config.username, config.password);
  } catch (e) {
    console.error("cannot login:", e);
    throw e;
  }
  console.log("login done");

  const snapshot = createSnapshot();
  for (const [i, dep] of departments.entries()) {
    console.log(`getting courses of ${dep.code}`);
    let html: string;
    try {
      html = await session.fetchDepartment(dep.code);
    } catch (e) {
      console.error(`cannot get the courses for ${dep.code}:`, e);
      throw e;
    }
    const got = extractCourses(loadDocument(html), { departmentCode: dep.code, departmentName: dep.name }, snapshot);
    console.log(`scraped department ${dep.code} with ${got} courses`);

    // レート制限
    if (i < departments.length - 1) await sleep(config.departmentDelayMs, signal);
  }
  console.log(`currently have ${snapshot.size} courses`);
  return toSnapshotFile(snapshot);
}

export type Baseline = { file: string; data: SnapshotFile };

/** One full pass: scrape, save, diff against `baseline` (or the previous file) and notify. */
export async function runOnce(config: Config, deps: PassDeps & { notifier: Notifier | null; baseline?: Baseline }) {
  const prev = deps.baseline?.data ?? loadSnapshot(config.outputJson);
  const prevFile = deps.baseline?.file ?? previousPath(config.outputJson);
  const curr = await scrapeDepartments(config, deps);

  saveSnapshot(config.outputJson, curr, { archiveDir: config.archiveDir });

  const diffs = compareSnapshots(prev, curr);
  const { added, removed, updated } = countDiff(diffs);
  console.log(`Scrape done. added=${added}, updated=${updated}, removed=${removed}`);

  if (added + removed + updated === 0) {
    console.log("No changes detected between this session and the previous one. Will not send any message");
    return diffs;
  }
  if (!deps.notifier) {
    console.warn("TELEGRAM_TOKEN / TELEGRAM_CHANNEL_ID not set; changes are not sent");
    return diffs;
  }
  console.log("Detected updates, sending messages via Telegram API");
  await notifyDiff(deps.notifier, diffs, {
    old: fileTime(prevFile),
    new: fileTime(config.outputJson),
  });
  return diffs;
}

export type LoopDeps = {
  departments: Department[];
  notifier: Notifier | null;
  /** Baseline for the first successful pass only. */
  baseline?: Baseline;
  newSession: () => PassDeps["session"];
};

/**
 * Runs a pass now and then every `config.periodMs` until `signal` aborts.
 * Without a period a failed pass is rethrown; with one it is logged and the
 * next tick runs as usual.
 */
export async function runLoop(config: Config, deps: LoopDeps, signal: AbortSignal): Promise<void> {
  let baseline = deps.baseline;
  const pass = async () => {
    const { departments, notifier } = deps;
    await runOnce(config, { session: deps.newSession(), departments, notifier, baseline, signal });
    baseline = undefined;
  };

  console.log("Running Start immediately");
  try {
    await pass();
  } catch (e) {
    if (signal.aborted) return;
    if (config.periodMs === null) throw e;
    console.error("Start error:", e);
  }

  while (config.periodMs !== null && !signal.aborted) {
    console.log(`Sleeping for ${config.periodMs / 1000} seconds before next run`);
    try {
      await sleep(config.periodMs, signal);
    } catch (e) {
      if (signal.aborted) break;
      throw e;
    }
    console.log("Running Start due to tick");
    try {
      await pass();
    } catch (e) {
      if (signal.aborted) break;
      console.error("fatal error:", e);
    }
  }
  console.log("Shutting down");
}

async function main() {
  const config = loadConfig();
  const departments = loadDepartments(config.departments);

  const controller = new AbortController();
  const stop = () => {
    console.log("received interrupt, shutting down");
    controller.abort();
  };
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);

  const notifier = config.telegramToken && config.telegramChannelId
    ? new TelegramNotifier({ token: config.telegramToken, chatId: config.telegramChannelId })
    : null;
  const baseline: Baseline | undefined = config.restoreFile
    ? { file: config.restoreFile, data: loadSnapshot(config.restoreFile) }
    : undefined;
  if (baseline) console.log(`Restored ${Object.keys(baseline.data).length} courses from ${baseline.file}`);

  await runLoop(config, {
    departments,
    notifier,
    baseline,
    newSession: () => new RegistrationSession({ baseUrl: config.baseUrl, signal: controller.signal }),
  }, controller.signal);
}

// テストから import されたときは実行しない
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch(err => {
    console.error(err);
    process.exit(1);
  });
}
