import type { Dirent } from "node:fs";
import { join } from "node:path";
import { mkdir, readdir, rm, stat } from "node:fs/promises";
import type { CacheStats, Item, Snapshot, SourceReport, SweepResult } from "../../src/lib/types";
import type { AppConfig } from "../lib/config";
import { thumbDirPath } from "../lib/http-cache";
import { createHttpClient, type HttpClient } from "../lib/http";
import { silentLogger, type Logger } from "../lib/logger";
import { createReleaseParser } from "../sources/release-parser";
import { mapWithConcurrency } from "./concurrency";
import { createItemStore, type RefreshResult } from "./item-store";
import { createThumbnailCache, thumbnailKeys } from "./thumbnails";

export type FeedMessage =
  | { type: "refresh:done"; items: Snapshot; reports: SourceReport[] }
  | { type: "refresh:failed"; error: string }
  | { type: "sweep:done"; result: SweepResult }
  | { type: "thumbnail:ready"; url: string; path: string }
  | { type: "thumbnail:missing"; url: string };

export type FeedListener = (message: FeedMessage) => void;

export type ServiceRefreshResult = RefreshResult & { sweep?: SweepResult };

type RefreshRound = {
  days: number;
  dryRun: boolean;
  promise: Promise<ServiceRefreshResult>;
};

export type FeedService = {
  /** 当前载入的快照 */
  readonly items: Snapshot;
  start: () => Promise<Snapshot>;
  refresh: (days: number, options?: { dryRun?: boolean }) => Promise<ServiceRefreshResult>;
  ensureThumbnail: (url: string) => Promise<string | undefined>;
  prefetchThumbnails: (items?: readonly Item[]) => Promise<{ attempted: number; cached: number }>;
  sweep: () => Promise<SweepResult>;
  stats: () => Promise<CacheStats>;
  clean: () => Promise<void>;
  subscribe: (listener: FeedListener) => () => void;
};

export async function directoryStats(dir: string): Promise<CacheStats> {
  const out: CacheStats = { files: 0, bytes: 0 };
  let dirents: Dirent[];
  try {
    dirents = await readdir(dir, { withFileTypes: true });
  } catch {
    return out;
  }

  for (const d of dirents) {
    const path = join(dir, d.name);
    if (d.isDirectory()) {
      const nested = await directoryStats(path);
      out.files += nested.files;
      out.bytes += nested.bytes;
      continue;
    }
    try {
      const st = await stat(path);
      out.files += 1;
      out.bytes += st.size;
    } catch {
      // 统计期间被删掉的文件直接跳过
      continue;
    }
  }
  return out;
}

/**
 * 给展示层用的门面：持有当前快照，串行化刷新与清理，缩略图走独立的下载池，
 * 完成结果通过 subscribe 的回调送回调用方。
 */
export function createFeedService(
  config: AppConfig,
  deps?: { log?: Logger; http?: HttpClient; now?: () => Date }
): FeedService {
  const log = deps?.log ?? silentLogger;
  const http = deps?.http ?? createHttpClient(config.http);
  const now = deps?.now ?? (() => new Date());

  const store = createItemStore({
    cacheDir: config.cacheDir,
    sources: config.sources,
    feedConcurrency: config.feedConcurrency,
    http,
    parser: createReleaseParser(config.parser),
    log,
    now
  });
  const thumbs = createThumbnailCache({
    dir: thumbDirPath(config.cacheDir),
    http,
    log,
    concurrency: config.thumbConcurrency,
    now: () => now().getTime()
  });

  const listeners = new Set<FeedListener>();
  let items: Snapshot = [];
  let refreshing: RefreshRound | null = null;
  let sweepChain: Promise<unknown> = Promise.resolve();

  const publish = (message: FeedMessage) => {
    for (const listener of listeners) {
      try {
        listener(message);
      } catch (err) {
        log.warn(`[LISTENER:ERR] ${message.type} ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  };

  const sweep = async (): Promise<SweepResult> => {
    const keep = thumbnailKeys(items);
    const run = sweepChain.then(() => thumbs.sweep({ ...config.thumbs, keep }));
    sweepChain = run.catch(() => undefined);
    const result = await run;
    log.debug(
      `[SWEEP] scanned=${result.scanned} age=${result.removedByAge} capacity=${result.removedByCapacity} remaining=${result.remainingFiles}`
    );
    publish({ type: "sweep:done", result });
    return result;
  };

  const start = async (): Promise<Snapshot> => {
    items = await store.load();
    await sweep();
    return items;
  };

  const runRefresh = async (days: number, dryRun: boolean): Promise<ServiceRefreshResult> => {
    try {
      const result = await store.refresh(days, { dryRun });
      if (dryRun) return result;
      items = result.items;
      publish({ type: "refresh:done", items: result.items, reports: result.reports });
      return { ...result, sweep: await sweep() };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      publish({ type: "refresh:failed", error: message });
      throw err;
    }
  };

  const refresh = async (days: number, options?: { dryRun?: boolean }): Promise<ServiceRefreshResult> => {
    const dryRun = options?.dryRun ?? false;
    const last = refreshing;
    // 参数相同才复用正在跑（或排队中）的那一轮；否则排在它后面
    if (last && last.days === days && last.dryRun === dryRun) return await last.promise;

    const prior: Promise<unknown> = last ? last.promise.catch(() => undefined) : Promise.resolve();
    const round: RefreshRound = {
      days,
      dryRun,
      promise: prior
        .then(async () => await runRefresh(days, dryRun))
        .finally(() => {
          if (refreshing === round) refreshing = null;
        })
    };
    refreshing = round;
    return await round.promise;
  };

  const ensureThumbnail = async (url: string): Promise<string | undefined> => {
    const path = await thumbs.ensure(url);
    if (path) publish({ type: "thumbnail:ready", url, path });
    else publish({ type: "thumbnail:missing", url });
    return path;
  };

  const prefetchThumbnails = async (list?: readonly Item[]) => {
    const urls = [...new Set((list ?? items).map((it) => it.thumbnailUrl).filter((u): u is string => Boolean(u)))];
    const paths = await mapWithConcurrency({
      items: urls,
      concurrency: config.thumbConcurrency,
      fn: async (url) => await ensureThumbnail(url)
    });
    return { attempted: urls.length, cached: paths.filter(Boolean).length };
  };

  const clean = async (): Promise<void> => {
    if (refreshing) await refreshing.promise.catch(() => undefined);
    await sweepChain;
    for (const path of [store.snapshotPath, store.statePath]) {
      await rm(path, { force: true });
    }
    await rm(thumbs.dir, { recursive: true, force: true });
    await mkdir(thumbs.dir, { recursive: true });
    items = [];
  };

  const subscribe = (listener: FeedListener) => {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  };

  return {
    get items() {
      return items;
    },
    start,
    refresh,
    ensureThumbnail,
    prefetchThumbnails,
    sweep,
    stats: async () => await directoryStats(config.cacheDir),
    clean,
    subscribe
  };
}
