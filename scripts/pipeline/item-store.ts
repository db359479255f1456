import type { ConditionalMeta, Item, Snapshot, Source, SourceReport } from "../../src/lib/types";
import {
  readConditionalCache,
  snapshotFilePath,
  stateFilePath,
  writeConditionalCache,
  type ConditionalCache
} from "../lib/http-cache";
import type { HttpClient } from "../lib/http";
import type { Logger } from "../lib/logger";
import { daysBefore } from "../lib/time";
import type { ReleaseParser } from "../sources/release-parser";
import { mapWithConcurrency } from "./concurrency";
import { fetchFeed } from "./fetch-feed";
import { publishedMs, readSnapshot, sortByPublishedDesc, writeSnapshot } from "./snapshot";

export type RefreshResult = {
  items: Snapshot;
  reports: SourceReport[];
  cutoff: Date;
};

export type ItemStore = {
  readonly snapshotPath: string;
  readonly statePath: string;
  load: () => Promise<Snapshot>;
  refresh: (days: number, options?: { dryRun?: boolean }) => Promise<RefreshResult>;
};

type SourceOutcome = {
  items: Item[];
  report: SourceReport;
  /** undefined 表示本轮不改动该来源的条件请求元数据 */
  meta?: ConditionalMeta;
};

export function previousForSource(previous: readonly Item[], category: string, cutoff: Date): Item[] {
  const cutoffMs = cutoff.getTime();
  return previous.filter((it) => it.category === category && publishedMs(it) >= cutoffMs);
}

export function createItemStore(deps: {
  cacheDir: string;
  sources: readonly Source[];
  feedConcurrency: number;
  http: HttpClient;
  parser: ReleaseParser;
  log: Logger;
  now?: () => Date;
}): ItemStore {
  const { sources, http, parser, log } = deps;
  const now = deps.now ?? (() => new Date());
  const snapshotPath = snapshotFilePath(deps.cacheDir);
  const statePath = stateFilePath(deps.cacheDir);

  const runSource = async (params: {
    source: Source;
    cache: ConditionalCache;
    previous: readonly Item[];
    cutoff: Date;
  }): Promise<SourceOutcome> => {
    const { source, cache, previous, cutoff } = params;
    const start = Date.now();
    const fallback = () => previousForSource(previous, source.category, cutoff);

    const res = await fetchFeed({ source, meta: cache[source.url], http });

    if (!res.ok) {
      const items = fallback();
      return {
        items,
        report: {
          category: source.category,
          url: source.url,
          used: "fallback",
          httpStatus: res.status,
          attempts: res.attempts,
          itemCount: items.length,
          durationMs: Date.now() - start,
          error: res.error
        }
      };
    }

    if (res.notModified) {
      const items = fallback();
      return {
        items,
        meta: res.meta,
        report: {
          category: source.category,
          url: source.url,
          used: "cached",
          httpStatus: 304,
          attempts: res.attempts,
          itemCount: items.length,
          durationMs: Date.now() - start
        }
      };
    }

    try {
      const items = parser.parse(source.category, res.body, cutoff, res.contentType);
      return {
        items,
        meta: res.meta,
        report: {
          category: source.category,
          url: source.url,
          used: "fetched",
          httpStatus: res.status,
          attempts: res.attempts,
          itemCount: items.length,
          durationMs: Date.now() - start
        }
      };
    } catch (err) {
      // 文档级解析失败：保留旧元数据，避免下一轮拿到 304 后一直停在旧数据上
      const message = err instanceof Error ? err.message : String(err);
      const items = fallback();
      return {
        items,
        report: {
          category: source.category,
          url: source.url,
          used: "fallback",
          httpStatus: res.status,
          attempts: res.attempts,
          itemCount: items.length,
          durationMs: Date.now() - start,
          error: message || "parse_error"
        }
      };
    }
  };

  const load = async (): Promise<Snapshot> => await readSnapshot(snapshotPath);

  const refresh = async (days: number, options?: { dryRun?: boolean }): Promise<RefreshResult> => {
    const dryRun = options?.dryRun ?? false;
    const cutoff = daysBefore(now(), days);
    const previous = await readSnapshot(snapshotPath);
    const cache = await readConditionalCache(statePath);

    // 先全部完成再合并：合并阶段不会与任何来源的读写交错
    const outcomes = await mapWithConcurrency({
      items: sources,
      concurrency: Math.min(deps.feedConcurrency, sources.length),
      fn: async (source) => {
        try {
          return await runSource({ source, cache, previous, cutoff });
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          const items = previousForSource(previous, source.category, cutoff);
          const outcome: SourceOutcome = {
            items,
            report: {
              category: source.category,
              url: source.url,
              used: "fallback",
              attempts: 0,
              itemCount: items.length,
              durationMs: 0,
              error: message
            }
          };
          return outcome;
        }
      }
    });

    const nextCache: ConditionalCache = { ...cache };
    for (let i = 0; i < outcomes.length; i += 1) {
      const meta = outcomes[i].meta;
      if (meta) nextCache[sources[i].url] = meta;
    }

    const reports = outcomes.map((o) => o.report);
    for (const r of reports) {
      const line = `[${r.used === "fallback" ? "ERR" : "OK"}] ${r.category} items=${r.itemCount} http=${r.httpStatus ?? "-"} used=${r.used} attempts=${r.attempts}`;
      if (r.error) log.warn(`${line} error=${r.error}`);
      else log.info(line);
    }

    const items = sortByPublishedDesc(outcomes.flatMap((o) => o.items));

    if (dryRun) {
      log.info(`[DRY] items=${items.length} sources=${reports.length}`);
      return { items, reports, cutoff };
    }

    // 快照写失败时不更新 state
    try {
      await writeSnapshot(snapshotPath, items);
    } catch (err) {
      log.warn(`[SNAPSHOT:ERR] ${snapshotPath} ${err instanceof Error ? err.message : String(err)}`);
      return { items, reports, cutoff };
    }
    try {
      await writeConditionalCache(statePath, nextCache);
    } catch (err) {
      log.warn(`[STATE:ERR] ${statePath} ${err instanceof Error ? err.message : String(err)}`);
    }

    return { items, reports, cutoff };
  };

  return { snapshotPath, statePath, load, refresh };
}
