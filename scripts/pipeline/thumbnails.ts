import { join } from "node:path";
import { mkdir, readdir, rename, rm, stat, unlink, writeFile } from "node:fs/promises";
import { randomBytes } from "node:crypto";
import type { Item, SweepOptions, SweepResult } from "../../src/lib/types";
import { sha1 } from "../lib/http-cache";
import type { HttpClient } from "../lib/http";
import type { Logger } from "../lib/logger";
import { ageInDays } from "../lib/time";
import { createLimiter } from "./concurrency";

export const THUMB_EXT = ".img";

export type ThumbnailCache = {
  readonly dir: string;
  keyFor: (url: string) => string;
  pathFor: (url: string) => string;
  /** 本地已有就直接返回（不做任何校验）；否则下载一次。失败返回 undefined，不抛错。 */
  ensure: (url: string) => Promise<string | undefined>;
  sweep: (options: SweepOptions) => Promise<SweepResult>;
};

type CacheFile = {
  path: string;
  key: string;
  size: number;
  mtimeMs: number;
};

const IMAGE_ACCEPT = "image/avif,image/webp,image/apng,image/*,*/*;q=0.8";

function isHttpUrl(url: string): boolean {
  return /^https?:\/\//i.test(url);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** 当前快照引用到的缩略图 key，清理时受保护 */
export function thumbnailKeys(items: readonly Item[]): Set<string> {
  const keys = new Set<string>();
  for (const it of items) {
    if (it.thumbnailUrl) keys.add(sha1(it.thumbnailUrl));
  }
  return keys;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export function createThumbnailCache(deps: {
  dir: string;
  http: HttpClient;
  log: Logger;
  concurrency: number;
  now?: () => number;
}): ThumbnailCache {
  const { dir, http, log } = deps;
  const now = deps.now ?? (() => Date.now());
  const limiter = createLimiter(deps.concurrency);
  const inflight = new Map<string, Promise<string | undefined>>();

  const keyFor = (url: string) => sha1(url);
  const pathFor = (url: string) => join(dir, `${keyFor(url)}${THUMB_EXT}`);

  const download = async (url: string, outPath: string): Promise<string | undefined> => {
    const res = await http.get(url, { accept: IMAGE_ACCEPT });
    if (!res.ok) {
      log.debug(`[THUMB:ERR] ${url} ${res.error}`);
      return undefined;
    }

    const { reply } = res;
    if (reply.status < 200 || reply.status >= 300) {
      log.debug(`[THUMB:ERR] ${url} HTTP ${reply.status}`);
      return undefined;
    }
    const contentType = reply.headers.get("content-type") ?? "";
    if (contentType.toLowerCase().startsWith("text/")) {
      log.debug(`[THUMB:SKIP] ${url} non-image ${contentType}`);
      return undefined;
    }
    if (reply.bytes.length <= 0) {
      log.debug(`[THUMB:SKIP] ${url} bytes=0`);
      return undefined;
    }

    const tmpPath = `${outPath}.${randomBytes(6).toString("hex")}.part`;
    try {
      await mkdir(dir, { recursive: true });
      await writeFile(tmpPath, reply.bytes);
      await rename(tmpPath, outPath);
    } catch (err) {
      await rm(tmpPath, { force: true }).catch(() => undefined);
      log.debug(`[THUMB:ERR] ${url} ${errorMessage(err)}`);
      return undefined;
    }

    log.debug(`[THUMB:OK] ${url} -> ${outPath}`);
    return outPath;
  };

  const ensure = async (url: string): Promise<string | undefined> => {
    if (!url || !isHttpUrl(url)) return undefined;
    const outPath = pathFor(url);
    if (await isFile(outPath)) return outPath;

    const pending = inflight.get(outPath);
    if (pending) return await pending;

    const task = limiter
      .run(async () => {
        // 排队期间可能已被同 URL 的另一次请求写好
        if (await isFile(outPath)) return outPath;
        return await download(url, outPath);
      })
      .catch((err: unknown) => {
        log.debug(`[THUMB:ERR] ${url} ${errorMessage(err)}`);
        return undefined;
      })
      .finally(() => {
        inflight.delete(outPath);
      });
    inflight.set(outPath, task);
    return await task;
  };

  const sweep = async (options: SweepOptions): Promise<SweepResult> => {
    const { maxBytes, maxFiles, maxAgeDays, keep } = options;
    const result: SweepResult = {
      scanned: 0,
      removedByAge: 0,
      removedByCapacity: 0,
      remainingFiles: 0,
      remainingBytes: 0
    };

    let names: string[];
    try {
      const dirents = await readdir(dir, { withFileTypes: true });
      names = dirents.filter((d) => d.isFile() && d.name.endsWith(THUMB_EXT)).map((d) => d.name);
    } catch (err) {
      log.debug(`[SWEEP:SKIP] ${dir} ${errorMessage(err)}`);
      return result;
    }

    const nowMs = now();
    const files: CacheFile[] = [];
    for (const name of names) {
      const path = join(dir, name);
      const key = name.slice(0, -THUMB_EXT.length);
      let size: number;
      let mtimeMs: number;
      try {
        const st = await stat(path);
        size = st.size;
        mtimeMs = st.mtimeMs;
      } catch (err) {
        log.debug(`[SWEEP:STAT:ERR] ${path} ${errorMessage(err)}`);
        continue;
      }
      result.scanned += 1;

      // 过期：与容量无关，只要不在 keep 里就删
      if (maxAgeDays > 0 && ageInDays(nowMs, mtimeMs) > maxAgeDays && !keep.has(key)) {
        try {
          await unlink(path);
          result.removedByAge += 1;
        } catch (err) {
          log.debug(`[SWEEP:RM:ERR] ${path} ${errorMessage(err)}`);
        }
        continue;
      }
      files.push({ path, key, size, mtimeMs });
    }

    let totalBytes = files.reduce((sum, f) => sum + f.size, 0);
    let totalFiles = files.length;
    const overBounds = () => (maxBytes > 0 && totalBytes > maxBytes) || (maxFiles > 0 && totalFiles > maxFiles);

    if (overBounds()) {
      // 从最旧的开始删；受保护的文件跳过，但仍计入总量
      const byAge = [...files].sort((a, b) => a.mtimeMs - b.mtimeMs);
      for (const f of byAge) {
        if (keep.has(f.key)) continue;
        try {
          await unlink(f.path);
          totalBytes -= f.size;
          totalFiles -= 1;
          result.removedByCapacity += 1;
        } catch (err) {
          log.debug(`[SWEEP:RM:ERR] ${f.path} ${errorMessage(err)}`);
        }
        if (!overBounds()) break;
      }
    }

    result.remainingFiles = totalFiles;
    result.remainingBytes = totalBytes;
    return result;
  };

  return { dir, keyFor, pathFor, ensure, sweep };
}
