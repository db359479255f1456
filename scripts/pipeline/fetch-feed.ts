import type { ConditionalMeta, Source } from "../../src/lib/types";
import { conditionalHeaders, nextConditionalMeta } from "../lib/http-cache";
import type { HttpClient } from "../lib/http";

export type FeedFetchResult =
  | { ok: true; notModified: true; status: 304; meta: ConditionalMeta; attempts: number }
  | {
      ok: true;
      notModified: false;
      status: number;
      body: Buffer;
      contentType: string | null;
      meta: ConditionalMeta;
      attempts: number;
    }
  | { ok: false; status?: number; error: string; attempts: number };

const FEED_ACCEPT = "application/rss+xml,application/xml;q=0.9,*/*;q=0.8";

/**
 * 单个来源的条件请求。304 时 meta 原样返回；2xx 时缺失的 ETag/Last-Modified 沿用旧值。
 */
export async function fetchFeed(params: {
  source: Source;
  meta: ConditionalMeta | undefined;
  http: HttpClient;
}): Promise<FeedFetchResult> {
  const { source, http } = params;
  const meta = params.meta ?? {};

  const res = await http.get(source.url, { accept: FEED_ACCEPT, ...conditionalHeaders(meta) });
  if (!res.ok) return { ok: false, error: res.error, attempts: res.attempts };

  const { reply } = res;
  if (reply.status === 304) {
    return { ok: true, notModified: true, status: 304, meta, attempts: res.attempts };
  }
  if (reply.status < 200 || reply.status >= 300) {
    return { ok: false, status: reply.status, error: `HTTP ${reply.status}`, attempts: res.attempts };
  }

  return {
    ok: true,
    notModified: false,
    status: reply.status,
    body: reply.bytes,
    contentType: reply.headers.get("content-type"),
    meta: nextConditionalMeta(meta, reply.headers),
    attempts: res.attempts
  };
}
