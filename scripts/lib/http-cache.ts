import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { createHash, randomBytes } from "node:crypto";
import { dirname, join } from "node:path";
import type { ConditionalMeta } from "../../src/lib/types";

/** feed URL -> 条件请求元数据（ETag / Last-Modified） */
export type ConditionalCache = Record<string, ConditionalMeta>;

export async function readJsonFile<T>(filePath: string, fallback: T): Promise<T> {
  try {
    const raw = await readFile(filePath, "utf-8");
    return JSON.parse(raw) as T;
  } catch {
    return fallback;
  }
}

/**
 * 先写同目录临时文件再 rename：读者要么看到旧文件，要么看到完整的新文件。
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const raw = JSON.stringify(data, null, 2) + "\n";
  const tmpPath = `${filePath}.${randomBytes(6).toString("hex")}.tmp`;
  try {
    await writeFile(tmpPath, raw, "utf-8");
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}

export function sha1(input: string): string {
  return createHash("sha1").update(input).digest("hex");
}

function normalizeMeta(value: unknown): ConditionalMeta | null {
  if (!value || typeof value !== "object") return null;
  const etag: unknown = Reflect.get(value, "etag");
  const lastModified: unknown = Reflect.get(value, "lastModified");
  const meta: ConditionalMeta = {};
  if (typeof etag === "string" && etag) meta.etag = etag;
  if (typeof lastModified === "string" && lastModified) meta.lastModified = lastModified;
  return meta;
}

export async function readConditionalCache(filePath: string): Promise<ConditionalCache> {
  const raw = await readJsonFile<unknown>(filePath, {});
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) return {};

  const out: ConditionalCache = {};
  for (const [url, value] of Object.entries(raw)) {
    const meta = normalizeMeta(value);
    if (meta) out[url] = meta;
  }
  return out;
}

export async function writeConditionalCache(filePath: string, cache: ConditionalCache): Promise<void> {
  await writeJsonFile(filePath, cache);
}

export function conditionalHeaders(meta: ConditionalMeta | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  if (meta?.etag) headers["if-none-match"] = meta.etag;
  if (meta?.lastModified) headers["if-modified-since"] = meta.lastModified;
  return headers;
}

/** 响应里缺失的头沿用上一轮的值（元数据是“粘性”的）。 */
export function nextConditionalMeta(prev: ConditionalMeta | undefined, headers: Headers): ConditionalMeta {
  const next: ConditionalMeta = {};
  const etag = headers.get("etag") ?? prev?.etag;
  const lastModified = headers.get("last-modified") ?? prev?.lastModified;
  if (etag) next.etag = etag;
  if (lastModified) next.lastModified = lastModified;
  return next;
}

export function snapshotFilePath(cacheDir: string): string {
  return join(cacheDir, "items.json");
}

export function stateFilePath(cacheDir: string): string {
  return join(cacheDir, "state.json");
}

export function thumbDirPath(cacheDir: string): string {
  return join(cacheDir, "thumbs");
}
