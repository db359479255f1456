import type { Item, Quality, Snapshot } from "../../src/lib/types";
import { readJsonFile, writeJsonFile } from "../lib/http-cache";

const QUALITIES: readonly Quality[] = ["2160p", "1080p", "720p", ""];

function isQuality(value: unknown): value is Quality {
  return typeof value === "string" && (QUALITIES as readonly string[]).includes(value);
}

export function publishedMs(item: Item): number {
  const ms = Date.parse(item.publishedAt);
  return Number.isFinite(ms) ? ms : Number.NEGATIVE_INFINITY;
}

export function normalizeItem(value: unknown): Item | null {
  if (!value || typeof value !== "object") return null;
  const record: object = value;

  const str = (key: string): string | null => {
    const v: unknown = Reflect.get(record, key);
    return typeof v === "string" ? v : null;
  };

  const category = str("category");
  const title = str("title");
  const year = str("year");
  const link = str("link");
  const publishedAt = str("publishedAt");
  const quality: unknown = Reflect.get(record, "quality");

  if (!category || !title || !year || !/^\d{4}$/.test(year) || !link || !publishedAt) return null;
  if (!Number.isFinite(Date.parse(publishedAt))) return null;

  const item: Item = {
    category,
    title,
    year,
    quality: isQuality(quality) ? quality : "",
    lektor: str("lektor") ?? "None",
    napisy: str("napisy") ?? "None",
    dubbing: str("dubbing") ?? "None",
    link,
    publishedAt
  };

  const thumbnailUrl = str("thumbnailUrl");
  const season = str("season");
  const episode = str("episode");
  if (thumbnailUrl) item.thumbnailUrl = thumbnailUrl;
  if (season) item.season = season;
  if (episode) item.episode = episode;
  return item;
}

/** 文件缺失、JSON 损坏都视为空快照；单条记录不合法只丢弃该条。 */
export async function readSnapshot(filePath: string): Promise<Snapshot> {
  const raw = await readJsonFile<unknown>(filePath, []);
  if (!Array.isArray(raw)) return [];
  const out: Snapshot = [];
  for (const value of raw) {
    const item = normalizeItem(value);
    if (item) out.push(item);
  }
  return out;
}

export async function writeSnapshot(filePath: string, items: Snapshot): Promise<void> {
  await writeJsonFile(filePath, items);
}

/** 稳定排序：发布时间相同的条目保持拼接时的相对顺序。 */
export function sortByPublishedDesc(items: readonly Item[]): Snapshot {
  return [...items].sort((a, b) => {
    const diff = publishedMs(b) - publishedMs(a);
    return Number.isNaN(diff) ? 0 : diff;
  });
}
