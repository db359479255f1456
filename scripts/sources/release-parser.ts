import { isSeriesCategory } from "../../src/lib/categories";
import type { Item, Quality } from "../../src/lib/types";
import type { ParserConfig } from "../lib/config";
import { parseDate, toIso } from "../lib/time";
import { decodeFeedBytes, parseFeed, type FeedEntry } from "../lib/xml-feed";

export type ReleaseParser = {
  /** 解码 + 解析整份 feed；XML 不合法时抛 FeedParseError */
  parse: (category: string, body: Uint8Array | string, cutoff: Date, contentType?: string | null) => Item[];
  parseEntries: (category: string, entries: FeedEntry[], cutoff: Date) => Item[];
};

const TITLE_RE = /^(.+?)\s*\((\d{4})\)/;
const QUALITY_RE = /\b(2160p|1080p|720p)\b/i;
const LEKTOR_RE = /(Lektor\s*[^\]\/&\s]+(?:\s*AI|\s*\(AI\))?)/i;
const NAPISY_RE = /(Napisy\s*[^\]\/&\s]+(?:\s*AI|\s*\(AI\))?)/i;
const DUBBING_RE = /(Dubbing\s*[^\]\/&\s]+)/i;

// 季/集：标题先转小写再匹配
const SEASON_EPISODE_RE = /\bs\s*(\d{1,2})\s*e\s*(\d{1,3})\b/;
const SEASON_WORD_RE = /\b(?:sezon|season)\s*(\d{1,2})\b/;
const SEASON_SHORT_RE = /\bs\s*(\d{1,2})\b/;
const EPISODE_RANGE_RE = /\be\s*(\d{1,3})\s*[-–]\s*(\d{1,3})\b/;
const EPISODE_RE = /\be\s*(\d{1,3})\b/;

export const NO_TAG = "None";

function stripBrackets(value: string): string {
  return value.replace(/^[[\]]+|[[\]]+$/g, "").trim();
}

function num(raw: string): string {
  return String(Number.parseInt(raw, 10));
}

function toQuality(raw: string | undefined): Quality {
  const lower = raw?.toLowerCase();
  if (lower === "2160p" || lower === "1080p" || lower === "720p") return lower;
  return "";
}

export function resolvePublishedAt(entry: FeedEntry): Date | null {
  return parseDate(entry.structuredDate) ?? parseDate(entry.headerDate);
}

export function extractSeasonEpisode(title: string): { season?: string; episode?: string } {
  const low = title.toLowerCase();

  const combined = SEASON_EPISODE_RE.exec(low);
  if (combined) return { season: num(combined[1]), episode: num(combined[2]) };

  const out: { season?: string; episode?: string } = {};
  const season = SEASON_WORD_RE.exec(low) ?? SEASON_SHORT_RE.exec(low);
  if (season) out.season = num(season[1]);

  const range = EPISODE_RANGE_RE.exec(low);
  if (range) {
    out.episode = `${num(range[1])}-${num(range[2])}`;
  } else {
    const single = EPISODE_RE.exec(low);
    if (single) out.episode = num(single[1]);
  }
  return out;
}

export function createReleaseParser(config: ParserConfig): ReleaseParser {
  const allowedYears = new Set(config.allowedYears);
  const nativeAudioPhrase = config.nativeAudioPhrase.toLowerCase();

  const toItem = (category: string, entry: FeedEntry, cutoff: Date): Item | null => {
    const published = resolvePublishedAt(entry);
    if (!published) return null;
    if (published.getTime() < cutoff.getTime()) return null;

    const text = entry.title;
    const match = TITLE_RE.exec(text);
    if (!match) return null;
    const title = match[1].trim();
    const year = match[2];
    if (!title || !allowedYears.has(year)) return null;
    if (!entry.link) return null;

    const lektor = LEKTOR_RE.exec(text);
    const napisy = NAPISY_RE.exec(text);
    const dubbing = DUBBING_RE.exec(text);

    const item: Item = {
      category,
      title,
      year,
      quality: toQuality(QUALITY_RE.exec(text)?.[1]),
      lektor: lektor
        ? stripBrackets(lektor[1])
        : text.toLowerCase().includes(nativeAudioPhrase)
          ? config.nativeAudioMarker
          : NO_TAG,
      napisy: napisy ? stripBrackets(napisy[1]) : NO_TAG,
      dubbing: dubbing ? stripBrackets(dubbing[1]) : NO_TAG,
      link: entry.link,
      publishedAt: toIso(published)
    };
    if (entry.thumbnail) item.thumbnailUrl = entry.thumbnail;

    if (isSeriesCategory(category, config.seriesCategory)) {
      const { season, episode } = extractSeasonEpisode(text);
      if (season) item.season = season;
      if (episode) item.episode = episode;
    }

    return item;
  };

  const parseEntries = (category: string, entries: FeedEntry[], cutoff: Date): Item[] => {
    const out: Item[] = [];
    for (const entry of entries) {
      const item = toItem(category, entry, cutoff);
      if (item) out.push(item);
    }
    return out;
  };

  const parse = (
    category: string,
    body: Uint8Array | string,
    cutoff: Date,
    contentType?: string | null
  ): Item[] => {
    const xml = typeof body === "string" ? body : decodeFeedBytes(body, contentType);
    return parseEntries(category, parseFeed(xml), cutoff);
  };

  return { parse, parseEntries };
}
