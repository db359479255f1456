import { homedir } from "node:os";
import { join } from "node:path";
import { SERIES_CATEGORY } from "../../src/lib/categories";
import { SOURCE_CONFIGS } from "../../src/lib/source-config";
import type { Source } from "../../src/lib/types";
import { envNonNegativeInt, envPositiveIntInRange, envString, envYearList } from "./env";
import { recentYears } from "./time";

export const APP_ID = "electro_rss";

export type AppConfig = {
  readonly cacheDir: string;
  readonly sources: readonly Source[];
  readonly http: {
    readonly userAgent: string;
    readonly timeoutMs: number;
    readonly retries: number;
    readonly backoffMs: number;
  };
  readonly feedConcurrency: number;
  readonly thumbConcurrency: number;
  readonly thumbs: {
    readonly maxBytes: number;
    readonly maxFiles: number;
    readonly maxAgeDays: number;
  };
  readonly parser: ParserConfig;
};

export type ParserConfig = {
  readonly allowedYears: readonly string[];
  readonly seriesCategory: string;
  /** 标题含此短语（不区分大小写）时 lektor 默认取 nativeAudioMarker */
  readonly nativeAudioPhrase: string;
  readonly nativeAudioMarker: string;
};

export const DEFAULT_USER_AGENT = "ElectroRSS/1.0 (+Linux; Node.js)";

function defaultCacheDir(env: Record<string, string | undefined>): string {
  const base = env.XDG_CACHE_HOME?.trim() || join(homedir(), ".cache");
  return join(base, APP_ID);
}

export function loadConfig(params?: {
  env?: Record<string, string | undefined>;
  now?: Date;
}): AppConfig {
  const env = params?.env ?? process.env;
  const now = params?.now ?? new Date();
  const sources = SOURCE_CONFIGS.map((s) => ({ category: s.category, url: s.url }));

  const config: AppConfig = {
    cacheDir: envString("RELEASE_FEED_CACHE_DIR", defaultCacheDir(env), env),
    sources,
    http: {
      userAgent: DEFAULT_USER_AGENT,
      timeoutMs: envPositiveIntInRange("RELEASE_FEED_TIMEOUT_MS", 6000, { min: 500, max: 120_000 }, env),
      retries: envNonNegativeInt("RELEASE_FEED_RETRIES", 2, env),
      backoffMs: 200
    },
    feedConcurrency: Math.min(
      envPositiveIntInRange("RELEASE_FEED_FEED_CONCURRENCY", 4, { min: 1, max: 16 }, env),
      Math.max(1, sources.length)
    ),
    thumbConcurrency: envPositiveIntInRange("RELEASE_FEED_THUMB_CONCURRENCY", 6, { min: 1, max: 32 }, env),
    thumbs: {
      maxBytes: envNonNegativeInt("RELEASE_FEED_THUMB_MAX_BYTES", 50 * 1024 * 1024, env),
      maxFiles: envNonNegativeInt("RELEASE_FEED_THUMB_MAX_FILES", 50, env),
      maxAgeDays: envNonNegativeInt("RELEASE_FEED_THUMB_MAX_AGE_DAYS", 20, env)
    },
    parser: {
      allowedYears: envYearList("RELEASE_FEED_YEARS", recentYears(now), env),
      seriesCategory: SERIES_CATEGORY,
      nativeAudioPhrase: "film polski",
      nativeAudioMarker: "Film Polski"
    }
  };

  return Object.freeze(config);
}
