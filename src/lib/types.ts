export type Quality = "2160p" | "1080p" | "720p" | "";

export type Source = {
  category: string;
  url: string;
};

export type Item = {
  category: string;
  title: string;
  /** 四位年份字符串，必在允许列表内 */
  year: string;
  quality: Quality;
  lektor: string;
  napisy: string;
  dubbing: string;
  thumbnailUrl?: string;
  link: string;
  /** ISO-8601（UTC） */
  publishedAt: string;
  /** 仅剧集分类会有 */
  season?: string;
  /** 单集 "5" 或区间 "1-3" */
  episode?: string;
};

/** 按发布时间倒序；整体替换写入 */
export type Snapshot = Item[];

export type ConditionalMeta = {
  etag?: string;
  lastModified?: string;
};

export type SourceReport = {
  category: string;
  url: string;
  used: "fetched" | "cached" | "fallback";
  httpStatus?: number;
  attempts: number;
  itemCount: number;
  durationMs: number;
  error?: string;
};

export type SweepOptions = {
  maxBytes: number;
  maxFiles: number;
  maxAgeDays: number;
  /** 当前快照引用到的缩略图 key（URL 的 sha1） */
  keep: ReadonlySet<string>;
};

export type SweepResult = {
  scanned: number;
  removedByAge: number;
  removedByCapacity: number;
  remainingFiles: number;
  remainingBytes: number;
};

export type CacheStats = {
  files: number;
  bytes: number;
};
