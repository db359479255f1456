export { loadConfig, type AppConfig, type ParserConfig } from "./lib/config";
export { createHttpClient, type HttpClient } from "./lib/http";
export { createLogger, silentLogger, type Logger } from "./lib/logger";
export { fetchFeed, type FeedFetchResult } from "./pipeline/fetch-feed";
export { createItemStore, type ItemStore, type RefreshResult } from "./pipeline/item-store";
export { createThumbnailCache, thumbnailKeys, type ThumbnailCache } from "./pipeline/thumbnails";
export { createFeedService, type FeedListener, type FeedMessage, type FeedService } from "./pipeline/service";
export { createReleaseParser, type ReleaseParser } from "./sources/release-parser";
export type * from "../src/lib/types";
