import type { Category } from "./categories";

export type SourceConfig = {
  category: Category;
  /** RSS 地址 */
  url: string;
};

export const SOURCE_CONFIGS: readonly SourceConfig[] = [
  { category: "x264/1080p", url: "https://electro-torrent.pl/rss.php?cat=770" },
  { category: "x265/2160p", url: "https://electro-torrent.pl/rss.php?cat=1160" },
  { category: "x265/1080p", url: "https://electro-torrent.pl/rss.php?cat=1116" },
  { category: "Seriale", url: "https://electro-torrent.pl/rss.php?cat=7" }
];
