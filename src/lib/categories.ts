export const CATEGORIES = ["x264/1080p", "x265/2160p", "x265/1080p", "Seriale"] as const;
export type Category = (typeof CATEGORIES)[number];

/** 带季/集信息的分类 */
export const SERIES_CATEGORY: Category = "Seriale";

export function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}

export function isSeriesCategory(value: string, seriesCategory: string = SERIES_CATEGORY): boolean {
  return value.toLowerCase() === seriesCategory.toLowerCase();
}
