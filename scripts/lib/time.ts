const DAY_MS = 24 * 60 * 60 * 1000;

export function parseDate(input: string | undefined): Date | null {
  if (!input) return null;
  const trimmed = input.trim();
  if (!trimmed) return null;

  // ISO-8601 与 "Mon, 15 Dec 2025 12:34:56 +0000" 这类 RFC-822 写法 Date 都能吃。
  const direct = new Date(trimmed);
  if (!Number.isNaN(direct.getTime())) return direct;

  return null;
}

export function toIso(date: Date): string {
  return date.toISOString();
}

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

export function ageInDays(nowMs: number, mtimeMs: number): number {
  return (nowMs - mtimeMs) / DAY_MS;
}

/** 当前年份与上一年（按 UTC 计）。 */
export function recentYears(now: Date): string[] {
  const year = now.getUTCFullYear();
  return [String(year), String(year - 1)];
}
