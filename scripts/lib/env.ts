type Env = Record<string, string | undefined>;

export function envNonNegativeInt(key: string, fallback: number, env: Env = process.env): number {
  const raw = env[key];
  if (raw == null || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return Math.floor(parsed);
}

export function envPositiveIntInRange(
  key: string,
  fallback: number,
  params: { min: number; max: number },
  env: Env = process.env
): number {
  const raw = env[key];
  const parsed = raw == null ? NaN : Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return Math.max(params.min, Math.min(params.max, Math.floor(parsed)));
}

export function envString(key: string, fallback: string, env: Env = process.env): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

/** 逗号分隔的四位年份列表；没有一个合法值时返回 fallback。 */
export function envYearList(key: string, fallback: readonly string[], env: Env = process.env): string[] {
  const raw = env[key];
  if (!raw) return [...fallback];
  const years = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => /^\d{4}$/.test(s));
  return years.length > 0 ? years : [...fallback];
}
