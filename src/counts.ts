const MULTIPLIERS: Record<string, number> = { k: 1_000, m: 1_000_000 };

/**
 * Parses the counters story sites print ("1,234", "2.5k", "(12)", "1.234.567").
 *
 * More than one `.` means every `.` is a thousands separator; a single one is a
 * decimal point. Anything unparseable counts as 0.
 */
export function parseCount(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) && value > 0 ? Math.trunc(value) : 0;
  }
  if (typeof value !== "string") return 0;

  let s = value.trim().toLowerCase().replace(/[()]/g, "");
  if ((s.match(/\./g) ?? []).length > 1) s = s.replaceAll(".", "");
  s = s.replaceAll(",", "").trim();

  let multiplier = 1;
  const suffix = s.slice(-1);
  const suffixMultiplier = MULTIPLIERS[suffix];
  if (suffixMultiplier !== undefined) {
    multiplier = suffixMultiplier;
    s = s.slice(0, -1).trim();
  }
  if (s.length === 0 || !/^\d*\.?\d+$|^\d+\.$/.test(s)) return 0;

  const parsed = Number.parseFloat(s);
  if (!Number.isFinite(parsed)) return 0;
  // 1.005 * 1000 is 1004.999..., so scaled values round instead of truncating.
  return multiplier === 1 ? Math.trunc(parsed) : Math.round(parsed * multiplier);
}
