/**
 * Module: Field Sanitizers
 * Purpose: Coerce loosely-typed cells into canonical values.
 * Every sanitizer returns `undefined` for absent or unusable input so callers
 * can omit the field instead of emitting empty strings, nulls or zeros.
 */

const collapseWS = (s: string): string => s.replace(/\s+/g, " ").trim();
const DIGITS_RE = /^\d+$/;
const DECIMAL_RE = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?$/i;
// Below this an entry height is read as meters.
const MAX_HEIGHT_IN_METERS = 10;

/** Lower-case comparison key with collapsed whitespace; "ß" folds to "ss" as upper case spells it. */
export const foldKey = (v: unknown): string => collapseWS(cellText(v)).toLowerCase().replace(/ß/g, "ss");

/** Trimmed text of a cell; numbers and booleans are stringified. */
export function cellText(v: unknown): string {
  if (v === null || v === undefined) return "";
  if (typeof v === "number") return Number.isFinite(v) ? String(v) : "";
  return String(v).trim();
}

export function nonEmptyText(v: unknown): string | undefined {
  const s = cellText(v);
  return s ? s : undefined;
}

/**
 * Parse a decimal number from a numeric cell or text.
 * Accepts a single decimal comma ("48,1") as German sheets write it, bare
 * leading or trailing points ("48.", ".5") and exponents ("4.8e1").
 */
export function parseDecimal(v: unknown): number | undefined {
  if (typeof v === "number") return Number.isFinite(v) ? v : undefined;
  if (typeof v !== "string") return undefined;
  let s = v.trim();
  if (!s.includes(".") && (s.match(/,/g) ?? []).length === 1) s = s.replace(",", ".");
  if (!DECIMAL_RE.test(s)) return undefined;
  return Number(s);
}

/**
 * Integer from a numeric cell (rounded) or from text made only of decimal digits.
 * "n/a", "12cm", "1.5" as text -> undefined.
 */
export function digitsOnlyInteger(v: unknown): number | undefined {
  if (typeof v === "number") return Number.isFinite(v) ? Math.round(v) : undefined;
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  return DIGITS_RE.test(s) ? Number.parseInt(s, 10) : undefined;
}

/**
 * Entry height in centimeters.
 * A number below 10 is a value in meters (2.3 -> 230); anything larger is
 * centimeters, rounded (210.5 -> 211). Text is accepted only when made of
 * digits, and read as centimeters.
 */
export function heightCentimeters(v: unknown): number | undefined {
  if (typeof v === "number") {
    if (!Number.isFinite(v)) return undefined;
    return Math.round(v < MAX_HEIGHT_IN_METERS ? v * 100 : v);
  }
  return digitsOnlyInteger(v);
}

const DURATION_UNITS: Array<{ re: RegExp; seconds: number }> = [
  { re: /^(sekunden?|sek|s)$/, seconds: 1 },
  { re: /^(minuten?|min)$/, seconds: 60 },
  { re: /^(stunden?|std|h)$/, seconds: 3600 },
  { re: /^(tage?|d)$/, seconds: 86400 },
  { re: /^(wochen?)$/, seconds: 604800 },
  { re: /^(monate?)$/, seconds: 2592000 },
];

/**
 * Duration in seconds. Numbers are taken as seconds and rounded;
 * German text such as "2 Stunden", "30 Min" or "1,5 Tage" is converted.
 */
export function germanDurationSeconds(v: unknown): number | undefined {
  if (typeof v === "number") return Number.isFinite(v) ? Math.round(v) : undefined;
  if (typeof v !== "string") return undefined;
  const s = collapseWS(v).toLowerCase();
  if (DIGITS_RE.test(s)) return Number.parseInt(s, 10);
  const m = s.match(/^(\d+(?:[.,]\d+)?)\s*([a-zäöü]+)\.?$/);
  if (!m) return undefined;
  const amount = Number(m[1].replace(",", "."));
  const unit = DURATION_UNITS.find((u) => u.re.test(m[2]));
  return unit ? Math.round(amount * unit.seconds) : undefined;
}

/** Join the non-empty trimmed lines of a multi-line cell with single spaces. */
export function collapseLines(v: unknown): string | undefined {
  const s = cellText(v);
  if (!s) return undefined;
  const joined = s
    .split(/\r?\n/)
    .map((line) => collapseWS(line))
    .filter(Boolean)
    .join(" ");
  return joined || undefined;
}

const TRUE_WORDS = new Set(["ja", "j", "yes", "y", "true", "wahr", "1", "x"]);
const FALSE_WORDS = new Set(["nein", "n", "no", "false", "falsch", "0"]);

export function parseGermanBoolean(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v === 1 ? true : v === 0 ? false : undefined;
  const s = cellText(v).toLowerCase();
  if (TRUE_WORDS.has(s)) return true;
  if (FALSE_WORDS.has(s)) return false;
  return undefined;
}

export type EnumTable<T extends string> = ReadonlyMap<string, T>;

/** Build a lookup table whose keys match case- and whitespace-insensitively. */
export function enumTable<T extends string>(entries: Record<string, T>): EnumTable<T> {
  return new Map(Object.entries(entries).map(([k, v]) => [foldKey(k), v] as const));
}

export function mapEnum<T extends string>(table: EnumTable<T>, v: unknown): T | undefined {
  if (v === null || v === undefined) return undefined;
  return table.get(foldKey(v));
}

/**
 * Time of day as "HH:MM".
 * - Numbers are Excel day fractions (0.5 -> "12:00", 1 -> "24:00"); a
 *   date-time serial such as 45292.75 contributes its time part ("18:00").
 * - Text may be "8:00", "08:00" or "08:00:00".
 * Returns `null` for a present but unreadable value, `undefined` for an empty cell.
 */
export function parseTimeOfDay(v: unknown): string | null | undefined {
  if (v === null || v === undefined || v === "") return undefined;
  if (typeof v === "number") {
    if (!Number.isFinite(v) || v < 0) return null;
    const minutes = Math.round((v > 1 ? v % 1 : v) * 1440);
    return `${pad2(Math.floor(minutes / 60))}:${pad2(minutes % 60)}`;
  }
  if (typeof v !== "string") return null;
  const s = v.trim();
  if (!s) return undefined;
  const m = s.match(/^(\d{1,2})[:.](\d{2})(?::\d{2})?$/);
  if (!m) return null;
  const h = Number(m[1]);
  const min = Number(m[2]);
  if (h > 24 || min > 59 || (h === 24 && min !== 0)) return null;
  return `${pad2(h)}:${pad2(min)}`;
}

const pad2 = (n: number): string => String(n).padStart(2, "0");
