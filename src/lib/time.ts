/**
 * src/lib/time.ts
 * WHAT: Unix epoch timestamp utilities and human duration parsing.
 * WHY: Timers store expires_at as INTEGER Unix seconds; explicit timestamps keep tests predictable.
 * FLOWS:
 *  - nowUtc() → current Unix seconds (INTEGER for SQLite)
 *  - formatUtc() → plain-text time for the reminder embed footer
 *  - parseDurationSeconds("1h 30m") → 5400
 * DOCS:
 *  - Unix epoch: https://en.wikipedia.org/wiki/Unix_time
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * Returns the current Unix timestamp in seconds (not milliseconds).
 *
 * @example
 * const now = nowUtc(); // e.g., 1729454400
 */
// Floor, not round: a timer due "this second" must not be reported as next second
export const nowUtc = (): number => Math.floor(Date.now() / 1000);

/**
 * WHAT: Format Unix timestamp as human-readable UTC time for embed footers.
 * WHY: Discord doesn't render <t:...> tags in embed footers; need plain text.
 *
 * @example
 * formatUtc(1729454400) // "2024-10-20 20:00 UTC"
 */
export function formatUtc(tsSec: number): string {
  return new Date(tsSec * 1000)
    .toISOString()
    .replace("T", " ")
    .replace(/:\d{2}\.\d{3}Z$/, " UTC");
}

const MINUTE = 60;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

/**
 * Single-letter units are case-sensitive: "m" is a minute, "M" a month.
 * Months and years are fixed lengths (30 and 365 days); close enough for reminders.
 */
const LETTER_UNITS: Record<string, number> = {
  s: 1,
  m: MINUTE,
  h: HOUR,
  d: DAY,
  w: 7 * DAY,
  M: 30 * DAY,
  y: 365 * DAY,
  Y: 365 * DAY,
};

// Word units are case-insensitive; a trailing plural "s" is accepted
const WORD_UNITS: Record<string, number> = {
  sec: 1,
  second: 1,
  min: MINUTE,
  minute: MINUTE,
  hr: HOUR,
  hour: HOUR,
  day: DAY,
  week: 7 * DAY,
  month: 30 * DAY,
  year: 365 * DAY,
};

function unitSeconds(unit: string): number | undefined {
  if (unit.length === 1) return LETTER_UNITS[unit];
  const word = unit.toLowerCase();
  return WORD_UNITS[word] ?? (word.endsWith("s") ? WORD_UNITS[word.slice(0, -1)] : undefined);
}

/**
 * WHAT: Sum every "<number><unit>" pair in a free-form string.
 * WHY: Reminder and tempban durations are typed by humans ("in 2 days 3h", "1,5h").
 *
 * @returns Total seconds (rounded), or 0 when nothing recognisable was found
 * @example
 * parseDurationSeconds("1h 30m")   // 5400
 * parseDurationSeconds("2 weeks")  // 1209600
 * parseDurationSeconds("1,5h")     // 5400
 * parseDurationSeconds("tomorrow") // 0
 */
export function parseDurationSeconds(text: string): number {
  const pairRe = /(\d+(?:[.,]\d+)?)\s?([A-Za-z]+)/g;
  let total = 0;

  for (const match of text.matchAll(pairRe)) {
    const value = Number.parseFloat(match[1].replace(",", "."));
    const seconds = unitSeconds(match[2]);
    if (seconds !== undefined && Number.isFinite(value)) {
      total += value * seconds;
    }
  }

  return Math.round(total);
}
