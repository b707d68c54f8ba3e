import { Option } from "effect";
import type { MessageDate } from "../../lib/type.js";

const MONTHS = [
  "jan",
  "feb",
  "mar",
  "apr",
  "may",
  "jun",
  "jul",
  "aug",
  "sep",
  "oct",
  "nov",
  "dec",
] as const;

// Named zones allowed by RFC 5322 section 4.3, in minutes east of UTC
const NAMED_ZONES: Readonly<Record<string, number>> = {
  UT: 0,
  UTC: 0,
  GMT: 0,
  Z: 0,
  EST: -5 * 60,
  EDT: -4 * 60,
  CST: -6 * 60,
  CDT: -5 * 60,
  MST: -7 * 60,
  MDT: -6 * 60,
  PST: -8 * 60,
  PDT: -7 * 60,
};

// [day-name ","] day month year hour ":" minute [":" second] [zone]
const DATE_TIME_PATTERN =
  /^(?:[a-z]{3,9}\s*,?\s*)?(\d{1,2})\s+([a-z]{3,9})\.?\s+(\d{2,4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s+([+-]\d{4}|[a-z]{1,5}))?(?:\s|\(|$)/i;

const parseYear = (raw: string): number => {
  const year = Number(raw);
  if (raw.length === 2) {
    return year < 50 ? 2000 + year : 1900 + year;
  }
  if (raw.length === 3) {
    return 1900 + year;
  }
  return year;
};

const parseZone = (raw: string | undefined): Option.Option<number> => {
  if (raw === undefined) {
    return Option.some(0);
  }
  if (raw.startsWith("+") || raw.startsWith("-")) {
    const sign = raw.startsWith("-") ? -1 : 1;
    const hours = Number(raw.slice(1, 3));
    const minutes = Number(raw.slice(3, 5));
    if (minutes > 59) {
      return Option.none();
    }
    return Option.some(sign * (hours * 60 + minutes));
  }
  // Military and unknown alphabetic zones carry no reliable offset
  return Option.some(NAMED_ZONES[raw.toUpperCase()] ?? 0);
};

/**
 * Parse an RFC 5322 date-time such as `Mon, 15 Jan 2024 10:30:00 +0000`.
 * Returns None for missing or malformed input instead of throwing.
 */
export const parseEmailDate = (
  header: string | undefined | null,
): Option.Option<MessageDate> => {
  if (!header) {
    return Option.none();
  }

  const unfolded = header.replace(/\s+/g, " ").trim();
  const match = DATE_TIME_PATTERN.exec(unfolded);
  if (!match) {
    return Option.none();
  }

  const [, dayRaw, monthRaw, yearRaw, hourRaw, minuteRaw, secondRaw, zoneRaw] =
    match;

  const monthIndex = MONTHS.findIndex((name) =>
    monthRaw.toLowerCase().startsWith(name),
  );
  if (monthIndex === -1) {
    return Option.none();
  }

  const day = Number(dayRaw);
  const year = parseYear(yearRaw);
  const hour = Number(hourRaw);
  const minute = Number(minuteRaw);
  // Leap seconds are clamped rather than rejected
  const second = Math.min(Number(secondRaw ?? "0"), 59);

  if (hour > 23 || minute > 59 || Number(secondRaw ?? "0") > 60) {
    return Option.none();
  }

  const daysInMonth = new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();
  if (day < 1 || day > daysInMonth) {
    return Option.none();
  }

  return Option.map(parseZone(zoneRaw), (offsetMinutes) => {
    const wallClock = Date.UTC(year, monthIndex, day, hour, minute, second);
    return {
      instant: new Date(wallClock - offsetMinutes * 60_000),
      offsetMinutes,
    };
  });
};
