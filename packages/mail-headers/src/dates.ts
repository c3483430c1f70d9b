export type DateParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** Seconds east of UTC; `null` when the value carried no usable zone. */
  offsetSeconds: number | null;
};

type DateLayout = {
  id: string;
  parse(value: string): DateParts | null;
};

const MONTHS = [
  "jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec",
  "january", "february", "march", "april", "may", "june", "july", "august",
  "september", "october", "november", "december"
];

const DAY_NAMES = new Set(["mon", "tue", "wed", "thu", "fri", "sat", "sun"]);

/** Offsets in +-HHMM form. */
const NAMED_ZONES: ReadonlyMap<string, number> = new Map([
  ["UT", 0],
  ["UTC", 0],
  ["GMT", 0],
  ["Z", 0],
  ["AST", -400],
  ["ADT", -300],
  ["EST", -500],
  ["EDT", -400],
  ["CST", -600],
  ["CDT", -500],
  ["MST", -700],
  ["MDT", -600],
  ["PST", -800],
  ["PDT", -700]
]);

const SECONDS_PER_DAY = 86_400;

function toInt(value: string): number | null {
  return /^[+-]?\d+$/.test(value) ? Number.parseInt(value, 10) : null;
}

function monthIndex(name: string): number | null {
  const index = MONTHS.indexOf(name.toLowerCase());
  return index === -1 ? null : (index % 12) + 1;
}

function expandYear(year: number): number {
  if (year >= 100) {
    return year;
  }
  return year > 68 ? year + 1900 : year + 2000;
}

function stripComma(value: string): string {
  return value.endsWith(",") ? value.slice(0, -1) : value;
}

function zoneOffset(zone: string): number | null {
  const upper = zone.toUpperCase();
  let hhmm = NAMED_ZONES.get(upper) ?? toInt(upper);
  if (hhmm === 0 && upper.startsWith("-")) {
    // -0000 means "zone unknown".
    hhmm = null;
  }
  if (hhmm === null) {
    return null;
  }
  const sign = hhmm < 0 ? -1 : 1;
  const magnitude = Math.abs(hhmm);
  return sign * (Math.floor(magnitude / 100) * 3600 + (magnitude % 100) * 60);
}

function splitTime(value: string): [string, string, string] | null {
  const colon = value.split(":");
  if (colon.length === 2) {
    return [colon[0], colon[1], "0"];
  }
  if (colon.length === 3) {
    return [colon[0], colon[1], colon[2]];
  }
  if (colon.length === 1 && value.includes(".")) {
    const dotted = value.split(".");
    if (dotted.length === 2) {
      return [dotted[0], dotted[1], "0"];
    }
    if (dotted.length === 3) {
      return [dotted[0], dotted[1], dotted[2]];
    }
  }
  return null;
}

/**
 * RFC 5322 date-time with the obsolete forms mail archives carry: optional day
 * name, RFC 850 dashed dates, day and month in either order, full month names,
 * two-digit years, dotted times, named US zones and zones glued to the time.
 */
export function parseRfc5322Date(value: string): DateParts | null {
  let tokens = value.split(/\s+/).filter((token) => token !== "");
  if (tokens.length === 0) {
    return null;
  }

  if (tokens[0].endsWith(",") || DAY_NAMES.has(tokens[0].toLowerCase())) {
    tokens = tokens.slice(1);
  } else {
    const comma = tokens[0].lastIndexOf(",");
    if (comma >= 0) {
      tokens = [tokens[0].slice(comma + 1), ...tokens.slice(1)];
    }
  }

  if (tokens.length === 3) {
    const dashed = tokens[0].split("-");
    if (dashed.length === 3) {
      tokens = [...dashed, ...tokens.slice(1)];
    }
  }

  if (tokens.length === 4) {
    const time = tokens[3];
    let sign = time.indexOf("+");
    if (sign === -1) {
      sign = time.indexOf("-");
    }
    tokens = sign > 0 ? [...tokens.slice(0, 3), time.slice(0, sign), time.slice(sign)] : [...tokens, ""];
  }

  if (tokens.length < 5) {
    return null;
  }

  let [dd, mm, yy, tm, tz] = tokens;
  if (dd === "" || mm === "" || yy === "") {
    return null;
  }

  let month = monthIndex(mm);
  if (month === null) {
    [dd, mm] = [mm, dd];
    month = monthIndex(mm);
    if (month === null) {
      return null;
    }
  }

  dd = stripComma(dd);
  if (yy.indexOf(":") > 0) {
    [yy, tm] = [tm, yy];
  }
  yy = stripComma(yy);
  if (yy === "") {
    return null;
  }
  if (!/^\d/.test(yy)) {
    [yy, tz] = [tz, yy];
  }
  if (tm === "") {
    return null;
  }
  tm = stripComma(tm);

  const time = splitTime(tm);
  if (!time) {
    return null;
  }

  const year = toInt(yy);
  const day = toInt(dd);
  const [hour, minute, second] = time.map(toInt);
  if (year === null || day === null || hour === null || minute === null || second === null) {
    return null;
  }

  return {
    year: expandYear(year),
    month,
    day,
    hour,
    minute,
    second,
    offsetSeconds: zoneOffset(tz)
  };
}

const DAY_PATTERN = "(3[01]|[12]\\d|0[1-9]|[1-9]| [1-9])";
const TIME_PATTERN = "(2[0-3]|[01]\\d|\\d):([0-5]\\d|\\d)";
const SECONDS_PATTERN = ":(6[01]|[0-5]\\d|\\d)";
const MONTH_PATTERN = "(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)";

function fixedLayout(id: string, pattern: string, read: (match: RegExpExecArray) => DateParts): DateLayout {
  const regex = new RegExp(`^${pattern}$`, "i");
  return {
    id,
    parse(value) {
      const match = regex.exec(value);
      return match ? read(match) : null;
    }
  };
}

function numberAt(match: RegExpExecArray, index: number): number {
  return Number.parseInt(match[index].trim(), 10);
}

const DATE_LAYOUTS: readonly DateLayout[] = [
  { id: "rfc5322", parse: parseRfc5322Date },
  {
    // Mon, 27 Dec 1993 13:46:36 +22306256
    id: "rfc5322-assumed-utc",
    parse: (value) => parseRfc5322Date([...value.split(" ").slice(0, -1), "+0000"].join(" "))
  },
  // 04-Jan-93 13:22:13
  fixedLayout(
    "dd-mon-yy-seconds",
    `${DAY_PATTERN}-${MONTH_PATTERN}-(\\d\\d)\\s+${TIME_PATTERN}${SECONDS_PATTERN}`,
    (match) => ({
      year: expandYear(numberAt(match, 3)),
      month: monthIndex(match[2]) ?? 0,
      day: numberAt(match, 1),
      hour: numberAt(match, 4),
      minute: numberAt(match, 5),
      second: numberAt(match, 6),
      offsetSeconds: null
    })
  ),
  // 30-Nov-93 17:23
  fixedLayout("dd-mon-yy", `${DAY_PATTERN}-${MONTH_PATTERN}-(\\d\\d)\\s+${TIME_PATTERN}`, (match) => ({
    year: expandYear(numberAt(match, 3)),
    month: monthIndex(match[2]) ?? 0,
    day: numberAt(match, 1),
    hour: numberAt(match, 4),
    minute: numberAt(match, 5),
    second: 0,
    offsetSeconds: null
  })),
  // 2006-07-29 00:55:01
  fixedLayout(
    "iso-local",
    `(\\d{4})-(1[0-2]|0[1-9]|[1-9])-${DAY_PATTERN}\\s+${TIME_PATTERN}${SECONDS_PATTERN}`,
    (match) => ({
      year: numberAt(match, 1),
      month: numberAt(match, 2),
      day: numberAt(match, 3),
      hour: numberAt(match, 4),
      minute: numberAt(match, 5),
      second: numberAt(match, 6),
      offsetSeconds: null
    })
  ),
  {
    // Mon, 17 Apr 2006  8: 9: 2 +0300
    id: "rfc5322-padding-repair",
    parse: (value) => parseRfc5322Date(value.replaceAll(": ", ":0").replaceAll("  ", " 0"))
  }
];

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return month === 2 && leap ? 29 : MONTH_LENGTHS[month - 1];
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Converts parsed fields to `YYYY-MM-DD HH:MM:SS` in UTC, or `null` when a
 * field is out of range. Values without a zone are taken as UTC.
 */
export function formatUtcTimestamp(parts: DateParts): string | null {
  const { year, month, day, hour, minute, second, offsetSeconds } = parts;
  if (year < 1 || year > 9999 || month < 1 || month > 12) {
    return null;
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59 || second < 0 || second > 59) {
    return null;
  }
  const offset = offsetSeconds ?? 0;
  if (Math.abs(offset) >= SECONDS_PER_DAY) {
    return null;
  }

  const local = new Date(0);
  local.setUTCFullYear(year, month - 1, day);
  local.setUTCHours(hour, minute, second, 0);
  const utc = new Date(local.getTime() - offset * 1000);

  const utcYear = utc.getUTCFullYear();
  if (utcYear < 1 || utcYear > 9999) {
    return null;
  }
  return (
    `${pad(utcYear, 4)}-${pad(utc.getUTCMonth() + 1)}-${pad(utc.getUTCDate())} ` +
    `${pad(utc.getUTCHours())}:${pad(utc.getUTCMinutes())}:${pad(utc.getUTCSeconds())}`
  );
}

/**
 * Tries each supported layout in turn; the first one that yields a valid
 * timestamp wins. Unrecognized values give `null`.
 */
export function parseMessageDate(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  for (const layout of DATE_LAYOUTS) {
    const parts = layout.parse(trimmed);
    if (!parts) {
      continue;
    }
    const timestamp = formatUtcTimestamp(parts);
    if (timestamp !== null) {
      return timestamp;
    }
  }
  return null;
}
