/**
 * Signatures and timestamps.
 */

export type Timestamp = {
  /** Milliseconds since the Unix epoch */
  timestamp: number;
  /** Minutes east of UTC */
  tzOffset: number;
};

export type Signature = {
  name: string;
  email: string;
  timestamp: Timestamp;
};

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const RELATIVE_UNITS: ReadonlyArray<readonly [Intl.RelativeTimeFormatUnit, number]> = [
  ["year", 365 * DAY],
  ["month", 30 * DAY],
  ["week", 7 * DAY],
  ["day", DAY],
  ["hour", HOUR],
  ["minute", MINUTE],
  ["second", SECOND],
];

const relativeFormat = new Intl.RelativeTimeFormat("en", { numeric: "always" });

/**
 * Text before the first "@", or the whole address when there is none.
 */
export function emailUsername(email: string): string {
  const at = email.indexOf("@");
  return at === -1 ? email : email.slice(0, at);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * `YYYY-MM-DD HH:MM:SS.mmm +HH:MM`, in the timestamp's own offset.
 */
export function formatTimestamp(timestamp: Timestamp): string {
  const local = new Date(timestamp.timestamp + timestamp.tzOffset * MINUTE);
  const date = `${pad(local.getUTCFullYear(), 4)}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())}`;
  const time =
    `${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())}` +
    `.${pad(local.getUTCMilliseconds(), 3)}`;
  const sign = timestamp.tzOffset < 0 ? "-" : "+";
  const offset = Math.abs(timestamp.tzOffset);
  return `${date} ${time} ${sign}${pad(Math.floor(offset / 60))}:${pad(offset % 60)}`;
}

export function formatTimestampRelativeTo(timestamp: Timestamp, now: number): string {
  const elapsed = now - timestamp.timestamp;
  const magnitude = Math.abs(elapsed);
  for (const [unit, size] of RELATIVE_UNITS) {
    if (magnitude >= size) {
      const count = Math.floor(magnitude / size);
      return relativeFormat.format(elapsed >= 0 ? -count : count, unit);
    }
  }
  return "now";
}

export function formatTimestampRelativeToNow(timestamp: Timestamp): string {
  return formatTimestampRelativeTo(timestamp, Date.now());
}
