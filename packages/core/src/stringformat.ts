import { isIPv6 } from "node:net";

/**
 * A named string check used by the `format` keyword. Non-string values never
 * reach a format rule.
 */
export type FormatRule = (value: string) => boolean;

export type FormatRegistry = ReadonlyMap<string, FormatRule>;

// Precompiled regular expressions to avoid re-creating RegExp objects on every call
const DATE_RE = /^([0-9]{4})-(0[1-9]|1[0-2])-(0[1-9]|[12][0-9]|3[01])$/,
  DURATION_RE = /^P(\d+Y)?(\d+M)?(\d+W)?(\d+D)?(T(\d+H)?(\d+M)?(\d+S)?)?$/,
  EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/,
  HOSTNAME_RE =
    /^(([a-zA-Z0-9]|[a-zA-Z0-9][a-zA-Z0-9-]*[a-zA-Z0-9])\.)*([A-Za-z0-9]|[A-Za-z0-9][A-Za-z0-9-]*[A-Za-z0-9])$/,
  IPV4_RE =
    /^(25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.(25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.(25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.(25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)$/,
  RFC3339_RE =
    /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/,
  UUID_RE =
    /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;

export function isIPv4Address(value: string): boolean {
  return IPV4_RE.test(value);
}

export function isIPv6Address(value: string): boolean {
  // Zone identifiers ("fe80::1%eth0") are not part of the address.
  return !value.includes("%") && isIPv6(value);
}

function isDateTime(value: string): boolean {
  if (!RFC3339_RE.test(value)) return false;
  return !isNaN(Date.parse(value));
}

function isDate(value: string): boolean {
  const m = DATE_RE.exec(value);
  if (!m) return false;
  const year = Number(m[1]),
    month = Number(m[2]),
    day = Number(m[3]),
    leap = year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0),
    daysInMonth = [31, leap ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
  return day <= daysInMonth[month - 1];
}

function isUri(value: string): boolean {
  try {
    const u = new URL(value);
    return u.protocol.length > 0;
  } catch {
    return false;
  }
}

/**
 * Formats every context knows about.
 */
export const builtinFormats: Readonly<Record<string, FormatRule>> = {
  ipv4: isIPv4Address,
  ipv6: isIPv6Address,
};

/**
 * Additional formats a caller can opt into through `SchemaOptions.formats`.
 */
export const extendedFormats: Readonly<Record<string, FormatRule>> = {
  "date-time": isDateTime,
  date: isDate,
  email: (value) => EMAIL_RE.test(value),
  hostname: (value) => HOSTNAME_RE.test(value),
  uri: isUri,
  uuid: (value) => UUID_RE.test(value),
  duration: (value) => DURATION_RE.test(value) && value !== "P",
};

/**
 * Build the format registry of a context: the built-in formats overlaid with
 * the caller's entries.
 */
export function createFormatRegistry(
  extra: Readonly<Record<string, FormatRule>> = {},
): FormatRegistry {
  return new Map(Object.entries({ ...builtinFormats, ...extra }));
}
