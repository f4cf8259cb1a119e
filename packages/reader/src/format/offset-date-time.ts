/**
 * Instants with a recorded UTC offset.
 *
 * Git stores author time as epoch seconds plus the author's timezone
 * ("+0200"). The offset describes where the author was; it does not move
 * the instant.
 */

import { err, ok, type Result } from "@git-stamp/utils/result";
import { MalformedObjectError } from "../errors.js";

export interface OffsetDateTime {
  /** Seconds since the Unix epoch (the UTC instant) */
  epochSeconds: number;
  /** Offset east of UTC in minutes */
  offsetMinutes: number;
  /** Offset as recorded, always signed: "+HHMM" or "-HHMM" */
  tzOffset: string;
}

const TZ_OFFSET = /^([+-]?)(\d{2})(\d{2})$/;

/**
 * Parse a git timezone offset ("+0200", "-0530", or unsigned "0100").
 *
 * @returns The offset in minutes east of UTC
 */
export function parseTimezoneOffset(tzOffset: string): Result<number, MalformedObjectError> {
  const match = TZ_OFFSET.exec(tzOffset);
  if (!match) {
    return err(new MalformedObjectError(`Invalid timezone offset: ${tzOffset}`));
  }
  const [, sign, hours, minutes] = match;
  const hh = Number.parseInt(hours, 10);
  const mm = Number.parseInt(minutes, 10);
  if (hh > 23 || mm > 59) {
    return err(new MalformedObjectError(`Timezone offset out of range: ${tzOffset}`));
  }
  const total = hh * 60 + mm;
  return ok(sign === "-" && total > 0 ? -total : total);
}

/**
 * Build an OffsetDateTime from epoch seconds and a git timezone offset.
 */
export function createOffsetDateTime(
  epochSeconds: number,
  tzOffset: string,
): Result<OffsetDateTime, MalformedObjectError> {
  const offset = parseTimezoneOffset(tzOffset);
  if (!offset.success) return offset;
  return ok({
    epochSeconds,
    offsetMinutes: offset.value,
    tzOffset: /^[+-]/.test(tzOffset) ? tzOffset : `+${tzOffset}`,
  });
}

/**
 * The instant as a JavaScript Date.
 */
export function toDate(value: OffsetDateTime): Date {
  return new Date(value.epochSeconds * 1000);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Render as ISO-8601 in the recorded offset.
 *
 * @example
 * formatOffsetDateTime({ epochSeconds: 1700000000, offsetMinutes: 120, tzOffset: "+0200" })
 * // "2023-11-15T00:13:20+02:00"
 */
export function formatOffsetDateTime(value: OffsetDateTime): string {
  const local = new Date((value.epochSeconds + value.offsetMinutes * 60) * 1000);
  const wallClock = local.toISOString().substring(0, 19);
  const sign = value.tzOffset.startsWith("-") ? "-" : "+";
  const abs = Math.abs(value.offsetMinutes);
  return `${wallClock}${sign}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`;
}
