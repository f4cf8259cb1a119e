/**
 * Person identity (author, committer, tagger)
 *
 * "Name <email> timestamp timezone"
 * Example: "John Doe <john@example.com> 1234567890 +0100"
 */

import { err, ok, type Result } from "@git-stamp/utils/result";
import { MalformedObjectError } from "../errors.js";
import { createOffsetDateTime, type OffsetDateTime } from "./offset-date-time.js";

export interface PersonIdent {
  /** Display name */
  name: string;
  /** Email address */
  email: string;
  /** Unix timestamp in seconds */
  timestamp: number;
  /** Timezone offset string: "+HHMM" or "-HHMM" */
  tzOffset: string;
}

const PERSON_IDENT = /^(.*) <(.*)> (\d+) ([+-]?\d{4})$/;

/**
 * Parse a person identity line value.
 */
export function parsePersonIdent(value: string): Result<PersonIdent, MalformedObjectError> {
  const match = PERSON_IDENT.exec(value);
  if (!match) {
    return err(new MalformedObjectError(`Invalid person identity: ${value}`));
  }
  const [, name, email, timestamp, tzOffset] = match;
  const seconds = Number(timestamp);
  if (!Number.isSafeInteger(seconds)) {
    return err(new MalformedObjectError(`Timestamp out of range: ${timestamp}`));
  }
  return ok({ name, email, timestamp: seconds, tzOffset });
}

/**
 * "Name <email>", the form published as the commit author.
 */
export function formatPersonName(ident: PersonIdent): string {
  return `${ident.name} <${ident.email}>`;
}

/**
 * When the identity was recorded, in the identity's own timezone.
 */
export function getPersonDate(ident: PersonIdent): Result<OffsetDateTime, MalformedObjectError> {
  return createOffsetDateTime(ident.timestamp, ident.tzOffset);
}
