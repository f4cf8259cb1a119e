/**
 * Git object identifiers
 */

/** SHA-1 object ID as a lowercase hex string */
export type ObjectId = string;

/** SHA-1 hex string length */
export const OBJECT_ID_STRING_LENGTH = 40;

const HEX_OBJECT_ID = /^[0-9a-f]{40}$/;

/**
 * Check that a string is a full lowercase hex object ID.
 *
 * Every ID read from a ref, commit or tag passes through here before it is
 * used to build an object path.
 */
export function isValidObjectId(value: string): value is ObjectId {
  return value.length === OBJECT_ID_STRING_LENGTH && HEX_OBJECT_ID.test(value);
}
