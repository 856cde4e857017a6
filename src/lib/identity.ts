import { UUID } from "mongodb";
import { v4 as Uuid } from "uuid";
import { MalformedIdentityError } from "../utils/error";

export { UUID };

// Any 128-bit value in 8-4-4-4-12 form; version and variant are not checked
const HYPHENATED_HEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function generateIdentity(): UUID {
  return new UUID(Uuid());
}

export function isIdentity(value: unknown): value is UUID {
  return value instanceof UUID;
}

/**
 * Parse a canonical (hyphenated) UUID string. The store keeps identities
 * as strings, so this is the inverse of `identityToString`.
 */
export function parseIdentity(value: unknown): UUID {
  if (typeof value !== "string" || !HYPHENATED_HEX.test(value)) {
    throw new MalformedIdentityError(value);
  }
  return new UUID(value);
}

export function identityToString(id: UUID): string {
  return id.toHexString(true);
}
