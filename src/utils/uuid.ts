import { randomUUID } from "crypto";

/**
 * Generates a UUID v4 (RFC 4122 compliant)
 * Uses Node.js crypto.randomUUID() for cryptographic randomness
 */
export function generateUUID(): string {
  return randomUUID();
}
