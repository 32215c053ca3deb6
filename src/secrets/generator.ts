import { randomInt } from "crypto";
import { SecretBuffer } from "../auth/secret-buffer";
import { ValidationError } from "../errors";

export const CHARSETS = {
  alphanumeric: "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789",
  "alphanumeric-symbols":
    "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789!@#$%^&*()_+-=[]{}|;:,.<>?",
  hex: "0123456789ABCDEF",
  base64: "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/",
  numeric: "0123456789",
  uppercase: "ABCDEFGHIJKLMNOPQRSTUVWXYZ",
  lowercase: "abcdefghijklmnopqrstuvwxyz",
} as const;

export type Charset = keyof typeof CHARSETS;

export const DEFAULT_LENGTH = 32;

/** Produces a fresh value; the caller owns and zeroes the result. */
export type ValueGenerator = () => SecretBuffer | Promise<SecretBuffer>;

export function isCharset(value: string): value is Charset {
  return Object.prototype.hasOwnProperty.call(CHARSETS, value);
}

export function generateValue(
  length: number = DEFAULT_LENGTH,
  charset: Charset = "alphanumeric"
): SecretBuffer {
  if (!Number.isInteger(length) || length <= 0) {
    throw new ValidationError("Length must be a positive integer");
  }
  const alphabet = CHARSETS[charset];
  const bytes = Buffer.alloc(length);
  for (let i = 0; i < length; i++) {
    bytes[i] = alphabet.charCodeAt(randomInt(alphabet.length));
  }
  return SecretBuffer.adopt(bytes);
}

export function randomGenerator(
  length: number = DEFAULT_LENGTH,
  charset: Charset = "alphanumeric"
): ValueGenerator {
  return () => generateValue(length, charset);
}
