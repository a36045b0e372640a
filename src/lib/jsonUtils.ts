/**
 * Helpers for the JSON-encoded string attributes (`metadata`, `query`,
 * allocation filters, ...) and for reading loosely typed response documents.
 *
 * @module
 */
import { ValidationError } from './errors.js';

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Decodes a JSON attribute that must hold an object.
 *
 * @param attribute - Attribute path used in the error, e.g. `hot.allocate.include`.
 * @throws {ValidationError} On malformed JSON or a non-object value.
 */
export function parseJsonObject(attribute: string, text: string): JsonObject {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(
      'Invalid JSON.',
      `${attribute}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (!isJsonObject(value)) {
    throw new ValidationError('Invalid JSON.', `${attribute}: expected a JSON object`);
  }
  return value;
}

/** Returns true when `text` is a JSON document. */
export function isValidJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/** Structural equality of two decoded JSON values, ignoring key order. */
export function jsonEquivalent(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => jsonEquivalent(item, b[i]));
  }
  if (isJsonObject(a) && isJsonObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => key in b && jsonEquivalent(a[key], b[key]));
  }
  return a === b;
}

/**
 * Encodes a value read from the cluster for a JSON string attribute.
 *
 * The declared text wins when it decodes to the same document, so key order
 * and whitespace in the configuration never show up as drift.
 */
export function encodeJsonAttribute(serverValue: unknown, declared: string | undefined): string {
  if (declared !== undefined && isValidJson(declared) && jsonEquivalent(JSON.parse(declared), serverValue)) {
    return declared;
  }
  return JSON.stringify(serverValue);
}

export function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function readInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return Number(value);
  return undefined;
}

export function readBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

export function readStringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}
