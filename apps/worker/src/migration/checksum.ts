import { createHash } from "node:crypto";
import { SerializationError } from "../lib/errors.js";

export type Digest = string;

/**
 * JSON with object keys sorted at every level, so two structurally equal values
 * serialize identically regardless of key insertion order. Object properties
 * holding `undefined` are dropped, as JSON.stringify does.
 */
export function canonicalJson(value: unknown): string {
  return encode(value, "$", new Set());
}

function encode(value: unknown, path: string, seen: Set<object>): string {
  if (typeof value === "object") {
    if (value === null) return "null";
    return encodeObject(value, path, seen);
  }
  if (typeof value === "string" || typeof value === "boolean") return JSON.stringify(value);
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new SerializationError(path, `non-finite number ${value}`);
    return JSON.stringify(value);
  }
  throw new SerializationError(path, `unsupported type ${typeof value}`);
}

function encodeObject(value: object, path: string, seen: Set<object>): string {
  if (seen.has(value)) throw new SerializationError(path, "circular reference");
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return `[${value.map((item: unknown, i) => encode(item, `${path}[${i}]`, seen)).join(",")}]`;
    }
    if (value instanceof Date) {
      if (Number.isNaN(value.getTime())) throw new SerializationError(path, "invalid date");
      return JSON.stringify(value.toISOString());
    }
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${encode(v, `${path}.${k}`, seen)}`).join(",")}}`;
  } finally {
    seen.delete(value);
  }
}

/** SHA-256 (hex) of the canonical serialization. */
export function checksum(dataset: unknown): Digest {
  return createHash("sha256").update(canonicalJson(dataset)).digest("hex");
}
