import type { Vector } from "./config.types";

export const BASE64_PREFIX = "base64:";
const FLOAT64_BYTES = 8;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/** Internal fallthrough signal; never thrown. */
export interface MalformedSource {
  readonly ok: false;
  readonly reason: string;
}

export interface ParsedVector {
  readonly ok: true;
  readonly vector: Vector;
}

export type VectorParseResult = ParsedVector | MalformedSource;

function malformed(reason: string): MalformedSource {
  return { ok: false, reason };
}

export function checkVector(values: readonly unknown[], dimension: number): VectorParseResult {
  if (values.length !== dimension) {
    return malformed(`expected ${dimension} values, got ${values.length}`);
  }
  const out: number[] = new Array<number>(dimension);
  for (let i = 0; i < dimension; i += 1) {
    const value = values[i];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      return malformed(`value at index ${i} is not a finite number`);
    }
    out[i] = value;
  }
  return { ok: true, vector: Object.freeze(out) };
}

export function parseDelimitedVector(raw: string, dimension: number): VectorParseResult {
  let body = raw.trim();
  if (body.startsWith("[") && body.endsWith("]")) {
    body = body.slice(1, -1).trim();
  }
  if (body === "") {
    return malformed("no values found");
  }

  const tokens = body.split(/[\s,]+/).filter((token) => token !== "");
  const values: number[] = [];
  for (const token of tokens) {
    const parsed = Number(token);
    if (!Number.isFinite(parsed)) {
      return malformed(`unparsable value '${token.slice(0, 32)}'`);
    }
    values.push(parsed);
  }
  return checkVector(values, dimension);
}

export function parseBase64Vector(encoded: string, dimension: number): VectorParseResult {
  const compact = encoded.replace(/\s+/g, "");
  if (compact === "" || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    return malformed("invalid base64 payload");
  }
  const bytes = Buffer.from(compact, "base64");
  if (bytes.length !== dimension * FLOAT64_BYTES) {
    return malformed(`expected ${dimension * FLOAT64_BYTES} bytes, got ${bytes.length}`);
  }
  const values: number[] = [];
  for (let offset = 0; offset < bytes.length; offset += FLOAT64_BYTES) {
    values.push(bytes.readDoubleLE(offset));
  }
  return checkVector(values, dimension);
}

/**
 * Values starting with `base64:` carry little-endian float64 bytes; anything
 * else is read as a comma and/or whitespace separated decimal list.
 */
export function parseEnvVector(raw: string, dimension: number): VectorParseResult {
  const trimmed = raw.trim();
  if (trimmed.startsWith(BASE64_PREFIX)) {
    return parseBase64Vector(trimmed.slice(BASE64_PREFIX.length), dimension);
  }
  return parseDelimitedVector(trimmed, dimension);
}

export function encodeBase64Vector(vector: Vector): string {
  const bytes = Buffer.alloc(vector.length * FLOAT64_BYTES);
  vector.forEach((value, idx) => {
    bytes.writeDoubleLE(value, idx * FLOAT64_BYTES);
  });
  return `${BASE64_PREFIX}${bytes.toString("base64")}`;
}
