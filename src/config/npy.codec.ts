import type { Vector } from "./config.types";
import { checkVector, type VectorParseResult } from "./vector.codec";

// NumPy .npy container, version 1.0, float64 little-endian, 1-D, C order.
const NPY_MAGIC = Buffer.from([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59]);
const NPY_ALIGNMENT = 64;
const FLOAT64_DESCR = "<f8";
const FLOAT64_BYTES = 8;

export interface NpyHeader {
  readonly descr: string;
  readonly fortranOrder: boolean;
  readonly shape: readonly number[];
  readonly dataOffset: number;
}

export function encodeNpy(vector: Vector): Buffer {
  const dict = `{'descr': '${FLOAT64_DESCR}', 'fortran_order': False, 'shape': (${vector.length},), }`;
  const preambleLength = NPY_MAGIC.length + 2 + 2;
  const unpadded = preambleLength + dict.length + 1;
  const padding = (NPY_ALIGNMENT - (unpadded % NPY_ALIGNMENT)) % NPY_ALIGNMENT;
  const header = `${dict}${" ".repeat(padding)}\n`;

  const preamble = Buffer.alloc(preambleLength);
  NPY_MAGIC.copy(preamble, 0);
  preamble.writeUInt8(1, 6);
  preamble.writeUInt8(0, 7);
  preamble.writeUInt16LE(header.length, 8);

  const data = Buffer.alloc(vector.length * FLOAT64_BYTES);
  vector.forEach((value, idx) => {
    data.writeDoubleLE(value, idx * FLOAT64_BYTES);
  });

  return Buffer.concat([preamble, Buffer.from(header, "latin1"), data]);
}

function parseShape(raw: string): readonly number[] | null {
  const parts = raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "");
  const dims: number[] = [];
  for (const part of parts) {
    if (!/^\d+$/.test(part)) {
      return null;
    }
    dims.push(Number(part));
  }
  return dims;
}

export function readNpyHeader(bytes: Buffer): NpyHeader | string {
  if (bytes.length < NPY_MAGIC.length + 4 || !bytes.subarray(0, NPY_MAGIC.length).equals(NPY_MAGIC)) {
    return "missing .npy magic";
  }
  const major = bytes.readUInt8(6);
  let headerLength: number;
  let headerStart: number;
  if (major === 1) {
    headerLength = bytes.readUInt16LE(8);
    headerStart = 10;
  } else if (major === 2 || major === 3) {
    if (bytes.length < 12) {
      return "truncated .npy preamble";
    }
    headerLength = bytes.readUInt32LE(8);
    headerStart = 12;
  } else {
    return `unsupported .npy version ${major}`;
  }

  const dataOffset = headerStart + headerLength;
  if (dataOffset > bytes.length) {
    return "truncated .npy header";
  }
  const dict = bytes.subarray(headerStart, dataOffset).toString(major === 3 ? "utf8" : "latin1");

  const descr = /'descr'\s*:\s*'([^']*)'/.exec(dict)?.[1];
  const fortran = /'fortran_order'\s*:\s*(True|False)/.exec(dict)?.[1];
  const shapeRaw = /'shape'\s*:\s*\(([^)]*)\)/.exec(dict)?.[1];
  if (descr === undefined || fortran === undefined || shapeRaw === undefined) {
    return "malformed .npy header";
  }
  const shape = parseShape(shapeRaw);
  if (shape === null) {
    return `malformed .npy shape (${shapeRaw})`;
  }

  return { descr, fortranOrder: fortran === "True", shape, dataOffset };
}

export function decodeNpy(bytes: Buffer, dimension: number): VectorParseResult {
  const header = readNpyHeader(bytes);
  if (typeof header === "string") {
    return { ok: false, reason: header };
  }
  if (header.descr !== FLOAT64_DESCR) {
    return { ok: false, reason: `expected dtype ${FLOAT64_DESCR}, got ${header.descr}` };
  }
  if (header.fortranOrder) {
    return { ok: false, reason: "fortran_order arrays are not supported" };
  }
  if (header.shape.length !== 1 || header.shape[0] !== dimension) {
    return {
      ok: false,
      reason: `expected shape (${dimension},), got (${header.shape.join(", ")})`,
    };
  }

  const payload = bytes.subarray(header.dataOffset);
  if (payload.length !== dimension * FLOAT64_BYTES) {
    return {
      ok: false,
      reason: `expected ${dimension * FLOAT64_BYTES} data bytes, got ${payload.length}`,
    };
  }
  const values: number[] = [];
  for (let offset = 0; offset < payload.length; offset += FLOAT64_BYTES) {
    values.push(payload.readDoubleLE(offset));
  }
  return checkVector(values, dimension);
}
