import fs from "node:fs";
import path from "node:path";
import { describeError } from "../core/errors/errors";
import type {
  ConfigKeySpec,
  ConfigSource,
  ResolutionEnv,
  RuntimeOverrides,
  Vector,
} from "./config.types";
import { decodeNpy } from "./npy.codec";
import { checkVector, parseEnvVector, type VectorParseResult } from "./vector.codec";

export interface SourceContext {
  readonly overrides: RuntimeOverrides;
  readonly env: ResolutionEnv;
  readonly baseDir: string;
}

/**
 * `null` means the tier has nothing configured for the key; a malformed
 * result means it had something and rejected it.
 */
export type SourceLookup = VectorParseResult | null;

export interface VectorSource {
  readonly source: Exclude<ConfigSource, "Placeholder">;
  lookup(spec: ConfigKeySpec, context: SourceContext): SourceLookup;
}

function toNonEmpty(value: string | undefined): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  return value.trim() === "" ? undefined : value;
}

export function resolveEmbeddingPath(
  spec: ConfigKeySpec,
  env: ResolutionEnv,
  baseDir: string
): string {
  const fromEnv = toNonEmpty(env[spec.pathEnvVar])?.trim();
  return path.resolve(baseDir, fromEnv ?? spec.defaultPath);
}

export const runtimeOverrideSource: VectorSource = {
  source: "RuntimeConfig",
  lookup(spec, context) {
    if (!Object.prototype.hasOwnProperty.call(context.overrides, spec.key)) {
      return null;
    }
    const candidate = context.overrides[spec.key];
    if (candidate === undefined) {
      return null;
    }
    if (!Array.isArray(candidate)) {
      return { ok: false, reason: "override is not an array" };
    }
    return checkVector(candidate, spec.dimension);
  },
};

export const environmentSource: VectorSource = {
  source: "Environment",
  lookup(spec, context) {
    const raw = toNonEmpty(context.env[spec.envVar]);
    if (raw === undefined) {
      return null;
    }
    const parsed = parseEnvVector(raw, spec.dimension);
    if (!parsed.ok) {
      return { ok: false, reason: `${spec.envVar}: ${parsed.reason}` };
    }
    return parsed;
  },
};

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

export const fileSource: VectorSource = {
  source: "File",
  lookup(spec, context) {
    const filePath = resolveEmbeddingPath(spec, context.env, context.baseDir);
    let bytes: Buffer;
    try {
      bytes = fs.readFileSync(filePath);
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      return { ok: false, reason: `${filePath}: ${describeError(error)}` };
    }
    const decoded = decodeNpy(bytes, spec.dimension);
    if (!decoded.ok) {
      return { ok: false, reason: `${filePath}: ${decoded.reason}` };
    }
    return decoded;
  },
};

export const DEFAULT_SOURCE_CHAIN: readonly VectorSource[] = Object.freeze([
  runtimeOverrideSource,
  environmentSource,
  fileSource,
]);

export function placeholderVector(dimension: number): Vector {
  return Object.freeze(new Array<number>(dimension).fill(0));
}
