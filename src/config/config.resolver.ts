import path from "node:path";
import { writeFileAtomically } from "../adapter/fs/atomic_write";
import { describeError, STORAGE_ERROR_CODES, StorageError } from "../core/errors/errors";
import { BEAUTY_STANDARD_EMBEDDING, specForKey } from "./config.keys";
import {
  DEFAULT_SOURCE_CHAIN,
  placeholderVector,
  resolveEmbeddingPath,
  type SourceContext,
  type VectorSource,
} from "./config.sources";
import type {
  ConfigValue,
  DiagnosticSink,
  ResolutionDiagnostic,
  ResolutionEnv,
  RuntimeOverrides,
  Vector,
} from "./config.types";
import { encodeNpy } from "./npy.codec";
import { checkVector } from "./vector.codec";

export interface ConfigResolverOptions {
  readonly env?: ResolutionEnv;
  readonly baseDir?: string;
  readonly sources?: readonly VectorSource[];
  readonly onDiagnostic?: DiagnosticSink;
}

function logDiagnostic(diagnostic: ResolutionDiagnostic): void {
  console.warn(`[config] key=${diagnostic.key} source=${diagnostic.source} ${diagnostic.reason}`);
}

/**
 * Resolves named vectors through runtime overrides, the environment, an
 * .npy file and finally a zero placeholder. Resolution never fails on a bad
 * source; rejected tiers are reported through `onDiagnostic` and the
 * returned `source` tag is the only signal of which tier won.
 */
export class ConfigResolver {
  private readonly env: ResolutionEnv;
  private readonly baseDir: string;
  private readonly sources: readonly VectorSource[];
  private readonly onDiagnostic: DiagnosticSink;

  constructor(options: ConfigResolverOptions = {}) {
    this.env = options.env ?? process.env;
    this.baseDir = options.baseDir ?? process.cwd();
    this.sources = options.sources ?? DEFAULT_SOURCE_CHAIN;
    this.onDiagnostic = options.onDiagnostic ?? logDiagnostic;
  }

  resolve(key: string, runtimeOverrides: RuntimeOverrides = {}): ConfigValue {
    const spec = specForKey(key);
    const context: SourceContext = {
      overrides: runtimeOverrides,
      env: this.env,
      baseDir: this.baseDir,
    };

    for (const tier of this.sources) {
      const hit = tier.lookup(spec, context);
      if (hit === null) {
        continue;
      }
      if (hit.ok) {
        return Object.freeze({ key: spec.key, vector: hit.vector, source: tier.source });
      }
      this.onDiagnostic({ key: spec.key, source: tier.source, reason: hit.reason });
    }

    this.onDiagnostic({
      key: spec.key,
      source: "Placeholder",
      reason: `using zero vector; set ${spec.envVar} or ${spec.pathEnvVar}`,
    });
    return Object.freeze({
      key: spec.key,
      vector: placeholderVector(spec.dimension),
      source: "Placeholder",
    });
  }

  /** Path the file tier reads for `key`, and the default target of `persistFor`. */
  filePathFor(key: string): string {
    return resolveEmbeddingPath(specForKey(key), this.env, this.baseDir);
  }

  async persistFor(key: string, vector: Vector, targetPath?: string): Promise<string> {
    const spec = specForKey(key);
    const checked = checkVector(vector, spec.dimension);
    if (!checked.ok) {
      throw new StorageError(
        STORAGE_ERROR_CODES.STORAGE_INVALID_INPUT,
        `refusing to persist ${spec.key}: ${checked.reason}`
      );
    }

    const filePath =
      typeof targetPath === "string" && targetPath.trim() !== ""
        ? path.resolve(this.baseDir, targetPath.trim())
        : this.filePathFor(spec.key);

    try {
      await writeFileAtomically(filePath, encodeNpy(checked.vector));
    } catch (error) {
      throw new StorageError(
        STORAGE_ERROR_CODES.STORAGE_WRITE_FAILED,
        `could not write ${spec.key} to ${filePath}: ${describeError(error)}`,
        { cause: error }
      );
    }
    return filePath;
  }

  persist(vector: Vector, targetPath?: string): Promise<string> {
    return this.persistFor(BEAUTY_STANDARD_EMBEDDING.key, vector, targetPath);
  }
}

export function getBeautyStandardEmbedding(
  runtimeOverrides: RuntimeOverrides = {},
  options: ConfigResolverOptions = {}
): ConfigValue {
  return new ConfigResolver(options).resolve(BEAUTY_STANDARD_EMBEDDING.key, runtimeOverrides);
}
