export {
  BEAUTY_STANDARD_EMBEDDING,
  BEAUTY_STANDARD_EMBEDDING_KEY,
  EMBEDDING_DIMENSION,
  specForKey,
} from "./config.keys";
export {
  ConfigResolver,
  getBeautyStandardEmbedding,
  type ConfigResolverOptions,
} from "./config.resolver";
export {
  DEFAULT_SOURCE_CHAIN,
  environmentSource,
  fileSource,
  runtimeOverrideSource,
  type SourceContext,
  type SourceLookup,
  type VectorSource,
} from "./config.sources";
export {
  CONFIG_SOURCES,
  type ConfigKeySpec,
  type ConfigSource,
  type ConfigValue,
  type DiagnosticSink,
  type ResolutionDiagnostic,
  type ResolutionEnv,
  type RuntimeOverrides,
  type Vector,
} from "./config.types";
export { decodeNpy, encodeNpy, readNpyHeader, type NpyHeader } from "./npy.codec";
export {
  BASE64_PREFIX,
  encodeBase64Vector,
  parseDelimitedVector,
  parseEnvVector,
  type MalformedSource,
  type VectorParseResult,
} from "./vector.codec";
