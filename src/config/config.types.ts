export const CONFIG_SOURCES = ["RuntimeConfig", "Environment", "File", "Placeholder"] as const;

export type ConfigSource = (typeof CONFIG_SOURCES)[number];

export type Vector = readonly number[];

export interface ConfigValue {
  readonly key: string;
  readonly vector: Vector;
  readonly source: ConfigSource;
}

export type RuntimeOverrides = Readonly<Record<string, Vector | undefined>>;

export interface ConfigKeySpec {
  readonly key: string;
  readonly dimension: number;
  readonly envVar: string;
  readonly pathEnvVar: string;
  readonly defaultPath: string;
}

export interface ResolutionDiagnostic {
  readonly key: string;
  readonly source: ConfigSource;
  readonly reason: string;
}

export type DiagnosticSink = (diagnostic: ResolutionDiagnostic) => void;

export interface ResolutionEnv {
  readonly [name: string]: string | undefined;
}
