export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  redis: RedisConfig;
  pipeline: PipelineConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface PipelineConfig {
  chunkSize: number;
  chunkMaxRetries: number;
  retryBaseDelayMs: number;
}
