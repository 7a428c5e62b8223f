export type ToolcrateConfig = {
  registry: {
    baseUrl: string;
    timeoutMs: number;
  };
  cache: {
    dir: string;
    extension: string;
  };
  tools: {
    localDir: string;
  };
  dependencies: {
    manifest: string;
  };
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
};

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFormat = "json" | "pretty";

export type ConfigSource = "global" | "project" | "env" | "default";
