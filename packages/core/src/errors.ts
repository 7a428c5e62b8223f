export class ToolcrateError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = "ToolcrateError";
  }
}

/** A local tool, its config, or a cache entry does not exist. */
export class NotFoundError extends ToolcrateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "NotFoundError";
  }
}

/** A tool config is malformed or lacks required keys. */
export class ConfigError extends ToolcrateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class CorruptPackageError extends ToolcrateError {
  readonly path: string;

  constructor(path: string, detail: string, cause?: unknown) {
    super(`Corrupt package at ${path}: ${detail}`, cause);
    this.name = "CorruptPackageError";
    this.path = path;
  }
}

/** A version string has a component that is not a non-negative integer. */
export class FormatError extends ToolcrateError {
  constructor(message: string) {
    super(message);
    this.name = "FormatError";
  }
}

export class LoadError extends ToolcrateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "LoadError";
  }
}

export class NetworkError extends ToolcrateError {
  readonly status?: number;

  constructor(message: string, status?: number, cause?: unknown) {
    super(message, cause);
    this.name = "NetworkError";
    this.status = status;
  }
}

/** Logged by the dependency installer; never thrown out of it. */
export class DependencyInstallError extends ToolcrateError {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null, cause?: unknown) {
    super(message, cause);
    this.name = "DependencyInstallError";
    this.exitCode = exitCode;
  }
}
