/**
 * Invalid run configuration. Raised before any file is analyzed.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * A synthesis provider could not produce comment text. Providers throw this
 * instead of returning an empty string.
 */
export class SynthesisError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SynthesisError";
  }
}
