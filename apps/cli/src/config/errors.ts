/**
 * A problem with the matrix configuration file. `path` points at the
 * offending entry, e.g. `tests[2].variants[0].detect_value`.
 */
export class ConfigError extends Error {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
    this.path = path;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
