/**
 * Raised while reading settings from the environment. `key` names the variable.
 */
export class ConfigError extends Error {
  readonly code = "invalid_config";
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.key = key;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
