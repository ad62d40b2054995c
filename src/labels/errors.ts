/**
 * A label option holds a value outside its recognized set.
 * Always fatal: the run aborts.
 */
export class ConfigurationError extends Error {
  constructor(
    readonly option: string,
    readonly value: unknown,
    message?: string,
  ) {
    super(message ?? `Unsupported value for ${option}: ${JSON.stringify(value)}`);
    this.name = "ConfigurationError";
  }
}

export function unsupportedOption(option: string, value: never): never {
  throw new ConfigurationError(option, value);
}
