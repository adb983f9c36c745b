/**
 * Conversion errors. Every failure surfaced to callers is a `ToonConvertError`.
 */

type ConstructorOptions = { format?: string; cause?: unknown };

export class ToonConvertError extends Error {
  override readonly name: string = "ToonConvertError";
  /** Source format tag the failing call was made with, when known. */
  readonly format?: string;

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    this.format = options?.format;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, ToonConvertError.prototype);
  }
}

/** The format tag is not one of the supported formats. */
export class UnsupportedFormatError extends ToonConvertError {
  override readonly name = "UnsupportedFormatError";
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, UnsupportedFormatError.prototype);
  }
}

/** The source could not be parsed, or rendering it failed. `cause` holds the underlying error. */
export class ConversionError extends ToonConvertError {
  override readonly name = "ConversionError";
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, ConversionError.prototype);
  }
}

/** A format needs a decoding library that is not available in this environment. */
export class MissingCapabilityError extends ToonConvertError {
  override readonly name = "MissingCapabilityError";
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, MissingCapabilityError.prototype);
  }
}

export class ConfigError extends ToonConvertError {
  override readonly name = "ConfigError";
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
