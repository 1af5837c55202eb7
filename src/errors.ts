/**
 * Error types raised by the export pipeline and the health data store.
 */

/**
 * A health data store call failed (unreadable file, corrupt JSON, I/O error).
 * Always fatal for the current export; the original error is kept as `cause`.
 */
export class ProviderQueryError extends Error {
  constructor(
    public readonly operation: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Provider query "${operation}" failed: ${detail}`, { cause });
    this.name = 'ProviderQueryError';
  }
}

/**
 * The export document could not be encoded. Indicates malformed input
 * (a non-finite number, an invalid date, an unknown time zone).
 */
export class SerializationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SerializationError';
  }
}

/**
 * A quantity was reported in a unit that cannot be converted to the requested one.
 */
export class UnitConversionError extends Error {
  constructor(
    public readonly fromUnit: string,
    public readonly toUnit: string,
  ) {
    super(`Cannot convert quantity from "${fromUnit}" to "${toUnit}"`);
    this.name = 'UnitConversionError';
  }
}
