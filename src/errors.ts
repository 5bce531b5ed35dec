/**
 * Error classes raised by the plugin decoder.
 */

export class DecoderError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'DecoderError';
  }
}

/**
 * A read asked for more bytes than the buffer holds.
 */
export class OutOfBoundsError extends DecoderError {
  constructor(
    public readonly position: number,
    public readonly requested: number,
    public readonly available: number
  ) {
    super(`Read of ${requested} bytes at offset ${position} exceeds buffer (${available} bytes remaining)`);
    this.name = 'OutOfBoundsError';
  }
}

/**
 * The leading TES4 record is missing or unusable. Fatal for the whole decode.
 */
export class MalformedHeaderError extends DecoderError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'MalformedHeaderError';
  }
}
