/** Base class for every error the encoder raises. */
export class ToonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Normalization went deeper than the configured bound (cycles end up here too). */
export class MaxDepthExceededError extends ToonError {
  constructor(
    readonly depth: number,
    readonly limit: number,
  ) {
    super(`Maximum nesting depth exceeded: depth ${depth} > limit ${limit}`);
  }
}

export class NotEncodableError extends ToonError {
  constructor(readonly value: unknown) {
    super(`Value is not an encodable primitive: ${describe(value)}`);
  }
}

export class InvalidOptionsError extends ToonError {}

export class InvalidJsonError extends ToonError {}

function describe(value: unknown): string {
  if (Array.isArray(value)) return "array";
  if (value === null) return "null";
  return typeof value;
}
