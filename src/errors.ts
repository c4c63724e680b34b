import type { Filters } from './query/types.js';

export class UnknownVariantError extends Error {
  override readonly name = 'UnknownVariantError';

  constructor(
    readonly tag: string,
    readonly variantType: string | null,
    readonly dispatchKey: string,
    message?: string,
  ) {
    super(message ?? `Unknown variant <${tag} type='${variantType ?? ''}'../>`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends Error {
  override readonly name = 'NotFoundError';

  constructor(
    message: string,
    readonly variantName: string | null = null,
    readonly filters: Readonly<Filters> | null = null,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedError extends Error {
  override readonly name = 'UnsupportedError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class BadRequestError extends Error {
  override readonly name = 'BadRequestError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TransportError extends Error {
  override readonly name = 'TransportError';

  constructor(
    message: string,
    readonly status: number | null = null,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class XmlParseError extends Error {
  override readonly name = 'XmlParseError';

  constructor(
    message: string,
    readonly line: number | null = null,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
