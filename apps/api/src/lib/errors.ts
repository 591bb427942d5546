export type PackingErrorCode = "INVALID_ITEMS_ORDERED" | "INVALID_PACK_SIZES" | "OPTIMIZATION_TOO_LARGE";

export type PackingInvariantCode = "NO_PACKING_PLAN" | "BROKEN_BACKTRACK";

/** Rejected input: the request can be fixed by the caller. */
export class PackingError extends Error {
  constructor(
    public readonly code: PackingErrorCode,
    message: string,
    public readonly value?: number
  ) {
    super(message);
    this.name = "PackingError";
  }
}

/**
 * The packing table contradicted itself. Unreachable for validated input,
 * so it is kept apart from {@link PackingError} and surfaces as a server error.
 */
export class PackingInvariantError extends Error {
  constructor(public readonly code: PackingInvariantCode, message: string) {
    super(message);
    this.name = "PackingInvariantError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(message);
    this.name = "ConfigError";
  }
}
