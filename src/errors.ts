export class MprisError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Resolving or opening a player connection failed. */
export class ConnectionError extends MprisError {
  constructor(
    readonly player: string,
    cause?: unknown
  ) {
    super(`unable to connect to player ${player}: ${describe(cause)}`, { cause });
  }
}

/** Listing the running players failed. */
export class DirectoryError extends MprisError {
  constructor(cause?: unknown) {
    super(`unable to list players: ${describe(cause)}`, { cause });
  }
}

/** A single property query against a connected player failed. */
export class QueryError extends MprisError {
  constructor(
    readonly field: string,
    cause?: unknown
  ) {
    super(`unable to read ${field}: ${describe(cause)}`, { cause });
  }
}

/** A template could not be rendered for the current snapshot. */
export class TemplateError extends MprisError {
  constructor(
    message: string,
    readonly placeholder?: string
  ) {
    super(message);
  }
}

export function describe(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return "unknown error";
  return String(error);
}
