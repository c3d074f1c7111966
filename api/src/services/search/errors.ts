/**
 * Search sync errors.
 *
 * Every failure carries a readonly `_tag` so callers can pick it out of the
 * Effect error channel with `Effect.catchTag`.
 */

/** The entity type supplies no search document. */
export class NotImplemented extends Error {
  readonly _tag = "NotImplemented";
}

/** A requested update field is mapped for the index but cannot be encoded. */
export class InvalidUpdate extends Error {
  readonly _tag = "InvalidUpdate";

  constructor(
    readonly field: string,
    message: string
  ) {
    super(message);
  }
}

/** A mapped document value cannot be encoded. */
export class InvalidDocument extends Error {
  readonly _tag = "InvalidDocument";

  constructor(
    readonly field: string,
    message: string
  ) {
    super(message);
  }
}

/** An argument is outside the accepted set (bulk action, unmapped index). */
export class InvalidArgument extends Error {
  readonly _tag = "InvalidArgument";
}

/** The entity is not in a state the operation accepts (e.g. unsaved). */
export class InvalidState extends Error {
  readonly _tag = "InvalidState";
}

/**
 * The search engine, or the network in front of it, failed.
 *
 * `status` is the engine's HTTP status, or 0 when no response arrived.
 */
export class TransportFailure extends Error {
  readonly _tag = "TransportFailure";

  constructor(
    readonly status: number,
    readonly reason: string,
    readonly details?: unknown
  ) {
    super(`Search engine error (${status}): ${reason}`);
  }
}

/** The backing store failed. */
export class StoreFailure extends Error {
  readonly _tag = "StoreFailure";

  constructor(
    message: string,
    readonly details?: unknown
  ) {
    super(message);
  }
}

export type SyncError =
  | NotImplemented
  | InvalidUpdate
  | InvalidDocument
  | InvalidArgument
  | InvalidState
  | TransportFailure
  | StoreFailure;
