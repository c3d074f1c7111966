/**
 * Serialization policy.
 *
 * Decides whether a value may go into a search document (by trying to
 * encode it) and coerces arbitrary values into JSON before a query is
 * written to the log.
 */

import { Either } from "effect";
import type { DocumentSource, JsonObject, JsonValue } from "./types";

export class SerializationFailure {
  readonly _tag = "SerializationFailure";

  constructor(readonly reason: string) {}
}

/**
 * Attempt to JSON-encode a value.
 *
 * Fails when the encoder throws (bigint, circular structures) and when it
 * produces nothing at all (functions, symbols, undefined).
 */
export function encodeValue(
  value: unknown
): Either.Either<string, SerializationFailure> {
  return Either.try({
    try: () => JSON.stringify(value),
    catch: (error) =>
      new SerializationFailure(
        error instanceof Error ? error.message : String(error)
      ),
  }).pipe(
    Either.flatMap((encoded: string | undefined) =>
      typeof encoded === "string"
        ? Either.right(encoded)
        : Either.left(
            new SerializationFailure(`${typeof value} values have no JSON form`)
          )
    )
  );
}

/**
 * Whether the entity's current value for `field` can be encoded.
 *
 * This looks at the live value, so the same field may pass on one instance
 * and fail on another.
 */
export function isSerializable(entity: DocumentSource, field: string): boolean {
  return Either.isRight(encodeValue(entity.readField(field)));
}

/**
 * Coerce any value into JSON. Never throws.
 *
 * Dates (and anything else with `toJSON`) use their JSON form, bigints and
 * non-finite numbers become strings, and objects that are neither plain nor
 * arrays fall back to `String(value)`.
 */
export function toJsonValue(value: unknown): JsonValue {
  return coerce(value, new WeakSet());
}

/**
 * Coerce a value that is expected to be an object. Anything else is kept
 * under a `value` key.
 */
export function toJsonObject(value: unknown): JsonObject {
  const coerced = toJsonValue(value);
  if (
    typeof coerced === "object" &&
    coerced !== null &&
    !Array.isArray(coerced)
  ) {
    return coerced;
  }
  return { value: coerced };
}

/**
 * JSON with object keys sorted, so equal documents encode identically.
 */
export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value);
}

function coerce(value: unknown, ancestors: WeakSet<object>): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : String(value);
  }
  if (typeof value !== "object") {
    return describe(value);
  }
  if (ancestors.has(value)) {
    return describe(value);
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item) => coerce(item, ancestors));
    }
    if ("toJSON" in value && typeof value.toJSON === "function") {
      try {
        return coerce(value.toJSON(), ancestors);
      } catch {
        return describe(value);
      }
    }
    if (isPlainObject(value)) {
      const result: JsonObject = {};
      for (const [key, item] of Object.entries(value)) {
        if (item !== undefined) {
          result[key] = coerce(item, ancestors);
        }
      }
      return result;
    }
    return describe(value);
  } finally {
    ancestors.delete(value);
  }
}

function isPlainObject(value: object): boolean {
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function describe(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}
