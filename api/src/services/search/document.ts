/**
 * Document builder.
 *
 * Turns an entity into the document an index holds, and into the body of a
 * partial update according to the configured update strategy.
 */

import { Effect, Either, Option } from "effect";
import { Environment } from "../environment";
import { InvalidArgument, InvalidDocument, InvalidUpdate, NotImplemented } from "./errors";
import { IndexMappings } from "./mappings";
import { encodeValue, isSerializable } from "./serialization";
import type { DocumentSource, SearchDocument } from "./types";

/**
 * Mapped properties of the entity's type in `index`.
 */
export const mappedProperties = (entity: DocumentSource, index: string) =>
  Effect.gen(function* () {
    const mappings = yield* IndexMappings;
    const properties = mappings.properties(index, entity.entityType);
    if (Option.isNone(properties)) {
      return yield* Effect.fail(
        new InvalidArgument(
          `Index '${index}' declares no mapping for '${entity.entityType}'`
        )
      );
    }
    return new Set(properties.value);
  });

/**
 * Build the full search document for `index`.
 *
 * Only fields in the index mapping are kept. A mapped value that cannot be
 * encoded fails the whole build rather than being dropped.
 */
export const buildDocument = (entity: DocumentSource, index: string) =>
  Effect.gen(function* () {
    if (entity.asSearchDocument === undefined) {
      return yield* Effect.fail(
        new NotImplemented(
          `'${entity.entityType}' does not define a search document`
        )
      );
    }
    const source = entity.asSearchDocument(index);
    const properties = yield* mappedProperties(entity, index);

    const document: SearchDocument = {};
    for (const [field, value] of Object.entries(source)) {
      if (!properties.has(field)) {
        continue;
      }
      const encoded = encodeValue(value);
      if (Either.isLeft(encoded)) {
        return yield* Effect.fail(
          new InvalidDocument(
            field,
            `Field '${field}' of '${entity.entityType}' cannot be indexed: ${encoded.left.reason}`
          )
        );
      }
      document[field] = value;
    }
    return document;
  });

/**
 * Reduce `requested` to the fields that may be sent in a partial update.
 *
 * Fields outside the mapping are dropped. A mapped field whose current value
 * cannot be encoded is an error: the caller asked for something the document
 * cannot hold.
 */
export const cleanUpdateFields = (
  entity: DocumentSource,
  index: string,
  requested: ReadonlyArray<string>
) =>
  Effect.gen(function* () {
    const properties = yield* mappedProperties(entity, index);
    const cleaned: string[] = [];
    for (const field of requested) {
      if (!properties.has(field) || cleaned.includes(field)) {
        continue;
      }
      if (!isSerializable(entity, field)) {
        return yield* Effect.fail(
          new InvalidUpdate(
            field,
            `Update field '${field}' of '${entity.entityType}' is mapped in '${index}' but cannot be serialized`
          )
        );
      }
      cleaned.push(field);
    }
    return cleaned;
  });

/**
 * Build the body of a partial update.
 *
 * Under the FULL strategy `updateFields` is ignored and the complete
 * document is returned. Under PARTIAL the result holds only the cleaned
 * fields and may be empty.
 */
export const buildUpdateDocument = (
  entity: DocumentSource,
  index: string,
  updateFields: ReadonlyArray<string>
) =>
  Effect.gen(function* () {
    const { updateStrategy } = yield* Environment;
    if (updateStrategy === "FULL") {
      return yield* buildDocument(entity, index);
    }

    const fields = yield* cleanUpdateFields(entity, index, updateFields);
    const document: SearchDocument = {};
    for (const field of fields) {
      document[field] = entity.readField(field);
    }
    return document;
  });
