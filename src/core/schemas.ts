/**
 * Zod schemas for CouchDB response bodies.
 *
 * Server-optional fields accept both absence and an explicit null and decode
 * both to undefined. Unknown keys are stripped.
 */

import { z } from 'zod';
import { DecodeError } from './errors.js';

function orUndefined<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

const optionalString = z.string().nullish().transform(orUndefined);
const optionalBoolean = z.boolean().nullish().transform(orUndefined);

export const DatabaseNamesSchema = z.array(z.string());

export const CouchVendorSchema = z.object({
  name: z.string(),
  version: z.string(),
});

export const CouchStatusSchema = z.object({
  couchdb: z.string(),
  uuid: z.string(),
  version: z.string(),
  vendor: CouchVendorSchema,
});

export const CouchResponseSchema = z.object({
  ok: optionalBoolean,
  error: optionalString,
  reason: optionalString,
});

export const DatabaseCreatedSchema = CouchResponseSchema.extend({
  id: optionalString,
  name: optionalString,
});

export const SortSpecSchema = z.union([
  z.string(),
  z.record(z.string(), z.enum(['asc', 'desc'])),
]);

export const IndexFieldsSchema = z.object({
  fields: z.array(SortSpecSchema),
});

export const IndexSchema = z.object({
  ddoc: optionalString,
  name: z.string(),
  type: z.string(),
  def: IndexFieldsSchema,
});

export const DatabaseIndexListSchema = z.object({
  total_rows: z.number().int().nonnegative(),
  indexes: z.array(IndexSchema),
});

const CreationResultSchema = z.object({
  result: optionalString,
  id: optionalString,
  name: optionalString,
  error: optionalString,
  reason: optionalString,
});

export const IndexCreatedSchema = CreationResultSchema;
export const DesignCreatedSchema = CreationResultSchema;

const sequence = z.union([z.string(), z.number()]);

export const DatabaseInfoSchema = z.object({
  db_name: z.string(),
  doc_count: z.number().int(),
  doc_del_count: z.number().int(),
  update_seq: sequence,
  purge_seq: sequence.nullish().transform(orUndefined),
  compact_running: optionalBoolean,
  instance_start_time: optionalString,
  sizes: z
    .object({
      active: z.number(),
      external: z.number(),
      file: z.number(),
    })
    .nullish()
    .transform(orUndefined),
});

/**
 * Validate a response body against a schema
 *
 * @param what - Name of the expected shape, used in the error message
 * @throws DecodeError if the body does not match
 */
export function decode<S extends z.ZodTypeAny>(schema: S, body: unknown, what: string): z.output<S> {
  const result = schema.safeParse(body);

  if (!result.success) {
    throw new DecodeError(
      `Invalid ${what}: ${result.error.issues
        .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
        .join('; ')}`,
      result.error
    );
  }

  return result.data;
}
