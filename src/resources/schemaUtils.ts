/**
 * zod building blocks shared by the resource schemas.
 *
 * @module
 */
import { z } from 'zod';
import { isValidJson } from '../lib/jsonUtils.js';

/**
 * A nested block holding at most one element.
 *
 * Accepts the element itself or the single-element list form that
 * block-oriented configuration languages produce; an empty list means the
 * block is absent. A list of two or more blocks is rejected.
 */
export function block<T extends z.ZodTypeAny>(schema: T) {
  return z
    .unknown()
    .superRefine((value, ctx) => {
      if (Array.isArray(value) && value.length > 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `at most one block is allowed, got ${value.length}`,
        });
      }
    })
    .transform((value) => (Array.isArray(value) ? value[0] : value))
    .pipe(schema.optional());
}

/** A string attribute that must hold a JSON document. */
export const jsonString = z.string().refine(isValidJson, { message: 'must be valid JSON' });

export const stringSet = z.array(z.string());

export const positiveOrZeroInt = z.number().int().min(0);
