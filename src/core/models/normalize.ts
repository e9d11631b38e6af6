/**
 * Hyperparameter normalization: option schemas that coerce user values to the
 * fixed-width types the engine expects, and the RemoteArg constructors used to
 * build positional argument lists.
 */

import { z } from "zod";
import { InvalidConfigurationError } from "../errors";
import { RemoteArg, RemoteObject } from "../remote/types";

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/** An array entry the caller left empty. */
export type Missing = null | undefined;

export type NumericEntry = number | Missing;

export function isPresent(value: NumericEntry): value is number {
  return value !== null && value !== undefined && !Number.isNaN(value);
}

/** Drop null, undefined and NaN entries, keeping order. */
export function dropMissing(values: readonly NumericEntry[]): number[] {
  return values.filter(isPresent);
}

/** An optional column name given as "" is treated as absent. */
export function optionalColumn(value: string | Missing): string | undefined {
  if (value === null || value === undefined || value === "") return undefined;
  return value;
}

// ---- zod building blocks -------------------------------------------------

const numericEntry = z.union([z.number().finite(), z.nan(), z.null(), z.undefined()]);

/** Finite number truncated toward zero, then range-checked as a 32-bit int. */
export function integerOption(min: number) {
  return z
    .number()
    .finite()
    .transform(Math.trunc)
    .pipe(z.number().int().min(min).max(INT32_MAX));
}

export const doubleOption = z.number().finite();

export const columnOption = z.string().nullable().optional().transform(optionalColumn);

/** Numeric array with missing entries dropped. */
export const numericArrayOption = z.array(numericEntry).transform(dropMissing);

/** Integer array with missing entries dropped and the rest truncated. */
export const integerArrayOption = z
  .array(numericEntry)
  .transform((values) => dropMissing(values).map(Math.trunc));

/**
 * Parse raw options, turning any validation failure into an
 * InvalidConfigurationError that names the model and the offending fields.
 */
export function parseOptions<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  raw: unknown,
  model: string
): Output {
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "options"}: ${i.message}`);
    throw new InvalidConfigurationError(`${model} options rejected (${issues.join("; ")})`, issues);
  }
  return result.data;
}

// ---- remote argument constructors ---------------------------------------

function checkInt32(value: number, what: string): number {
  if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    throw new InvalidConfigurationError(`${what} ${value} is not a 32-bit integer`);
  }
  return value;
}

export const arg = {
  double: (value: number): RemoteArg => ({ type: "double", value }),
  integer: (value: number): RemoteArg => ({ type: "integer", value: checkInt32(value, "integer") }),
  boolean: (value: boolean): RemoteArg => ({ type: "boolean", value }),
  string: (value: string): RemoteArg => ({ type: "string", value }),
  optionalString: (value: string | undefined): RemoteArg =>
    value === undefined ? { type: "null" } : { type: "string", value },
  doubleArray: (value: number[]): RemoteArg => ({ type: "doubleArray", value }),
  optionalDoubleArray: (value: number[] | undefined): RemoteArg =>
    value === undefined ? { type: "null" } : { type: "doubleArray", value },
  integerArray: (value: number[]): RemoteArg => ({
    type: "integerArray",
    value: value.map((v) => checkInt32(v, "array entry")),
  }),
  ref: (value: RemoteObject): RemoteArg => ({ type: "ref", value: value.id }),
};
