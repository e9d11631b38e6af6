/**
 * Remote invocation types
 *
 * Everything that crosses the engine boundary is described here: typed
 * positional arguments, call targets and opaque object references.
 */

import { z } from "zod";

/**
 * Opaque reference to an object living inside the remote engine.
 */
export class RemoteObject {
  constructor(public readonly id: string) {
    Object.freeze(this);
  }

  toJSON(): { $ref: string } {
    return { $ref: this.id };
  }

  toString(): string {
    return `RemoteObject(${this.id})`;
  }
}

/** A fitted model living on the engine. */
export type ModelHandle = RemoteObject;

/** Tabular data living on the engine. */
export type DataFrameRef = RemoteObject;

/**
 * Positional argument with its wire type. Numbers are tagged so the engine
 * can tell a 32-bit integer from a double.
 */
export type RemoteArg =
  | { type: "double"; value: number }
  | { type: "integer"; value: number }
  | { type: "boolean"; value: boolean }
  | { type: "string"; value: string }
  | { type: "doubleArray"; value: number[] }
  | { type: "integerArray"; value: number[] }
  | { type: "ref"; value: string }
  | { type: "null" };

export type CallTarget = { className: string } | { ref: string };

export interface RemoteCall {
  target: CallTarget;
  method: string;
  args: RemoteArg[];
}

export function describeTarget(target: CallTarget): string {
  return "className" in target ? target.className : `#${target.ref}`;
}

/**
 * Replace every `{ "$ref": id }` in a decoded JSON value with a RemoteObject.
 */
export function decodeValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(decodeValue);
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value);
    if (entries.length === 1) {
      const [key, ref] = entries[0];
      if (key === "$ref" && typeof ref === "string") {
        return new RemoteObject(ref);
      }
    }
    return Object.fromEntries(entries.map(([k, v]) => [k, decodeValue(v)]));
  }
  return value;
}

export const RemoteObjectSchema = z.instanceof(RemoteObject);

export const RemoteArgSchema: z.ZodType<RemoteArg> = z.discriminatedUnion("type", [
  z.object({ type: z.literal("double"), value: z.number() }),
  z.object({ type: z.literal("integer"), value: z.number().int() }),
  z.object({ type: z.literal("boolean"), value: z.boolean() }),
  z.object({ type: z.literal("string"), value: z.string() }),
  z.object({ type: z.literal("doubleArray"), value: z.array(z.number()) }),
  z.object({ type: z.literal("integerArray"), value: z.array(z.number().int()) }),
  z.object({ type: z.literal("ref"), value: z.string() }),
  z.object({ type: z.literal("null") }),
]);
