/**
 * TypeBox helpers for checking raw API items before they become rows
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { MalformedRecord } from "../errors.js";

export const Nullable = <T extends TSchema>(schema: T) =>
  Type.Union([schema, Type.Null()]);

/**
 * Narrow `item` to the schema's static type or throw MalformedRecord
 * naming the first offending path.
 */
export function parseItem<T extends TSchema>(
  schema: T,
  item: unknown,
  label: string
): Static<T> {
  if (Value.Check(schema, item)) {
    return item;
  }

  const first = Value.Errors(schema, item).First();
  const detail =
    first === undefined
      ? "unexpected shape"
      : `${first.path === "" ? "/" : first.path} ${first.message}`;
  throw new MalformedRecord(`${label}: ${detail}`);
}

export function parseTimestamp(value: string, field: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new MalformedRecord(`${field}: invalid timestamp "${value}"`);
  }
  return date;
}
