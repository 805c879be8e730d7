import { NumberValidator } from "./number";
import { StringValidator } from "./string";
import { ObjectValidator } from "./object";
import { BooleanValidator } from "./boolean";
import { ArrayValidator } from "./array";
import { Parser } from "./base";
import { EnumValidator } from "./enum";
import { OptionalValidator } from "./optional";
import { RecordValidator } from "./record";

export type { Infer, Parser } from "./base";
export { ValidationError } from "./base";
export type { ObjectShape } from "./object";

export const v = {
  string: () => new StringValidator(),
  number: () => new NumberValidator(),
  object: <S extends Record<string, Parser<unknown>>>(schema: S) =>
    new ObjectValidator<S>(schema),
  boolean: () => new BooleanValidator(),
  array: () => ArrayValidator.any(),
  record: <T>(validator: Parser<T>) => new RecordValidator<T>(validator),
  enum: <const E extends readonly unknown[]>(enumValues: E) =>
    new EnumValidator<E>(enumValues),
  optional: <T>(validator: Parser<T>) => new OptionalValidator<T>(validator),
  /** Accepts anything; for payload members passed through untouched */
  unknown: (): Parser<unknown> => ({ parse: (arg) => arg }),
};
