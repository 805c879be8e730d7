import { BaseValidator, Parser } from "./base";

type Shape<S extends Record<string, Parser<unknown>>> = {
  [K in keyof S]: ReturnType<S[K]["parse"]>;
};

type OptionalKeys<T> = {
  [K in keyof T]-?: undefined extends T[K] ? K : never;
}[keyof T];

/** Keys whose parser may yield `undefined` become optional properties */
export type ObjectShape<S extends Record<string, Parser<unknown>>> = {
  [K in Exclude<keyof S, OptionalKeys<Shape<S>>>]: Shape<S>[K];
} & {
  [K in OptionalKeys<Shape<S>>]?: Shape<S>[K];
};

export class ObjectValidator<
  S extends Record<string, Parser<unknown>>,
> extends BaseValidator<ObjectShape<S>> {
  readonly schema: S;

  constructor(schema: S) {
    super();
    this.schema = schema;
  }

  validateSchema(arg: unknown): asserts arg is ObjectShape<S> {
    this.isObject(arg);

    for (const k of Object.keys(this.schema)) {
      try {
        const value = this.schema[k].parse(Reflect.get(arg, k));
        // Parsers may normalize (ids, arrays), so write the parsed value back
        if (value !== undefined || Reflect.has(arg, k)) {
          Reflect.set(arg, k, value);
        }
      } catch (err) {
        throw this.validationError(k, `field invalid: ${(err as Error).message}`);
      }
    }
  }

  parse(arg: unknown): ObjectShape<S> {
    this.validateSchema(arg);
    return this.runValidators(arg);
  }
}
