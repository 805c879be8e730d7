import type { Parser } from "./base";

export class OptionalValidator<T> {
  private wrappedValidator: Parser<T>;

  constructor(validator: Parser<T>) {
    this.wrappedValidator = validator;
  }

  parse(arg: unknown): T | undefined {
    if (arg === undefined) {
      return undefined;
    }

    return this.wrappedValidator.parse(arg);
  }

  /** Also accepts `null`, which wire payloads use for cleared fields */
  nullable() {
    return new NullableValidator<T>(this.wrappedValidator);
  }
}

export class NullableValidator<T> {
  constructor(private readonly wrappedValidator: Parser<T>) {}

  parse(arg: unknown): T | null | undefined {
    if (arg === undefined || arg === null) {
      return arg;
    }

    return this.wrappedValidator.parse(arg);
  }
}
