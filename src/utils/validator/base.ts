import { OptionalValidator } from "./optional";

export type ParseFn<T> = (arg: unknown) => T;
export type Parser<T> = {
  parse: ParseFn<T>;
};

/** Static type produced by a parser */
export type Infer<P> = P extends Parser<infer T> ? T : never;

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class BaseValidator<T = unknown> {
  protected useValidators: ((arg: T) => void)[] = [];

  protected runValidators(arg: T): T {
    for (const validator of this.useValidators) {
      validator(arg);
    }
    return arg;
  }

  custom(func: (arg: T) => boolean) {
    this.useValidators.push((arg) => {
      if (!func(arg)) {
        throw new ValidationError(`\`${String(arg)}\` does not match validator`);
      }
    });
    return this;
  }

  optional(this: Parser<T>) {
    return new OptionalValidator<T>(this);
  }

  validationError(arg: unknown, message: string) {
    return new ValidationError(`\`${describe(arg)}\` ${message}`);
  }

  isnt(arg: unknown, type: string) {
    return this.validationError(arg, `is not a ${type}`);
  }

  isType(arg: unknown, type: string) {
    switch (type) {
      case "array": {
        if (!Array.isArray(arg)) {
          throw this.isnt(arg, type);
        }
        break;
      }
      case "object": {
        if (typeof arg !== "object" || arg === null || Array.isArray(arg)) {
          throw this.isnt(arg, type);
        }
        break;
      }
      default: {
        if (typeof arg !== type) {
          throw this.isnt(arg, type);
        }
        break;
      }
    }
  }

  isString(arg: unknown): asserts arg is string {
    this.isType(arg, "string");
  }

  isNumber(arg: unknown): asserts arg is number {
    this.isType(arg, "number");
  }

  isObject(arg: unknown): asserts arg is object {
    this.isType(arg, "object");
  }

  isArray(arg: unknown): asserts arg is unknown[] {
    this.isType(arg, "array");
  }

  isBoolean(arg: unknown): asserts arg is boolean {
    this.isType(arg, "boolean");
  }
}

const describe = (arg: unknown) => {
  if (typeof arg === "object" && arg !== null) {
    return Array.isArray(arg) ? "array" : "object";
  }
  return String(arg);
};
