import { BaseValidator, Parser, ValidationError } from "./base";

const anyElement: Parser<unknown> = { parse: (arg) => arg };

export class ArrayValidator<T = unknown> extends BaseValidator<T[]> {
  private readonly elementValidator: Parser<T>;

  constructor(elementValidator: Parser<T>) {
    super();
    this.elementValidator = elementValidator;
  }

  static any() {
    return new ArrayValidator(anyElement);
  }

  parse(arg: unknown): T[] {
    this.isArray(arg);

    const parsed: T[] = [];
    for (let i = 0; i < arg.length; i++) {
      try {
        parsed.push(this.elementValidator.parse(arg[i]));
      } catch (err) {
        throw new ValidationError(
          `Array element at index ${i}: ${(err as Error).message}`
        );
      }
    }

    return this.runValidators(parsed);
  }

  of<U>(validator: Parser<U>): ArrayValidator<U> {
    return new ArrayValidator(validator);
  }

  minLength(length: number) {
    this.useValidators.push((arg) => {
      if (arg.length < length) {
        throw new ValidationError(`Array must have at least ${length} elements`);
      }
    });
    return this;
  }

  maxLength(length: number) {
    this.useValidators.push((arg) => {
      if (arg.length > length) {
        throw new ValidationError(`Array must have at most ${length} elements`);
      }
    });
    return this;
  }

  notEmpty() {
    this.useValidators.push((arg) => {
      if (arg.length === 0) {
        throw new ValidationError("Array must not be empty");
      }
    });
    return this;
  }
}
