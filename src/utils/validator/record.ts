import { BaseValidator, Parser, ValidationError } from "./base";

export class RecordValidator<T> extends BaseValidator<Record<string, T>> {
  private readonly valueValidator: Parser<T>;

  constructor(valueValidator: Parser<T>) {
    super();
    this.valueValidator = valueValidator;
  }

  parse(arg: unknown): Record<string, T> {
    this.isObject(arg);

    const parsed: Record<string, T> = {};
    for (const [key, value] of Object.entries(arg)) {
      try {
        parsed[key] = this.valueValidator.parse(value);
      } catch (err) {
        throw new ValidationError(`Record entry \`${key}\`: ${(err as Error).message}`);
      }
    }

    return this.runValidators(parsed);
  }
}
