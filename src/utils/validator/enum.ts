import { BaseValidator } from "./base";

export class EnumValidator<E extends readonly unknown[]> extends BaseValidator<
  E[number]
> {
  readonly enum: E;

  constructor(enumValues: E) {
    super();
    this.enum = enumValues;
  }

  valueIsInEnum(arg: unknown): asserts arg is E[number] {
    if (!this.enum.includes(arg)) {
      throw this.validationError(arg, `must be one of ${this.enum.join(", ")}`);
    }
  }

  parse(arg: unknown): E[number] {
    this.valueIsInEnum(arg);
    return this.runValidators(arg);
  }
}
