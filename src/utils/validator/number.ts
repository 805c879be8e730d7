import { BaseValidator } from "./base";

export class NumberValidator extends BaseValidator<number> {
  parse(arg: unknown): number {
    this.isNumber(arg);
    if (Number.isNaN(arg)) {
      throw this.isnt(arg, "number");
    }
    return this.runValidators(arg);
  }

  min(min: number) {
    this.useValidators.push((arg) => {
      if (arg < min) {
        throw this.validationError(arg, `must be at least ${min}`);
      }
    });
    return this;
  }

  max(max: number) {
    this.useValidators.push((arg) => {
      if (arg > max) {
        throw this.validationError(arg, `must be at most ${max}`);
      }
    });
    return this;
  }

  integer() {
    this.useValidators.push((arg) => {
      if (!Number.isInteger(arg)) {
        throw this.validationError(arg, "must be an integer");
      }
    });
    return this;
  }
}
