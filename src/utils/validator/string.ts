import { BaseValidator } from "./base";
import { EnumValidator } from "./enum";

export class StringValidator extends BaseValidator<string> {
  parse(arg: unknown): string {
    this.isString(arg);
    return this.runValidators(arg);
  }

  isNotEmpty() {
    this.useValidators.push((arg) => {
      if (arg.length === 0) {
        throw this.validationError(arg, "must not be empty");
      }
    });
    return this;
  }

  minLength(length: number) {
    this.useValidators.push((arg) => {
      if (arg.length < length) {
        throw this.validationError(
          arg,
          `must be at least ${length} characters long`
        );
      }
    });
    return this;
  }

  maxLength(length: number) {
    this.useValidators.push((arg) => {
      if (arg.length > length) {
        throw this.validationError(
          arg,
          `must be at most ${length} characters long`
        );
      }
    });
    return this;
  }

  url() {
    this.useValidators.push((arg) => {
      if (!/^(?:https?|wss?):\/\/[^\s/$.?#][^\s]*$/.test(arg)) {
        throw this.validationError(arg, "must be a valid URL");
      }
    });
    return this;
  }

  enum<E extends readonly string[]>(accepted: E) {
    return new EnumValidator<E>(accepted);
  }
}
