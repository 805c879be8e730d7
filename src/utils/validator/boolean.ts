import { BaseValidator } from "./base";

export class BooleanValidator extends BaseValidator<boolean> {
  parse(arg: unknown): boolean {
    this.isBoolean(arg);
    return this.runValidators(arg);
  }
}
