import { ValidationError } from "../shared/errors";

export class Salary {
  private constructor(readonly value: number) {}

  static of(value: number): Salary {
    if (!Number.isInteger(value)) {
      throw new ValidationError(`Salary must be an integer amount: ${value}`);
    }
    if (value < 0) {
      throw new ValidationError("Salary cannot be negative");
    }
    return new Salary(value);
  }

  atLeast(other: Salary): boolean {
    return this.value >= other.value;
  }

  toString(): string {
    return String(this.value);
  }
}
