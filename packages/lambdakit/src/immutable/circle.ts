import { IllegalArgumentError } from "../errors";
import type { Result } from "../result";
import { ok, err } from "../result";

function validateRadius(radius: number): Result<number, IllegalArgumentError> {
  if (Number.isNaN(radius)) {
    return err(new IllegalArgumentError({ argument: "radius", reason: "must be a number", value: radius }));
  }
  if (radius < 0) {
    return err(new IllegalArgumentError({ argument: "radius", reason: "must not be negative", value: radius }));
  }
  return ok(radius);
}

/**
 * A circle whose radius is checked on construction, so every instance is
 * valid for its whole life.
 *
 * @example
 * ```typescript
 * Circle.of(2).area(); // 12.566...
 * Circle.of(-1); // throws IllegalArgumentError: radius must not be negative
 * Circle.parse(-1); // { ok: false, error: IllegalArgumentError }
 * ```
 */
export class Circle {
  readonly radius: number;

  /**
   * @throws IllegalArgumentError when the radius is negative or NaN
   */
  constructor(radius: number) {
    const checked = validateRadius(radius);
    if (!checked.ok) {
      throw checked.error;
    }
    this.radius = checked.value;
    Object.freeze(this);
  }

  static of(radius: number): Circle {
    return new Circle(radius);
  }

  /**
   * Validate without throwing.
   */
  static parse(radius: number): Result<Circle, IllegalArgumentError> {
    const checked = validateRadius(radius);
    return checked.ok ? ok(new Circle(checked.value)) : checked;
  }

  area(): number {
    return Math.PI * this.radius * this.radius;
  }

  equals(other: unknown): boolean {
    return other instanceof Circle && other.radius === this.radius;
  }

  toString(): string {
    return `Circle{radius=${this.radius}}`;
  }
}
