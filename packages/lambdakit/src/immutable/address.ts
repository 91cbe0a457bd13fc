import { requireNonNull } from "../guards";

/**
 * Immutable postal address. Instances are frozen; the `with*` methods
 * return a new Address and leave the receiver untouched.
 *
 * @example
 * ```typescript
 * const home = Address.of('1 Main St', 'Springfield');
 * const moved = home.withCity('Shelbyville');
 * home.city; // 'Springfield'
 * String(moved); // "Address{street='1 Main St', city='Shelbyville'}"
 * ```
 */
export class Address {
  private constructor(
    readonly street: string,
    readonly city: string
  ) {
    Object.freeze(this);
  }

  /**
   * @throws NullReferenceError when either field is null or undefined
   */
  static of(street: string | null | undefined, city: string | null | undefined): Address {
    return new Address(requireNonNull(street, "street"), requireNonNull(city, "city"));
  }

  withStreet(street: string): Address {
    return Address.of(street, this.city);
  }

  withCity(city: string): Address {
    return Address.of(this.street, city);
  }

  equals(other: unknown): boolean {
    return other instanceof Address && other.street === this.street && other.city === this.city;
  }

  toString(): string {
    return `Address{street='${this.street}', city='${this.city}'}`;
  }
}
