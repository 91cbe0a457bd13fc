import { copyOf } from "./collections";
import type { Address } from "./address";

export interface ShipmentProps {
  items: readonly string[];
  address: Address;
  shippedAt: Date;
}

/**
 * Immutable wrapper around data that arrives in mutable containers.
 *
 * The constructor copies the item array and the date, so later changes to
 * the caller's objects never show through. Accessors hand out copies of
 * anything mutable; the Address is immutable and is returned as is.
 *
 * @example
 * ```typescript
 * const items = ['book'];
 * const shipment = new Shipment({ items, address, shippedAt: new Date() });
 * items.push('lamp');
 * shipment.getItems(); // ['book']
 * ```
 */
export class Shipment {
  private readonly items: ReadonlyArray<string>;
  private readonly address: Address;
  private readonly shippedAt: number;

  constructor(props: ShipmentProps) {
    this.items = copyOf(props.items);
    this.address = props.address;
    this.shippedAt = props.shippedAt.getTime();
    Object.freeze(this);
  }

  /** A fresh mutable copy; changing it does not affect the shipment. */
  getItems(): string[] {
    return [...this.items];
  }

  /** The shared unmodifiable list. */
  getFrozenItems(): ReadonlyArray<string> {
    return this.items;
  }

  getAddress(): Address {
    return this.address;
  }

  getShippedAt(): Date {
    return new Date(this.shippedAt);
  }

  withItem(item: string): Shipment {
    return new Shipment({
      items: [...this.items, item],
      address: this.address,
      shippedAt: new Date(this.shippedAt),
    });
  }

  withAddress(address: Address): Shipment {
    return new Shipment({ items: this.items, address, shippedAt: new Date(this.shippedAt) });
  }
}
