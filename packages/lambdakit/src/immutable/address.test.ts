import { describe, it, expect } from "vitest";
import { Address } from "./address";
import { NullReferenceError } from "../errors";

describe("Address", () => {
  it("exposes its fields", () => {
    const address = Address.of("1 Harbour Road", "Faro");
    expect(address.street).toBe("1 Harbour Road");
    expect(address.city).toBe("Faro");
  });

  it("requires both fields", () => {
    expect(() => Address.of(null, "Faro")).toThrow(NullReferenceError);
    expect(() => Address.of("1 Harbour Road", undefined)).toThrow(
      "NullReferenceError: city is null or undefined"
    );
  });

  it("is frozen", () => {
    const address = Address.of("1 Harbour Road", "Faro");
    expect(Object.isFrozen(address)).toBe(true);
    expect(Reflect.set(address, "city", "Braga")).toBe(false);
    expect(address.city).toBe("Faro");
  });

  it("with* methods return a new Address and keep the original", () => {
    const home = Address.of("1 Harbour Road", "Faro");
    const moved = home.withCity("Braga");
    const renumbered = home.withStreet("2 Harbour Road");

    expect(moved).not.toBe(home);
    expect(moved.city).toBe("Braga");
    expect(moved.street).toBe("1 Harbour Road");
    expect(renumbered.street).toBe("2 Harbour Road");
    expect(home.city).toBe("Faro");
  });

  it("compares by value", () => {
    const a = Address.of("1 Harbour Road", "Faro");
    expect(a.equals(Address.of("1 Harbour Road", "Faro"))).toBe(true);
    expect(a.equals(a.withCity("Braga"))).toBe(false);
    expect(a.equals({ street: "1 Harbour Road", city: "Faro" })).toBe(false);
  });

  it("renders both fields", () => {
    expect(String(Address.of("1 Harbour Road", "Faro"))).toBe("Address{street='1 Harbour Road', city='Faro'}");
  });
});
