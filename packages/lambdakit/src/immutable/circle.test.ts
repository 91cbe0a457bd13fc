import { describe, it, expect } from "vitest";
import { Circle } from "./circle";
import { IllegalArgumentError } from "../errors";

describe("Circle", () => {
  it("accepts zero and positive radii", () => {
    expect(new Circle(0).radius).toBe(0);
    expect(Circle.of(2.5).radius).toBe(2.5);
  });

  it("rejects a negative radius", () => {
    expect(() => new Circle(-1)).toThrow(IllegalArgumentError);
    expect(() => Circle.of(-1)).toThrow("IllegalArgumentError: radius must not be negative");
  });

  it("rejects NaN", () => {
    expect(() => Circle.of(Number.NaN)).toThrow("IllegalArgumentError: radius must be a number");
  });

  it("computes its area", () => {
    expect(Circle.of(1).area()).toBe(Math.PI);
    expect(Circle.of(2).area()).toBeCloseTo(12.566, 3);
  });

  it("compares by radius", () => {
    expect(Circle.of(3).equals(Circle.of(3))).toBe(true);
    expect(Circle.of(3).equals(Circle.of(4))).toBe(false);
    expect(Circle.of(3).equals({ radius: 3 })).toBe(false);
  });

  it("is frozen", () => {
    const circle = Circle.of(1);
    expect(Object.isFrozen(circle)).toBe(true);
    expect(Reflect.set(circle, "radius", 5)).toBe(false);
  });

  describe("parse", () => {
    it("returns ok with a valid circle", () => {
      const result = Circle.parse(4);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.radius).toBe(4);
      }
    });

    it("returns the validation error instead of throwing", () => {
      const result = Circle.parse(-3);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(IllegalArgumentError);
        expect(result.error.argument).toBe("radius");
        expect(result.error.value).toBe(-3);
      }
    });
  });
});
