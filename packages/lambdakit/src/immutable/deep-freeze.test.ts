import { describe, it, expect } from "vitest";
import { deepFreeze, isDeepFrozen } from "./deep-freeze";

describe("deepFreeze", () => {
  it("freezes nested objects and arrays", () => {
    const settings = deepFreeze({
      retries: 3,
      hosts: ["alpha", "beta"],
      auth: { user: "test-user", scopes: ["read"] },
    });

    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.hosts)).toBe(true);
    expect(Object.isFrozen(settings.auth)).toBe(true);
    expect(Object.isFrozen(settings.auth.scopes)).toBe(true);
    expect(isDeepFrozen(settings)).toBe(true);
  });

  it("makes writes fail", () => {
    const settings = deepFreeze({ nested: { value: 1 } });
    expect(Reflect.set(settings.nested, "value", 2)).toBe(false);
    expect(() => Object.assign(settings.nested, { value: 2 })).toThrow(TypeError);
    expect(settings.nested.value).toBe(1);
  });

  it("returns the same object", () => {
    const original = { a: 1 };
    expect(deepFreeze(original)).toBe(original);
  });

  it("handles cycles", () => {
    interface Node {
      name: string;
      next?: Node;
    }
    const first: Node = { name: "first" };
    const second: Node = { name: "second", next: first };
    first.next = second;

    deepFreeze(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(second)).toBe(true);
    expect(isDeepFrozen(first)).toBe(true);
  });

  it("leaves primitives alone", () => {
    expect(deepFreeze(5)).toBe(5);
    expect(deepFreeze("text")).toBe("text");
    expect(deepFreeze(null)).toBeNull();
  });
});

describe("isDeepFrozen", () => {
  it("detects a mutable object deep inside", () => {
    const outer = Object.freeze({ inner: { value: 1 } });
    expect(Object.isFrozen(outer)).toBe(true);
    expect(isDeepFrozen(outer)).toBe(false);
  });

  it("treats primitives as frozen", () => {
    expect(isDeepFrozen(1)).toBe(true);
    expect(isDeepFrozen(undefined)).toBe(true);
  });
});
