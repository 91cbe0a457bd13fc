import { describe, it, expect } from "vitest";
import { TaggedError, TaggedErrorBase, type TagOf, type ErrorByTag } from "./tagged-error";

class OutOfStock extends TaggedError("OutOfStock", {
  message: (p: { sku: string; requested: number }) => `OutOfStock: ${p.requested} x ${p.sku}`,
}) {}

class CartEmpty extends TaggedError("CartEmpty") {}

type CheckoutError = OutOfStock | CartEmpty;

describe("TaggedError", () => {
  it("creates instances carrying tag and props", () => {
    const error = new OutOfStock({ sku: "sku-1", requested: 3 });
    expect(error._tag).toBe("OutOfStock");
    expect(error.sku).toBe("sku-1");
    expect(error.requested).toBe(3);
    expect(error.message).toBe("OutOfStock: 3 x sku-1");
    expect(error.name).toBe("OutOfStock");
  });

  it("defaults the message to the tag", () => {
    expect(new CartEmpty({}).message).toBe("CartEmpty");
  });

  it("exposes the tag on the class", () => {
    expect(OutOfStock.tag).toBe("OutOfStock");
  });

  it("sets cause only when given", () => {
    const cause = new Error("inventory offline");
    expect(new CartEmpty({}, { cause }).cause).toBe(cause);
    expect("cause" in new CartEmpty({})).toBe(false);
  });

  it("keeps the subclass prototype chain", () => {
    const error = new OutOfStock({ sku: "sku-2", requested: 1 });
    expect(error).toBeInstanceOf(OutOfStock);
    expect(error).toBeInstanceOf(TaggedErrorBase);
    expect(error).toBeInstanceOf(Error);
    expect(error).not.toBeInstanceOf(CartEmpty);
  });

  describe("isTaggedError", () => {
    it("recognises tagged errors only", () => {
      expect(TaggedError.isTaggedError(new CartEmpty({}))).toBe(true);
      expect(TaggedError.isTaggedError(new Error("plain"))).toBe(false);
      expect(TaggedError.isTaggedError({ _tag: "CartEmpty" })).toBe(false);
    });
  });

  describe("match", () => {
    const render = (error: CheckoutError): string =>
      TaggedError.match(error, {
        OutOfStock: (e) => `only some ${e.sku}`,
        CartEmpty: () => "add something first",
      });

    it("calls the handler for the error's tag", () => {
      expect(render(new OutOfStock({ sku: "sku-3", requested: 9 }))).toBe("only some sku-3");
      expect(render(new CartEmpty({}))).toBe("add something first");
    });

    it("types handlers by tag", () => {
      const tag: TagOf<CheckoutError> = "CartEmpty";
      const narrowed: ErrorByTag<CheckoutError, "OutOfStock"> = new OutOfStock({ sku: "sku-4", requested: 2 });
      expect(tag).toBe("CartEmpty");
      expect(narrowed.requested).toBe(2);
    });
  });
});
