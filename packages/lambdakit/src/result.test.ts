import { describe, it, expect } from "vitest";
import { ok, err, isOk, isErr, unwrap, unwrapOr, fromThrowable } from "./result";
import { NoSuchElementError } from "./errors";

describe("Result", () => {
  it("ok and err build the two variants", () => {
    expect(ok(1)).toEqual({ ok: true, value: 1 });
    expect(err("NOPE")).toEqual({ ok: false, error: "NOPE" });
  });

  it("err records a cause only when one is given", () => {
    const cause = new Error("root");
    expect(err("NOPE", { cause })).toEqual({ ok: false, error: "NOPE", cause });
    expect("cause" in err("NOPE")).toBe(false);
  });

  it("isOk and isErr discriminate", () => {
    expect(isOk(ok(1))).toBe(true);
    expect(isErr(ok(1))).toBe(false);
    expect(isErr(err("x"))).toBe(true);
  });

  describe("unwrap", () => {
    it("returns the Ok value", () => {
      expect(unwrap(ok("value"))).toBe("value");
    });

    it("throws NoSuchElementError with the error as cause", () => {
      let caught: unknown;
      try {
        unwrap(err("NOT_FOUND"));
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(NoSuchElementError);
      if (caught instanceof NoSuchElementError) {
        expect(caught.message).toBe("NoSuchElementError: unwrap found no value");
        expect(caught.cause).toBe("NOT_FOUND");
      }
    });
  });

  it("unwrapOr falls back on Err", () => {
    expect(unwrapOr(ok(2), 0)).toBe(2);
    expect(unwrapOr(err("x"), 0)).toBe(0);
  });

  describe("fromThrowable", () => {
    it("wraps a return value", () => {
      expect(fromThrowable(() => 42)).toEqual({ ok: true, value: 42 });
    });

    it("wraps a thrown value as the error", () => {
      const boom = new Error("boom");
      const result = fromThrowable(() => {
        throw boom;
      });
      expect(result).toEqual({ ok: false, error: boom });
    });

    it("maps the thrown value and keeps it as cause", () => {
      const boom = new Error("boom");
      const result = fromThrowable(
        () => {
          throw boom;
        },
        () => "FAILED" as const
      );
      expect(result).toEqual({ ok: false, error: "FAILED", cause: boom });
    });
  });
});
