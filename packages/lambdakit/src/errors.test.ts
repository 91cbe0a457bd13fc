/**
 * Tests for errors.ts - Pre-built error types
 */
import { describe, it, expect } from "vitest";
import { TaggedError, TaggedErrorBase } from "./tagged-error";
import {
  NoSuchElementError,
  NullReferenceError,
  IllegalArgumentError,
  IllegalStateError,
  UnsupportedOperationError,
  UnboundedSequenceError,
  isNoSuchElementError,
  isNullReferenceError,
  isIllegalArgumentError,
  isIllegalStateError,
  isUnsupportedOperationError,
  isUnboundedSequenceError,
  isLambdakitError,
  type LambdakitError,
} from "./errors";

describe("Pre-built Errors", () => {
  describe("NoSuchElementError", () => {
    it("creates error without operation", () => {
      const error = new NoSuchElementError({});
      expect(error._tag).toBe("NoSuchElementError");
      expect(error.operation).toBeUndefined();
      expect(error.message).toBe("NoSuchElementError: No value present");
    });

    it("names the operation when given", () => {
      const error = new NoSuchElementError({ operation: "unwrap" });
      expect(error.operation).toBe("unwrap");
      expect(error.message).toBe("NoSuchElementError: unwrap found no value");
    });

    it("is instance of TaggedErrorBase and Error", () => {
      const error = new NoSuchElementError({});
      expect(error instanceof TaggedErrorBase).toBe(true);
      expect(error instanceof Error).toBe(true);
      expect(error.name).toBe("NoSuchElementError");
    });
  });

  describe("NullReferenceError", () => {
    it("names the reference", () => {
      const error = new NullReferenceError({ reference: "address.city" });
      expect(error._tag).toBe("NullReferenceError");
      expect(error.reference).toBe("address.city");
      expect(error.message).toBe("NullReferenceError: address.city is null or undefined");
    });
  });

  describe("IllegalArgumentError", () => {
    it("keeps argument, reason and value", () => {
      const error = new IllegalArgumentError({ argument: "radius", reason: "must not be negative", value: -2 });
      expect(error.argument).toBe("radius");
      expect(error.reason).toBe("must not be negative");
      expect(error.value).toBe(-2);
      expect(error.message).toBe("IllegalArgumentError: radius must not be negative");
    });
  });

  describe("IllegalStateError", () => {
    it("uses the reason as message body", () => {
      const error = new IllegalStateError({ reason: "sequence has already been consumed" });
      expect(error.message).toBe("IllegalStateError: sequence has already been consumed");
    });
  });

  describe("UnsupportedOperationError", () => {
    it("names the rejected operation", () => {
      const error = new UnsupportedOperationError({ operation: "push" });
      expect(error.message).toBe("UnsupportedOperationError: push is not supported on an immutable collection");
    });
  });

  describe("UnboundedSequenceError", () => {
    it("suggests limiting the sequence", () => {
      const error = new UnboundedSequenceError({ operation: "toArray" });
      expect(error.message).toBe(
        "UnboundedSequenceError: toArray on an unbounded sequence; add limit() or takeWhile() first"
      );
    });
  });

  describe("cause", () => {
    it("exposes the standard cause property", () => {
      const root = new Error("disk full");
      const error = new IllegalStateError({ reason: "cannot continue" }, { cause: root });
      expect(error.cause).toBe(root);
    });
  });

  describe("type guards", () => {
    const all: LambdakitError[] = [
      new NoSuchElementError({}),
      new NullReferenceError({ reference: "x" }),
      new IllegalArgumentError({ argument: "n", reason: "is bad" }),
      new IllegalStateError({ reason: "bad state" }),
      new UnsupportedOperationError({ operation: "add" }),
      new UnboundedSequenceError({ operation: "count" }),
    ];

    it("each guard accepts only its own error", () => {
      const guards = [
        isNoSuchElementError,
        isNullReferenceError,
        isIllegalArgumentError,
        isIllegalStateError,
        isUnsupportedOperationError,
        isUnboundedSequenceError,
      ];
      guards.forEach((guard, g) => {
        expect(all.map((error) => guard(error))).toEqual(all.map((_, e) => e === g));
      });
    });

    it("isLambdakitError accepts every library error", () => {
      expect(all.every(isLambdakitError)).toBe(true);
    });

    it("isLambdakitError rejects other errors and values", () => {
      class Unrelated extends TaggedError("Unrelated") {}
      expect(isLambdakitError(new Unrelated({}))).toBe(false);
      expect(isLambdakitError(new Error("plain"))).toBe(false);
      expect(isLambdakitError({ _tag: "NoSuchElementError" })).toBe(false);
      expect(isLambdakitError(null)).toBe(false);
    });
  });

  describe("exhaustive matching", () => {
    const describeError = (error: LambdakitError): string =>
      TaggedError.match(error, {
        NoSuchElementError: () => "missing",
        NullReferenceError: (e) => `null ${e.reference}`,
        IllegalArgumentError: (e) => `bad ${e.argument}`,
        IllegalStateError: (e) => e.reason,
        UnsupportedOperationError: (e) => `no ${e.operation}`,
        UnboundedSequenceError: (e) => `endless ${e.operation}`,
      });

    it("dispatches on the tag", () => {
      expect(describeError(new NullReferenceError({ reference: "user" }))).toBe("null user");
      expect(describeError(new UnsupportedOperationError({ operation: "clear" }))).toBe("no clear");
      expect(describeError(new UnboundedSequenceError({ operation: "min" }))).toBe("endless min");
    });
  });
});
