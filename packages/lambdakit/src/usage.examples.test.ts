/**
 * End-to-end walkthroughs: small programs written against the public
 * entry point the way an application would use the library.
 */
import { describe, it, expect } from "vitest";
import {
  Seq,
  Collectors,
  Option,
  O,
  pipe,
  andThen,
  composeWith,
  equalsIgnoreCase,
  listOf,
  copyOf,
  unmodifiableView,
  requireNonNull,
  Address,
  NullReferenceError,
  UnsupportedOperationError,
  type BinaryOperator,
  type Consumer,
  type Fn,
  type Predicate,
  type UnaryOperator,
} from "./index";

describe("functions as values", () => {
  it("a lambda and a named consumer see the same elements", () => {
    const byLambda: number[] = [];
    const byName: number[] = [];
    function record(n: number): void {
      byName.push(n);
    }
    const recordConsumer: Consumer<number> = record;

    Seq.of(1, 2, 3, 4, 5).forEach((n) => byLambda.push(n));
    Seq.of(1, 2, 3, 4, 5).forEach(recordConsumer);

    expect(byLambda).toEqual([1, 2, 3, 4, 5]);
    expect(byName).toEqual(byLambda);
  });

  it("a custom function type is satisfied by an arrow function", () => {
    type Greeting = (name: string) => string;
    const greet: Greeting = (name) => `Hello, ${name}`;

    expect(greet("Alice")).toBe("Hello, Alice");
  });

  it("a unary operator applies a discount", () => {
    const applyDiscount: UnaryOperator<number> = (price) => price * 0.9;

    expect(Seq.of(100, 200, 300).map(applyDiscount).toArray()).toEqual([90, 180, 270]);
  });

  it("predicates combine to find multiples of six", () => {
    const divisibleByTwo: Predicate<number> = (n) => n % 2 === 0;
    const divisibleByThree: Predicate<number> = (n) => n % 3 === 0;

    const multiples = Seq.rangeClosed(1, 100)
      .filter((n) => divisibleByTwo(n) && divisibleByThree(n))
      .toArray();

    expect(multiples).toHaveLength(16);
    expect(multiples[0]).toBe(6);
    expect(multiples[15]).toBe(96);
  });

  it("equalsIgnoreCase matches names regardless of case", () => {
    const names = ["alice", "BOB", "Carol"];

    expect(names.filter((name) => equalsIgnoreCase(name, "bob"))).toEqual(["BOB"]);
    expect(equalsIgnoreCase("Carol", "carol ")).toBe(false);
  });

  it("a two-argument function computes a distance", () => {
    interface Point {
      x: number;
      y: number;
    }
    const distance = (a: Point, b: Point): number => Math.hypot(b.x - a.x, b.y - a.y);

    expect(distance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
  });

  it("a binary operator formats a full name", () => {
    const fullName: BinaryOperator<string> = (first, last) => `${last}, ${first}`;

    expect(fullName("Jane", "Roe")).toBe("Roe, Jane");
  });

  it("square andThen double and square composed with double", () => {
    const square: Fn<number, number> = (x) => x * x;
    const double: Fn<number, number> = (x) => x * 2;

    expect(andThen(square, double)(5)).toBe(50);
    expect(composeWith(square, double)(5)).toBe(100);
  });
});

describe("absent values", () => {
  const composeAddress = (address: Address | null): string => {
    const present = requireNonNull(address, "address");
    return present.street.concat(present.city);
  };

  it("dereferencing a missing address fails fast", () => {
    expect(() => composeAddress(null)).toThrow("NullReferenceError: address is null or undefined");
    expect(() => Address.of(null, "city")).toThrow(NullReferenceError);
    expect(() => Address.of("street", null)).toThrow("NullReferenceError: city is null or undefined");
    expect(composeAddress(Address.of("street", "city"))).toBe("streetcity");
  });

  it.each([
    ["Jane", "Roe", "Jane Roe"],
    ["Jane", null, "Unknown Name"],
    [null, "Roe", "Unknown Name"],
    [null, null, "Unknown Name"],
  ])("combines first name %s and last name %s", (first, last, expected) => {
    const full = pipe(
      Option.ofNullable(first),
      O.flatMap((f: string) => Option.map(Option.ofNullable(last), (l) => `${f} ${l}`)),
      O.orElse<string>("Unknown Name")
    );

    expect(full).toBe(expected);
  });

  it("looks up a capital by country code with a default city", () => {
    const countryByCode = (code: string | null): Option<string> =>
      Option.ofNullable(code !== null && equalsIgnoreCase(code, "es") ? "Spain" : null);
    const capitalByCountry = (country: string): Option<string> =>
      Option.ofNullable(equalsIgnoreCase(country, "Spain") ? "Madrid" : null);
    const capitalByCode = (code: string | null): string =>
      pipe(countryByCode(code), O.flatMap(capitalByCountry), O.orElse<string>("Salamanca"));

    expect(capitalByCode(null)).toBe("Salamanca");
    expect(capitalByCode("")).toBe("Salamanca");
    expect(capitalByCode("pt")).toBe("Salamanca");
    expect(capitalByCode("es")).toBe("Madrid");
    expect(capitalByCode("ES")).toBe("Madrid");
  });
});

describe("lazy sequences", () => {
  it("builds the first ten Fibonacci numbers from pairs", () => {
    const fibonacci = Seq.iterate<[number, number]>([0, 1], ([a, b]) => [b, a + b])
      .map(([a]) => a)
      .limit(10)
      .toArray();

    expect(fibonacci).toEqual([0, 1, 1, 2, 3, 5, 8, 13, 21, 34]);
  });

  it("flattens nested lists", () => {
    const nested = [[1, 2, 3], [4, 5], [6, 7, 8, 9]];

    expect(Seq.from(nested).flatMap((list) => list).toArray()).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("splits a sentence into words", () => {
    expect(Seq.split("Lazy Sequences Are Handy", " ").toArray()).toEqual(["Lazy", "Sequences", "Are", "Handy"]);
  });

  it("stays lazy until a terminal operation runs", () => {
    let counter = 0;
    const pipeline = Seq.iterate(0, (n) => n + 2)
      .map((n) => n * 2)
      .filter((n) => n % 3 === 0)
      .limit(5)
      .distinct()
      .peek(() => {
        counter++;
      });

    expect(counter).toBe(0);

    const firstFive = pipeline.toArray();

    expect(counter).toBe(5);
    expect(firstFive).toEqual([0, 12, 24, 36, 48]);
  });

  it("groups words by length", () => {
    const byLength = Seq.of("apple", "fig", "kiwi", "pear", "plum").collect(
      Collectors.groupingBy((word: string) => word.length)
    );

    expect(byLength.get(3)).toEqual(["fig"]);
    expect(byLength.get(4)).toEqual(["kiwi", "pear", "plum"]);
    expect(byLength.get(5)).toEqual(["apple"]);
  });
});

describe("immutable collections", () => {
  it("copies do not follow the source, views do", () => {
    const backing = ["a", "b"];
    const copy = copyOf(backing);
    const view = unmodifiableView(backing);

    backing.push("c");

    expect([...copy]).toEqual(["a", "b"]);
    expect([...view]).toEqual(["a", "b", "c"]);
  });

  it("rejects writes through a fixed list", () => {
    const fixed = listOf(1, 2, 3);

    expect(() => Reflect.set(fixed, 0, 9)).toThrow(UnsupportedOperationError);
    expect(fixed[0]).toBe(1);
  });
});
