/**
 * Tests for complement and reverse complement
 */

import { Either } from "effect";
import { describe, expect, test } from "vitest";
import { InvalidBaseError } from "../../../src/errors";
import {
  complement,
  isReverseComplementPalindrome,
  reverse,
  reverseComplement,
} from "../../../src/operations/core/sequence-manipulation";

function leftOf<R, L>(result: Either.Either<R, L>): L | undefined {
  return Either.match(result, { onLeft: (error) => error, onRight: () => undefined });
}

describe("complement", () => {
  test("pairs A with T and G with C", () => {
    expect(Either.getOrThrow(complement("ATGC"))).toBe("TACG");
  });

  test("upper-cases lower-case input", () => {
    expect(Either.getOrThrow(complement("aattggcc"))).toBe("TTAACCGG");
  });
});

describe("reverse", () => {
  test("reverses the string", () => {
    expect(reverse("ATCG")).toBe("GCTA");
    expect(reverse("")).toBe("");
  });
});

describe("reverseComplement", () => {
  test("reverse complement of ATGC is GCAT", () => {
    expect(Either.getOrThrow(reverseComplement("ATGC"))).toBe("GCAT");
  });

  test("is case-insensitive", () => {
    expect(Either.getOrThrow(reverseComplement("aacg"))).toBe("CGTT");
  });

  test("returns an empty string for an empty sequence", () => {
    expect(Either.getOrThrow(reverseComplement(""))).toBe("");
  });

  test("is its own inverse", () => {
    const once = Either.getOrThrow(reverseComplement("GATTACA"));
    expect(once).toBe("TGTAATC");
    expect(Either.getOrThrow(reverseComplement(once))).toBe("GATTACA");
  });

  test("reports the first base without a complement", () => {
    const result = reverseComplement("ATXGN");
    expect(Either.isLeft(result)).toBe(true);

    const error = leftOf(result);
    expect(error).toBeInstanceOf(InvalidBaseError);
    expect(error?.base).toBe("X");
    expect(error?.position).toBe(2);
    expect(error?.code).toBe("INVALID_BASE");
  });

  test("rejects ambiguity codes and RNA bases", () => {
    expect(Either.isLeft(reverseComplement("ATGN"))).toBe(true);
    expect(Either.isLeft(reverseComplement("AUGC"))).toBe(true);
  });
});

describe("isReverseComplementPalindrome", () => {
  test("detects self-complementary sequences", () => {
    expect(isReverseComplementPalindrome("AT")).toBe(true);
    expect(isReverseComplementPalindrome("gaattc")).toBe(true);
  });

  test("is false for ordinary, empty and invalid sequences", () => {
    expect(isReverseComplementPalindrome("ATGC")).toBe(false);
    expect(isReverseComplementPalindrome("")).toBe(false);
    expect(isReverseComplementPalindrome("ANNT")).toBe(false);
  });
});
