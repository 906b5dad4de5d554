import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { NOT_FOUND } from "./dot-path.js";
import { RuleError } from "./errors.js";
import {
  differs,
  equals,
  exactLength,
  greaterThan,
  greaterThanEqualTo,
  inList,
  lessThan,
  lessThanEqualTo,
  matches,
  maxLength,
  minLength,
  notEquals,
  notInList,
  required,
  requiredWith,
  requiredWithout,
} from "./rules.js";

function isInvalidArgument(err: unknown): boolean {
  return err instanceof RuleError && err.code === "INVALID_ARGUMENT";
}

describe("differs / matches", () => {
  it("needs a plain field to exist", () => {
    assert.equal(differs("x", "other", {}), false);
    assert.equal(matches("x", "other", {}), false);
  });

  it("compares against a plain field", () => {
    assert.equal(differs("x", "other", { other: "y" }), true);
    assert.equal(differs("x", "other", { other: "x" }), false);
    assert.equal(matches("x", "other", { other: "x" }), true);
  });

  it("counts a missing dotted field as different", () => {
    assert.equal(differs("x", "user.name", {}), true);
    assert.equal(matches("x", "user.name", {}), false);
  });

  it("compares against a dotted field", () => {
    const data = { user: { name: "x" } };
    assert.equal(differs("x", "user.name", data), false);
    assert.equal(matches("x", "user.name", data), true);
  });

  it("matches is the negation of differs for present fields", () => {
    const data = { a: "one", b: "", nested: { c: "two" } };
    for (const field of ["a", "b", "nested.c"]) {
      for (const value of ["one", "", "two", null]) {
        assert.equal(matches(value, field, data), !differs(value, field, data), `${field}=${value}`);
      }
    }
  });
});

describe("requiredWith", () => {
  it("fails when the value is empty and a dependency is filled", () => {
    assert.equal(requiredWith(null, "password", { password: "x" }), false);
    assert.equal(requiredWith("  ", "password", { password: "x" }), false);
  });

  it("passes when no dependency is filled", () => {
    assert.equal(requiredWith(null, "password", { password: "" }), true);
    assert.equal(requiredWith(null, "password,token", { other: "x" }), true);
  });

  it("passes when the value is present", () => {
    assert.equal(requiredWith("v", "password", { password: "x" }), true);
  });

  it("checks dotted dependencies", () => {
    assert.equal(requiredWith(null, "a.b", { a: { b: "x" } }), false);
    assert.equal(requiredWith(null, "a.b", { a: { b: [] } }), true);
  });

  it("treats \"0\" and 0 dependencies as empty", () => {
    assert.equal(requiredWith(null, "a", { a: "0" }), true);
    assert.equal(requiredWith(null, "a", { a: 0 }), true);
  });

  it("counts false as an empty value", () => {
    assert.equal(requiredWith(false, "a", { a: "x" }), false);
  });

  it("throws without fields or data", () => {
    assert.throws(() => requiredWith("v", null, { a: "1" }), isInvalidArgument);
    assert.throws(() => requiredWith("v", "", { a: "1" }), isInvalidArgument);
    assert.throws(() => requiredWith("v", "a", {}), isInvalidArgument);
    assert.throws(() => requiredWith(null, "a", undefined), isInvalidArgument);
  });
});

describe("requiredWithout", () => {
  it("passes when every listed field is filled", () => {
    assert.equal(requiredWithout(null, "id,email", { id: "1", email: "a@example.com" }), true);
  });

  it("fails as soon as one listed field is missing or empty", () => {
    assert.equal(requiredWithout(null, "id,email", { id: "1" }), false);
    assert.equal(requiredWithout(null, "id", { id: "", other: "x" }), false);
    assert.equal(requiredWithout(null, "user.id", { user: {} }), false);
    assert.equal(requiredWithout(null, "a", { a: "0" }), false);
  });

  it("passes when the value is present", () => {
    assert.equal(requiredWithout("v", "id,email", { id: "1" }), true);
  });

  it("throws without fields or data", () => {
    assert.throws(() => requiredWithout("v", undefined, { a: "1" }), isInvalidArgument);
    assert.throws(() => requiredWithout(null, "a", {}), isInvalidArgument);
  });
});

describe("equals / notEquals", () => {
  it("compares strictly", () => {
    assert.equal(equals("abc", "abc"), true);
    assert.equal(equals("abc", "ABC"), false);
    assert.equal(equals(null, ""), false);
    assert.equal(notEquals(null, ""), true);
    assert.equal(notEquals("abc", "abc"), false);
  });
});

describe("exactLength", () => {
  it("accepts any listed length", () => {
    assert.equal(exactLength("abc", "x,3"), true);
    assert.equal(exactLength("abc", "2,4"), false);
    assert.equal(exactLength("abc", "x"), false);
  });

  it("truncates fractional lengths", () => {
    assert.equal(exactLength("abcde", "5.5"), true);
    assert.equal(exactLength("abcde", "4.9"), false);
  });

  it("counts code points", () => {
    assert.equal(exactLength("h\u00e9llo", "5"), true);
    assert.equal(exactLength("\u{1F600}\u{1F600}", "2"), true);
  });

  it("treats a missing value as empty", () => {
    assert.equal(exactLength(null, "0"), true);
  });
});

describe("numeric comparisons", () => {
  it("fails non-numeric input", () => {
    assert.equal(greaterThan("abc", "5"), false);
    assert.equal(lessThan(null, "5"), false);
  });

  it("fails a non-numeric bound", () => {
    assert.equal(lessThan("4", "x"), false);
  });

  it("compares numbers, not strings", () => {
    assert.equal(greaterThan("10", "9"), true);
    assert.equal(greaterThan("5", "5"), false);
    assert.equal(greaterThanEqualTo("5", "5"), true);
    assert.equal(lessThan("4.5", "5"), true);
    assert.equal(lessThanEqualTo("5", "5"), true);
    assert.equal(lessThanEqualTo("5.1", "5"), false);
    assert.equal(greaterThan("1e3", "999"), true);
  });

  it("orders integers beyond 2^53 exactly", () => {
    assert.equal(greaterThan("9007199254740993", "9007199254740992"), true);
    assert.equal(lessThan("9007199254740992", "9007199254740993"), true);
    assert.equal(greaterThanEqualTo(" 9007199254740993", "+9007199254740993"), true);
    assert.equal(lessThanEqualTo("-9007199254740993", "-9007199254740992"), true);
  });
});

describe("maxLength / minLength", () => {
  it("compares against the character count", () => {
    assert.equal(maxLength("abcd", "4"), true);
    assert.equal(maxLength("abcde", "4"), false);
    assert.equal(minLength("ab", "3"), false);
    assert.equal(minLength("abc", "3"), true);
    assert.equal(maxLength(null, "0"), true);
  });

  it("fails a non-numeric bound", () => {
    assert.equal(maxLength("abc", "x"), false);
    assert.equal(minLength("abc", ""), false);
  });
});

describe("inList / notInList", () => {
  it("trims list entries before comparing", () => {
    assert.equal(inList("b", " a , b ,c"), true);
    assert.equal(inList("d", "a,b"), false);
  });

  it("does not trim the value", () => {
    assert.equal(inList(" b", "a, b"), false);
  });

  it("never finds a missing value", () => {
    assert.equal(inList(null, "a"), false);
    assert.equal(notInList(null, "a"), true);
  });

  it("notInList negates inList", () => {
    for (const value of ["a", "b", " c", "", null]) {
      assert.equal(notInList(value, "a, b,c"), !inList(value, "a, b,c"));
    }
  });
});

describe("required", () => {
  it("rejects absent and blank values", () => {
    assert.equal(required(null), false);
    assert.equal(required(undefined), false);
    assert.equal(required(NOT_FOUND), false);
    assert.equal(required("  "), false);
    assert.equal(required([]), false);
    assert.equal(required(false), false);
  });

  it("accepts filled values", () => {
    assert.equal(required(" x "), true);
    assert.equal(required(["a"]), true);
    assert.equal(required({}), true);
    assert.equal(required(0), true);
  });
});
