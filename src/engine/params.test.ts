import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { RuleError } from "./errors.js";
import {
  charLength,
  isNumeric,
  isPlaceholder,
  parseFieldList,
  parseLengthList,
  parseTableSpec,
  parseValueList,
  toInteger,
  toNumber,
} from "./params.js";

function isRuleSpecError(err: unknown): boolean {
  return err instanceof RuleError && err.code === "INVALID_RULE_SPEC";
}

describe("numeric parsing", () => {
  it("accepts integers, decimals and exponents", () => {
    for (const v of ["5", "-3.2", ".5", "1e3", " 7"]) {
      assert.equal(isNumeric(v), true, v);
    }
  });

  it("rejects everything else", () => {
    for (const v of ["abc", "", "5a", "0x1A"]) {
      assert.equal(isNumeric(v), false, v);
    }
    assert.equal(isNumeric(null), false);
    assert.equal(toNumber("abc"), null);
    assert.equal(toNumber("2.5"), 2.5);
  });

  it("parses integer literals exactly", () => {
    assert.equal(toInteger(" +9007199254740993 "), 9007199254740993n);
    assert.equal(toInteger("-12"), -12n);
    assert.equal(toInteger("1.0"), null);
    assert.equal(toInteger("1e3"), null);
    assert.equal(toInteger(undefined), null);
  });
});

describe("list parsing", () => {
  it("trims value list entries", () => {
    assert.deepEqual(parseValueList(" a , b ,c"), ["a", "b", "c"]);
  });

  it("drops blank field names", () => {
    assert.deepEqual(parseFieldList("a, ,b.c"), ["a", "b.c"]);
  });

  it("keeps only numeric lengths", () => {
    assert.deepEqual(parseLengthList("5,x,12"), [5, 12]);
  });

  it("truncates fractional lengths", () => {
    assert.deepEqual(parseLengthList("5.5, 7.0"), [5, 7]);
  });

  it("counts code points", () => {
    assert.equal(charLength("\u{1F600}\u{1F600}"), 2);
    assert.equal(charLength(null), 0);
  });
});

describe("parseTableSpec", () => {
  it("splits table and column", () => {
    assert.deepEqual(parseTableSpec("is_unique", "users.email", "exclude"), {
      table: "users",
      column: "email",
      filter: { kind: "none" },
    });
  });

  it("builds the requested filter kind", () => {
    assert.deepEqual(parseTableSpec("is_unique", "users.email,id,5", "exclude").filter, {
      kind: "exclude",
      column: "id",
      value: "5",
    });
    assert.deepEqual(parseTableSpec("is_not_unique", "menu.id,active,1", "where").filter, {
      kind: "where",
      column: "active",
      value: "1",
    });
  });

  it("treats a \"0\" filter value as no filter", () => {
    assert.deepEqual(parseTableSpec("is_unique", "users.email,id,0", "exclude").filter, {
      kind: "none",
    });
    assert.deepEqual(parseTableSpec("is_not_unique", "menu.id,active,0", "where").filter, {
      kind: "none",
    });
  });

  it("treats an unsubstituted placeholder as no filter", () => {
    assert.deepEqual(parseTableSpec("is_unique", "users.email,id,{id}", "exclude").filter, {
      kind: "none",
    });
  });

  it("rejects specs without a usable table and column", () => {
    for (const spec of ["users", "users.", ".email", "users.email.extra", "users;drop.x", "users.email,bad col,1"]) {
      assert.throws(() => parseTableSpec("is_unique", spec, "exclude"), isRuleSpecError, spec);
    }
  });

  it("recognises placeholders", () => {
    assert.equal(isPlaceholder("{id}"), true);
    assert.equal(isPlaceholder("{ id }"), false);
    assert.equal(isPlaceholder("id"), false);
  });
});
