import { describe, expect, it } from "vitest";
import { ConditionError } from "../src/errors.js";
import { compileCondition, type OutputLookup } from "../src/graph/condition.js";
import type { TaskData } from "../src/graph/types.js";

function outputs(data: Record<string, TaskData>): OutputLookup {
  return (id) => data[id];
}

describe("compileCondition", () => {
  it("collects the task ids an expression reads", () => {
    const cond = compileCondition("a.score >= 0.8 && !b.blocked || a.force");
    expect(cond.roots).toEqual(["a", "b"]);
  });

  it("evaluates comparisons and logic", () => {
    const cond = compileCondition("a.score >= 0.8 && !b.blocked");
    expect(cond.evaluate(outputs({ a: { score: 0.9 }, b: { blocked: false } }))).toBe(true);
    expect(cond.evaluate(outputs({ a: { score: 0.5 }, b: { blocked: false } }))).toBe(false);
    expect(cond.evaluate(outputs({ a: { score: 0.9 }, b: { blocked: true } }))).toBe(false);
  });

  it("treats missing values as undefined", () => {
    const lookup = outputs({ a: {} });
    expect(compileCondition("a.missing == null").evaluate(lookup)).toBe(false);
    expect(compileCondition("!a.missing").evaluate(lookup)).toBe(true);
    expect(compileCondition("ghost.value").evaluate(lookup)).toBe(false);
    expect(compileCondition("a.deep.deeper").evaluate(lookup)).toBe(false);
  });

  it("compares strictly", () => {
    const lookup = outputs({ a: { n: 1 } });
    expect(compileCondition('a.n == "1"').evaluate(lookup)).toBe(false);
    expect(compileCondition("a.n === 1").evaluate(lookup)).toBe(true);
    expect(compileCondition("a.n != 2").evaluate(lookup)).toBe(true);
  });

  it("orders only numbers with numbers and strings with strings", () => {
    const lookup = outputs({ a: { n: 3, s: "apple" } });
    expect(compileCondition('a.n > "0"').evaluate(lookup)).toBe(false);
    expect(compileCondition("a.n > -1").evaluate(lookup)).toBe(true);
    expect(compileCondition("a.s < 'banana'").evaluate(lookup)).toBe(true);
    expect(compileCondition("a.s <= 1").evaluate(lookup)).toBe(false);
  });

  it("indexes into arrays and accepts hyphenated ids", () => {
    const lookup = outputs({ "fetch-data": { items: [{ name: "x" }] } });
    expect(compileCondition("fetch-data.items.0.name == 'x'").evaluate(lookup)).toBe(true);
  });

  it("honours parentheses", () => {
    const lookup = outputs({ a: { x: false }, b: { y: true } });
    expect(compileCondition("(a.x || b.y) && true").evaluate(lookup)).toBe(true);
    expect(compileCondition("a.x || b.y && false").evaluate(lookup)).toBe(false);
  });

  it("coerces a bare value by truthiness", () => {
    expect(compileCondition("a.count").evaluate(outputs({ a: { count: 0 } }))).toBe(false);
    expect(compileCondition("a.label").evaluate(outputs({ a: { label: "ok" } }))).toBe(true);
  });

  it("does not read inherited properties", () => {
    expect(compileCondition("a.toString").evaluate(outputs({ a: {} }))).toBe(false);
  });

  describe("syntax errors", () => {
    const cases: Array<[string, string]> = [
      ["", "Invalid condition (): expression is empty"],
      ["a.x @ 1", 'Invalid condition (a.x @ 1): unexpected character "@" at position 4'],
      ["(a.x 1", 'Invalid condition ((a.x 1): missing ")" for "(" at position 0'],
      ["a.x 'y'", "Invalid condition (a.x 'y'): unexpected token at position 4"],
      ["a.x == 'abc", "Invalid condition (a.x == 'abc): unterminated string starting at position 7"],
      ["a.x == 1 == 2", "Invalid condition (a.x == 1 == 2): unexpected token at position 9"],
      ["a.", "Invalid condition (a.): unexpected end of expression"],
    ];

    for (const [source, message] of cases) {
      it(`rejects ${JSON.stringify(source)}`, () => {
        expect(() => compileCondition(source)).toThrow(ConditionError);
        expect(() => compileCondition(source)).toThrow(message);
      });
    }
  });
});
