import { describe, expect, it } from "@jest/globals";

import { LineBudget } from "../../src/text/budget.js";

describe("LineBudget", () => {
  const options = {
    columnWidth: 10,
    firstIndentWidth: 2,
    subsequentIndentWidth: 4,
  };

  it("starts with the first row's width after its indent", () => {
    const budget = new LineBudget(options);

    expect(budget.remaining).toBe(8);
    expect(budget.freshWidth).toBe(6);
  });

  it("charges columns without going below zero", () => {
    const budget = new LineBudget(options);

    budget.charge(3);
    expect(budget.remaining).toBe(5);

    budget.charge(20);
    expect(budget.remaining).toBe(0);
  });

  it("only overflows when strictly wider than the remaining width", () => {
    const budget = new LineBudget(options);
    budget.charge(3);

    expect(budget.wouldOverflow(5)).toBe(false);
    expect(budget.wouldOverflow(6)).toBe(true);
  });

  it("resets to the indent of the requested row", () => {
    const budget = new LineBudget(options);
    budget.charge(8);

    budget.reset(false);
    expect(budget.remaining).toBe(6);

    budget.reset(true);
    expect(budget.remaining).toBe(8);
  });
});
