import { dayOf, parseDay, parseInteger, parseNumber, parseQuantity } from "../parse";

describe("parseNumber", () => {
  it("parses decimal cells", () => {
    expect(parseNumber("10.5", 0)).toBe(10.5);
    expect(parseNumber(" 4 ", 0)).toBe(4);
    expect(parseNumber("-3", 0)).toBe(-3);
  });

  it("falls back on empty, missing or non-numeric values", () => {
    expect(parseNumber("", 3)).toBe(3);
    expect(parseNumber(undefined, 2)).toBe(2);
    expect(parseNumber("abc", 7)).toBe(7);
    expect(parseNumber("12kr", 0)).toBe(0);
  });
});

describe("parseInteger", () => {
  it("accepts whole numbers only", () => {
    expect(parseInteger("42", 1)).toBe(42);
    expect(parseInteger("2.5", 1)).toBe(1);
  });
});

describe("parseDay", () => {
  it("parses ISO calendar dates", () => {
    expect(parseDay("2024-07-01", 0)).toBe(Date.UTC(2024, 6, 1));
  });

  it("falls back on impossible or differently formatted dates", () => {
    expect(parseDay("2024-02-30", -1)).toBe(-1);
    expect(parseDay("07/01/2024", 5)).toBe(5);
    expect(parseDay("", 9)).toBe(9);
  });
});

describe("dayOf", () => {
  it("drops the time of day", () => {
    expect(dayOf(new Date(2024, 6, 1, 23, 59))).toBe(Date.UTC(2024, 6, 1));
  });
});

describe("parseQuantity", () => {
  it("keeps integers from numbers and digit strings", () => {
    expect(parseQuantity(3)).toBe(3);
    expect(parseQuantity("4")).toBe(4);
    expect(parseQuantity("-2")).toBe(-2);
  });

  it("defaults to 1 for anything else", () => {
    expect(parseQuantity(undefined)).toBe(1);
    expect(parseQuantity(2.5)).toBe(1);
    expect(parseQuantity("2.5")).toBe(1);
    expect(parseQuantity("two")).toBe(1);
  });
});
