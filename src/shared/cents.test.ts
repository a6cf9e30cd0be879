import { Cents } from "./cents";

describe("Cents", () => {
  describe("fromDecimalString", () => {
    it("should parse whole and fractional amounts", () => {
      expect(Cents.fromDecimalString("12")?.value).toBe(1200);
      expect(Cents.fromDecimalString("12.5")?.value).toBe(1250);
      expect(Cents.fromDecimalString("12.05")?.value).toBe(1205);
      expect(Cents.fromDecimalString("-0.05")?.value).toBe(-5);
    });

    it("should reject more than two decimal places", () => {
      expect(Cents.fromDecimalString("1.005")).toBeNull();
    });

    it("should reject text that is not a decimal", () => {
      expect(Cents.fromDecimalString("")).toBeNull();
      expect(Cents.fromDecimalString("abc")).toBeNull();
      expect(Cents.fromDecimalString("1e3")).toBeNull();
    });
  });

  describe("toDecimalString", () => {
    it("should always print two decimals", () => {
      expect(Cents.create(1250).toDecimalString()).toBe("12.50");
      expect(Cents.create(7).toDecimalString()).toBe("0.07");
      expect(Cents.create(-5).toDecimalString()).toBe("-0.05");
    });
  });

  describe("fitsPrecision", () => {
    it("should accept up to six integer digits for numeric(8, 2)", () => {
      expect(Cents.fromDecimalString("999999.99")?.fitsPrecision(8)).toBe(true);
      expect(Cents.fromDecimalString("1000000")?.fitsPrecision(8)).toBe(false);
    });
  });

  it("should round float amounts to the nearest cent", () => {
    expect(Cents.fromFloat(19.9).value).toBe(1990);
    expect(Cents.fromFloat(0.1 + 0.2).toFloat()).toBe(0.3);
  });

  it("should multiply and add", () => {
    const total = Cents.fromFloat(2.5).multiply(3).add(Cents.create(25));
    expect(total.toDecimalString()).toBe("7.75");
  });
});
