const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

export class Cents {
  readonly value: number;

  private constructor(value: number) {
    this.value = value;
  }

  public static fromFloat(value: number): Cents {
    return new Cents(Math.round(value * 100));
  }

  public static create(valueInCents: number): Cents {
    return new Cents(Math.round(valueInCents));
  }

  /**
   * Parses a decimal with at most two fractional digits ("12", "12.5",
   * "-0.05"). Returns null for anything else.
   */
  public static fromDecimalString(value: string): Cents | null {
    const match = DECIMAL_PATTERN.exec(value.trim());
    if (!match) {
      return null;
    }
    const [, sign, units, fraction = ""] = match;
    const cents = Number(units) * 100 + Number(fraction.padEnd(2, "0"));
    return new Cents(sign ? -cents : cents);
  }

  public toFloat(): number {
    return this.value / 100.0;
  }

  public toDecimalString(): string {
    const absolute = Math.abs(this.value);
    const units = Math.floor(absolute / 100);
    const fraction = String(absolute % 100).padStart(2, "0");
    return `${this.value < 0 ? "-" : ""}${units}.${fraction}`;
  }

  // numeric(p, 2) holds p - 2 integer digits, i.e. p digits of cents.
  public fitsPrecision(precision: number): boolean {
    return Math.abs(this.value) < 10 ** precision;
  }

  public multiply(factor: number): Cents {
    return Cents.create(this.value * factor);
  }

  public add(other: Cents): Cents {
    return new Cents(this.value + other.value);
  }
}
