export class ReplicaCount {
  private constructor(private readonly _value: number) { }

  get value(): number {
    return this._value;
  }

  static create(value: number): ReplicaCount {
    if (!Number.isSafeInteger(value)) {
      throw new Error(`Replica count must be an integer, got ${value}`);
    }
    if (value < 0) {
      throw new Error('Replica count cannot be negative');
    }
    return new ReplicaCount(value);
  }

  /** Multiplicative step, rounded up. The product is rounded to 9 decimals first to drop float noise. */
  scaleBy(factor: number): ReplicaCount {
    const product = Math.round(this._value * factor * 1e9) / 1e9;
    return new ReplicaCount(Math.ceil(product));
  }

  /** Additive step down, floored at zero. */
  minus(step: number): ReplicaCount {
    return new ReplicaCount(Math.max(0, this._value - step));
  }

  clamp(min: number, max: number): ReplicaCount {
    return new ReplicaCount(Math.max(min, Math.min(max, this._value)));
  }

  equals(other: ReplicaCount): boolean {
    return this._value === other._value;
  }

  greaterThan(other: ReplicaCount): boolean {
    return this._value > other._value;
  }

  lessThan(other: ReplicaCount): boolean {
    return this._value < other._value;
  }

  toString(): string {
    return `${this._value} replica${this._value === 1 ? '' : 's'}`;
  }
}
