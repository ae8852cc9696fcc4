export type BackendName = 'native' | 'decimal';

/** Either a magnitude of any backend or a plain JS number. */
export type Operand = Magnitude | number;

/**
 * Real-number value of one backend. Binary operations accept magnitudes of
 * either backend, converting the other operand into this one.
 */
export interface Magnitude {
  add(other: Operand): Magnitude;
  sub(other: Operand): Magnitude;
  mul(other: Operand): Magnitude;
  div(other: Operand): Magnitude;
  pow(other: Operand): Magnitude;
  neg(): Magnitude;
  abs(): Magnitude;
  /** Fractional part, carrying the sign of the value. */
  fract(): Magnitude;
  trunc(): Magnitude;
  floor(): Magnitude;
  ceil(): Magnitude;
  round(): Magnitude;
  log10(): Magnitude;
  ln(): Magnitude;
  exp(): Magnitude;
  sqrt(): Magnitude;
  cbrt(): Magnitude;
  sin(): Magnitude;
  cos(): Magnitude;
  tan(): Magnitude;
  asin(): Magnitude;
  acos(): Magnitude;
  atan(): Magnitude;

  cmp(other: Operand): number;
  lt(other: Operand): boolean;
  gt(other: Operand): boolean;
  eq(other: Operand): boolean;
  isZero(): boolean;
  isInteger(): boolean;
  isFinite(): boolean;

  toNumber(): number;
  /** Plain positional notation, never exponential for finite values below 1e21. */
  toString(): string;
  /** Rounded to `digits` significant digits, trailing zeroes dropped. */
  toSignificant(digits: number): string;
}

export interface NumericBackend {
  readonly name: BackendName;
  from(value: number | string): Magnitude;
  pi(): Magnitude;
  e(): Magnitude;
  atan2(y: Magnitude, x: Magnitude): Magnitude;
}
