import Decimal from 'decimal.js';
import type { Magnitude, NumericBackend, Operand } from './types';

export class DecimalMagnitude implements Magnitude {
  constructor(
    readonly value: Decimal,
    private readonly Ctor: Decimal.Constructor,
  ) {}

  private dec(x: Operand): Decimal {
    if (x instanceof DecimalMagnitude) return x.value;
    return new this.Ctor(typeof x === 'number' ? x : x.toNumber());
  }

  private wrap(v: Decimal): DecimalMagnitude {
    return new DecimalMagnitude(v, this.Ctor);
  }

  add(other: Operand) {
    return this.wrap(this.value.add(this.dec(other)));
  }
  sub(other: Operand) {
    return this.wrap(this.value.sub(this.dec(other)));
  }
  mul(other: Operand) {
    return this.wrap(this.value.mul(this.dec(other)));
  }
  div(other: Operand) {
    return this.wrap(this.value.div(this.dec(other)));
  }
  pow(other: Operand) {
    return this.wrap(this.value.pow(this.dec(other)));
  }
  neg() {
    return this.wrap(this.value.neg());
  }
  abs() {
    return this.wrap(this.value.abs());
  }
  fract() {
    return this.wrap(this.value.sub(this.value.trunc()));
  }
  trunc() {
    return this.wrap(this.value.trunc());
  }
  floor() {
    return this.wrap(this.value.floor());
  }
  ceil() {
    return this.wrap(this.value.ceil());
  }
  round() {
    // half away from zero, like Math.round on positives
    return this.wrap(this.value.toDecimalPlaces(0, Decimal.ROUND_HALF_UP));
  }
  log10() {
    return this.wrap(this.value.log(10));
  }
  ln() {
    return this.wrap(this.value.ln());
  }
  exp() {
    return this.wrap(this.value.exp());
  }
  sqrt() {
    return this.wrap(this.value.sqrt());
  }
  cbrt() {
    return this.wrap(this.value.cbrt());
  }
  sin() {
    return this.wrap(this.value.sin());
  }
  cos() {
    return this.wrap(this.value.cos());
  }
  tan() {
    return this.wrap(this.value.tan());
  }
  asin() {
    return this.wrap(this.value.asin());
  }
  acos() {
    return this.wrap(this.value.acos());
  }
  atan() {
    return this.wrap(this.value.atan());
  }

  cmp(other: Operand) {
    return this.value.cmp(this.dec(other));
  }
  lt(other: Operand) {
    return this.value.lt(this.dec(other));
  }
  gt(other: Operand) {
    return this.value.gt(this.dec(other));
  }
  eq(other: Operand) {
    return this.value.eq(this.dec(other));
  }
  isZero() {
    return this.value.isZero();
  }
  isInteger() {
    return this.value.isInteger();
  }
  isFinite() {
    return this.value.isFinite();
  }

  toNumber() {
    return this.value.toNumber();
  }
  toString() {
    return this.value.toFixed();
  }
  toSignificant(digits: number) {
    if (!this.value.isFinite()) return this.value.toString();
    return this.value.toSignificantDigits(digits).toString();
  }
}

export function createDecimalBackend(precision: number): NumericBackend {
  const Ctor = Decimal.clone({ precision, rounding: Decimal.ROUND_HALF_EVEN });
  const wrap = (v: Decimal) => new DecimalMagnitude(v, Ctor);
  const dec = (m: Magnitude) => (m instanceof DecimalMagnitude ? m.value : new Ctor(m.toNumber()));
  return {
    name: 'decimal',
    from: (value) => wrap(new Ctor(value)),
    pi: () => wrap(Ctor.acos(-1)),
    e: () => wrap(Ctor.exp(1)),
    atan2: (y, x) => wrap(Ctor.atan2(dec(y), dec(x))),
  };
}
