import { trimZeroes } from '../format';
import type { Magnitude, NumericBackend, Operand } from './types';

const num = (x: Operand): number => (typeof x === 'number' ? x : x.toNumber());

export class NativeMagnitude implements Magnitude {
  constructor(readonly value: number) {}

  add(other: Operand) {
    return new NativeMagnitude(this.value + num(other));
  }
  sub(other: Operand) {
    return new NativeMagnitude(this.value - num(other));
  }
  mul(other: Operand) {
    return new NativeMagnitude(this.value * num(other));
  }
  div(other: Operand) {
    return new NativeMagnitude(this.value / num(other));
  }
  pow(other: Operand) {
    return new NativeMagnitude(Math.pow(this.value, num(other)));
  }
  neg() {
    return new NativeMagnitude(-this.value);
  }
  abs() {
    return new NativeMagnitude(Math.abs(this.value));
  }
  fract() {
    return new NativeMagnitude(this.value % 1);
  }
  trunc() {
    return new NativeMagnitude(Math.trunc(this.value));
  }
  floor() {
    return new NativeMagnitude(Math.floor(this.value));
  }
  ceil() {
    return new NativeMagnitude(Math.ceil(this.value));
  }
  round() {
    return new NativeMagnitude(Math.round(this.value));
  }
  log10() {
    return new NativeMagnitude(Math.log10(this.value));
  }
  ln() {
    return new NativeMagnitude(Math.log(this.value));
  }
  exp() {
    return new NativeMagnitude(Math.exp(this.value));
  }
  sqrt() {
    return new NativeMagnitude(Math.sqrt(this.value));
  }
  cbrt() {
    return new NativeMagnitude(Math.cbrt(this.value));
  }
  sin() {
    return new NativeMagnitude(Math.sin(this.value));
  }
  cos() {
    return new NativeMagnitude(Math.cos(this.value));
  }
  tan() {
    return new NativeMagnitude(Math.tan(this.value));
  }
  asin() {
    return new NativeMagnitude(Math.asin(this.value));
  }
  acos() {
    return new NativeMagnitude(Math.acos(this.value));
  }
  atan() {
    return new NativeMagnitude(Math.atan(this.value));
  }

  cmp(other: Operand): number {
    const o = num(other);
    return this.value < o ? -1 : this.value > o ? 1 : 0;
  }
  lt(other: Operand) {
    return this.value < num(other);
  }
  gt(other: Operand) {
    return this.value > num(other);
  }
  eq(other: Operand) {
    return this.value === num(other);
  }
  isZero() {
    return this.value === 0;
  }
  isInteger() {
    return Number.isInteger(this.value);
  }
  isFinite() {
    return Number.isFinite(this.value);
  }

  toNumber() {
    return this.value;
  }
  toString() {
    const s = String(this.value);
    // String() switches to exponent form below 1e-6
    if (!s.includes('e') || Math.abs(this.value) >= 1e21) return s;
    return trimZeroes(this.value.toFixed(20));
  }
  toSignificant(digits: number) {
    if (!Number.isFinite(this.value)) return String(this.value);
    return String(Number(this.value.toPrecision(digits)));
  }
}

export const nativeBackend: NumericBackend = {
  name: 'native',
  from: (value) => new NativeMagnitude(typeof value === 'number' ? value : Number(value)),
  pi: () => new NativeMagnitude(Math.PI),
  e: () => new NativeMagnitude(Math.E),
  atan2: (y, x) => new NativeMagnitude(Math.atan2(y.toNumber(), x.toNumber())),
};
