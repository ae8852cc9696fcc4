import { EvalError } from './expr/errors';
import type { Magnitude, NumericBackend } from './numeric/types';
import type { CalcValue } from './types';
import { isReal, makeValue } from './value';

// Integer powers up to this bound are computed by repeated multiplication,
// which keeps results like i^2 exact.
const MAX_EXACT_POWER = 64;

const unitOf = (a: CalcValue, b: CalcValue) => a.unit || b.unit;

export function add(a: CalcValue, b: CalcValue): CalcValue {
  return makeValue(a.real.add(b.real), a.imaginary.add(b.imaginary), unitOf(a, b));
}

export function sub(a: CalcValue, b: CalcValue): CalcValue {
  return makeValue(a.real.sub(b.real), a.imaginary.sub(b.imaginary), unitOf(a, b));
}

export function neg(a: CalcValue): CalcValue {
  return makeValue(a.real.neg(), a.imaginary.neg(), a.unit);
}

export function mul(a: CalcValue, b: CalcValue): CalcValue {
  if (isReal(a) && isReal(b)) return makeValue(a.real.mul(b.real), a.imaginary, unitOf(a, b));
  return makeValue(
    a.real.mul(b.real).sub(a.imaginary.mul(b.imaginary)),
    a.real.mul(b.imaginary).add(a.imaginary.mul(b.real)),
    unitOf(a, b),
  );
}

export function div(a: CalcValue, b: CalcValue): CalcValue {
  if (b.real.isZero() && b.imaginary.isZero()) throw new EvalError('division_by_zero', 'Division by zero');
  if (isReal(b)) return makeValue(a.real.div(b.real), a.imaginary.div(b.real), unitOf(a, b));
  const d = b.real.mul(b.real).add(b.imaginary.mul(b.imaginary));
  return makeValue(
    a.real.mul(b.real).add(a.imaginary.mul(b.imaginary)).div(d),
    a.imaginary.mul(b.real).sub(a.real.mul(b.imaginary)).div(d),
    unitOf(a, b),
  );
}

export function modulus(a: CalcValue): Magnitude {
  if (isReal(a)) return a.real.abs();
  return a.real.mul(a.real).add(a.imaginary.mul(a.imaginary)).sqrt();
}

export function abs(a: CalcValue): CalcValue {
  return makeValue(modulus(a), a.imaginary.mul(0), a.unit);
}

function fromPolar(r: Magnitude, theta: Magnitude, unit: string): CalcValue {
  return makeValue(r.mul(theta.cos()), r.mul(theta.sin()), unit);
}

export function pow(a: CalcValue, b: CalcValue, backend: NumericBackend): CalcValue {
  if (!isReal(b)) throw new EvalError('unsupported_operation', 'Complex exponents are not supported');
  const p = b.real;
  if (isReal(a) && (!a.real.lt(0) || p.isInteger())) {
    return makeValue(a.real.pow(p), a.imaginary, a.unit);
  }
  if (p.isInteger() && !p.lt(0) && !p.gt(MAX_EXACT_POWER)) {
    let out = makeValue(backend.from(1), backend.from(0), a.unit);
    for (let k = 0; p.gt(k); k++) out = mul(out, a);
    return out;
  }
  const r = modulus(a);
  if (r.isZero()) return makeValue(backend.from(0), backend.from(0), a.unit);
  const theta = backend.atan2(a.imaginary, a.real);
  return fromPolar(r.pow(p), theta.mul(p), a.unit);
}

export function sqrt(a: CalcValue, backend: NumericBackend): CalcValue {
  if (isReal(a)) {
    return a.real.lt(0)
      ? makeValue(backend.from(0), a.real.neg().sqrt(), a.unit)
      : makeValue(a.real.sqrt(), a.imaginary, a.unit);
  }
  return pow(a, makeValue(backend.from(0.5), backend.from(0)), backend);
}

export function exp(a: CalcValue): CalcValue {
  if (isReal(a)) return makeValue(a.real.exp(), a.imaginary, '');
  return fromPolar(a.real.exp(), a.imaginary, '');
}

export function ln(a: CalcValue, backend: NumericBackend): CalcValue {
  if (isReal(a) && a.real.gt(0)) return makeValue(a.real.ln(), a.imaginary, '');
  return makeValue(modulus(a).ln(), backend.atan2(a.imaginary, a.real), '');
}
