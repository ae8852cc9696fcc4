import type { Magnitude } from './numeric/types';
import type { CalcValue, ComplexPart } from './types';

export function makeValue(real: Magnitude, imaginary: Magnitude, unit = ''): CalcValue {
  return { real, imaginary, unit };
}

export function component(value: CalcValue, part: ComplexPart): Magnitude {
  return part === 'real' ? value.real : value.imaginary;
}

/** Copy of `value` with one component replaced; the other and the unit are kept. */
export function withComponent(value: CalcValue, part: ComplexPart, m: Magnitude): CalcValue {
  return part === 'real'
    ? { real: m, imaginary: value.imaginary, unit: value.unit }
    : { real: value.real, imaginary: m, unit: value.unit };
}

export const isReal = (value: CalcValue): boolean => value.imaginary.isZero();
