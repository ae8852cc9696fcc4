import { estimate, RENDER_DIGITS } from './rounding';
import type { CalcValue, ComplexPart } from './types';
import { component } from './value';

function render(value: CalcValue, part: ComplexPart): string {
  const m = component(value, part);
  if (m.isZero()) return '0';
  const estimated = estimate(value, part);
  if (estimated === undefined) return m.toSignificant(RENDER_DIGITS);
  // radical estimates carry no sign
  return m.lt(0) && estimated.startsWith('√') ? `-${estimated}` : estimated;
}

/**
 * Human-readable form of a value, eg. `1/2`, `3 - 2i`, `π/2 rad`. Each
 * component prefers its estimate over the plain rendering.
 */
export function formatValue(value: CalcValue): string {
  const real = render(value, 'real');
  const imaginary = render(value, 'imaginary');

  let out = real;
  if (imaginary !== '0') {
    const negative = imaginary.startsWith('-');
    // "-1 - 1/3" is -(1 + 1/3)
    const magnitude = negative ? imaginary.slice(1).replace(' - ', ' + ') : imaginary;
    const coefficient = magnitude === '1' ? '' : magnitude.includes(' ') ? `(${magnitude})` : magnitude;
    out =
      real === '0'
        ? `${negative ? '-' : ''}${coefficient}i`
        : `${real} ${negative ? '-' : '+'} ${coefficient}i`;
  }
  return value.unit ? `${out} ${value.unit}` : out;
}
