import { trimZeroes } from './format';
import type { Magnitude } from './numeric/types';
import type { CalcValue, ComplexPart } from './types';
import { component, withComponent } from './value';

export { trimZeroes };

/** Significant digits used when matching rendered values. */
export const RENDER_DIGITS = 10;

// First eight characters of a value rendered to ten significant digits.
const CONSTANTS = new Map<string, string>([
  ['3.141592', 'π'],
  ['6.283185', '2π'],
  ['2.718281', 'e'],
  ['1.618033', 'ϕ'],
  ['1.414213', '√2'],
  ['0.707106', '√2/2'],
  ['0.866025', '√3/2'],
  ['0.523598', 'π/6'],
  ['0.785398', 'π/4'],
  ['1.047197', 'π/3'],
  ['1.570796', 'π/2'],
  ['2.094395', '2π/3'],
  ['2.356194', '3π/4'],
  ['2.617993', '5π/6'],
  ['3.665191', '7π/6'],
  ['3.926990', '5π/4'],
  ['4.188790', '4π/3'],
  ['4.712388', '3π/2'],
  ['5.235987', '5π/3'],
  ['5.497787', '7π/4'],
  ['5.759586', '11π/6'],
]);

const THIRDS: Record<string, string | undefined> = {
  '33333': '1/3',
  '66666': '2/3',
};

/**
 * Guesses a short exact-looking form for one component of `input`: a
 * fraction, a named constant, a radical or a rounded integer. Returns
 * undefined for integers and when nothing applies.
 */
export function estimate(input: CalcValue, part: ComplexPart): string | undefined {
  const value = component(input, part);
  const rendered = value.toSignificant(RENDER_DIGITS);
  const fract = value.fract().abs();
  const integer = value.trunc();

  if (fract.isZero()) return undefined;

  const absRendered = rendered.replace(/^-+/, '');
  const sign = value.lt(0) ? '-' : '';

  // eg. 0.5 to 1/2
  if (absRendered.startsWith('0.5')) {
    if (absRendered.length === 3 || (absRendered.length > 6 && absRendered.slice(3, 5) === '00')) {
      return `${sign}1/2`;
    }
  }

  // eg. 1.33333333 to 1 + 1/3
  const fractRendered = fract.toString();
  if (fractRendered.length >= 7) {
    const fraction = THIRDS[fractRendered.slice(2, 7)];
    if (fraction) {
      if (integer.isZero()) return `${sign}${fraction}`;
      const explicitSign = sign === '' ? '+' : '-';
      return `${trimZeroes(integer.toString())} ${explicitSign} ${fraction}`;
    }
  }

  // eg. π, 2π/3, √2
  if (absRendered.length >= 8) {
    const constant = CONSTANTS.get(absRendered.slice(0, 8));
    if (constant) return `${sign}${constant}`;
  }

  // If the square is (close to) an integer whose root is not, show it as a root.
  const squared = value.mul(value);
  const roundedSquare = roundMagnitude(squared) ?? squared;
  if (!roundedSquare.sqrt().fract().isZero() && roundedSquare.fract().isZero()) {
    return `√${roundedSquare.toString()}`;
  }

  // eg. 0.99999 to 1
  const rounded = round(input, part);
  if (!rounded) return undefined;
  const roundedStr = component(rounded, part).toString();
  return trimZeroes(roundedStr === '-0' ? '0' : roundedStr);
}

/**
 * Snaps a value that sits within floating-point noise of an integer onto
 * that integer. Values whose integer part is zero need to be much closer
 * to be truncated, so small fractions survive.
 */
export function roundMagnitude(value: Magnitude): Magnitude | undefined {
  const sign = value.lt(0) ? -1 : 1;
  const fract = value.abs().fract();
  const integer = value.abs().trunc();

  const [limitFloor, limitCeil] = integer.isZero() ? [-8, -5] : [-4, -6];

  if (fract.log10().lt(limitFloor)) return integer.mul(sign);
  if (fract.neg().add(1).log10().lt(limitCeil)) return value.abs().ceil().mul(sign);
  return undefined;
}

/** `roundMagnitude` applied to one component; the other component and the unit are kept. */
export function round(input: CalcValue, part: ComplexPart): CalcValue | undefined {
  const rounded = roundMagnitude(component(input, part));
  return rounded && withComponent(input, part, rounded);
}
