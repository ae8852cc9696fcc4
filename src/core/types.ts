// Core contracts shared by the interpreter and the estimation engine
import type { Magnitude } from './numeric/types';

export type AngleUnit = 'radians' | 'degrees';

/** Selects one half of a complex value. */
export type ComplexPart = 'real' | 'imaginary';

/**
 * Evaluated number. `unit` stays empty unless the source tagged the value
 * with a unit suffix; nothing at this layer does arithmetic on it.
 */
export interface CalcValue {
  real: Magnitude;
  imaginary: Magnitude;
  unit: string;
}
