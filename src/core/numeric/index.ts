import { createDecimalBackend } from './decimal';
import { nativeBackend } from './native';
import type { BackendName, NumericBackend } from './types';

export { NativeMagnitude, nativeBackend } from './native';
export { DecimalMagnitude, createDecimalBackend } from './decimal';
export type { BackendName, Magnitude, NumericBackend, Operand } from './types';

export function createBackend(opts: { backend: BackendName; precision: number }): NumericBackend {
  switch (opts.backend) {
    case 'native':
      return nativeBackend;
    case 'decimal':
      return createDecimalBackend(opts.precision);
  }
}
