import * as complex from '../complex';
import type { Magnitude, NumericBackend } from '../numeric/types';
import type { AngleUnit, CalcValue } from '../types';
import { isReal, makeValue } from '../value';
import { EvalError } from './errors';

export interface BuiltinCtx {
  backend: NumericBackend;
  angleUnit: AngleUnit;
}

export type Builtin = {
  /** Inclusive [min, max] argument count */
  arity: [number, number];
  apply: (args: CalcValue[], ctx: BuiltinCtx) => CalcValue;
};

function realArg(name: string, v: CalcValue): Magnitude {
  if (!isReal(v)) throw new EvalError('unsupported_operation', `${name}() takes a real argument`);
  return v.real;
}

const real = (m: Magnitude, ctx: BuiltinCtx, unit = '') => makeValue(m, ctx.backend.from(0), unit);

// Tagged arguments keep their own unit; untagged ones follow the session.
function toRadians(name: string, v: CalcValue, ctx: BuiltinCtx): Magnitude {
  const x = realArg(name, v);
  const unit = v.unit || (ctx.angleUnit === 'degrees' ? 'deg' : 'rad');
  return unit === 'deg' ? x.mul(ctx.backend.pi()).div(180) : x;
}

function fromRadians(x: Magnitude, ctx: BuiltinCtx): Magnitude {
  return ctx.angleUnit === 'degrees' ? x.mul(180).div(ctx.backend.pi()) : x;
}

const trig = (name: string, f: (m: Magnitude) => Magnitude): Builtin => ({
  arity: [1, 1],
  apply: ([x], ctx) => real(f(toRadians(name, x, ctx)), ctx),
});

const inverseTrig = (name: string, f: (m: Magnitude) => Magnitude): Builtin => ({
  arity: [1, 1],
  apply: ([x], ctx) => real(fromRadians(f(realArg(name, x)), ctx), ctx),
});

// Rounding applies to both components.
const componentwise = (f: (m: Magnitude) => Magnitude): Builtin => ({
  arity: [1, 1],
  apply: ([x]) => makeValue(f(x.real), f(x.imaginary), x.unit),
});

const sqrt: Builtin = { arity: [1, 1], apply: ([x], ctx) => complex.sqrt(x, ctx.backend) };

export const BUILTINS = new Map<string, Builtin>([
  ['abs', { arity: [1, 1], apply: ([x]) => complex.abs(x) }],
  ['sqrt', sqrt],
  ['√', sqrt],
  ['cbrt', { arity: [1, 1], apply: ([x], ctx) => real(realArg('cbrt', x).cbrt(), ctx) }],
  ['exp', { arity: [1, 1], apply: ([x]) => complex.exp(x) }],
  ['ln', { arity: [1, 1], apply: ([x], ctx) => complex.ln(x, ctx.backend) }],
  [
    'log',
    {
      arity: [1, 2],
      apply: (args, ctx) => {
        const x = realArg('log', args[0]);
        if (args.length === 1) return real(x.log10(), ctx);
        return real(x.ln().div(realArg('log', args[1]).ln()), ctx);
      },
    },
  ],
  ['sin', trig('sin', (m) => m.sin())],
  ['cos', trig('cos', (m) => m.cos())],
  ['tan', trig('tan', (m) => m.tan())],
  ['asin', inverseTrig('asin', (m) => m.asin())],
  ['acos', inverseTrig('acos', (m) => m.acos())],
  ['atan', inverseTrig('atan', (m) => m.atan())],
  ['floor', componentwise((m) => m.floor())],
  ['ceil', componentwise((m) => m.ceil())],
  ['round', componentwise((m) => m.round())],
  ['trunc', componentwise((m) => m.trunc())],
  ['frac', componentwise((m) => m.fract())],
  ['re', { arity: [1, 1], apply: ([x], ctx) => real(x.real, ctx, x.unit) }],
  ['im', { arity: [1, 1], apply: ([x], ctx) => real(x.imaginary, ctx, x.unit) }],
]);

export const BUILTIN_NAMES: ReadonlySet<string> = new Set(BUILTINS.keys());

export function builtinConstant(name: string, backend: NumericBackend): CalcValue | undefined {
  const zero = backend.from(0);
  switch (name) {
    case 'pi':
    case 'π':
      return makeValue(backend.pi(), zero);
    case 'tau':
    case 'τ':
      return makeValue(backend.pi().mul(2), zero);
    case 'e':
      return makeValue(backend.e(), zero);
    case 'phi':
    case 'ϕ':
      return makeValue(backend.from(5).sqrt().add(1).div(2), zero);
    case 'i':
      return makeValue(zero, backend.from(1));
    default:
      return undefined;
  }
}
