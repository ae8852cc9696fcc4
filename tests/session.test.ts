import { describe, expect, it, vi } from 'vitest';
import { calculate } from '../src';
import { interpret } from '../src/core/expr/interp';
import { parse, ParserContext } from '../src/core/expr/parser';
import type { EngineOptionsInput } from '../src/core/config';
import { createLogger } from '../src/core/log';
import { isErr, isOk, type Result } from '../src/core/result';
import type { CalcValue } from '../src/core/types';

const session = (opts: EngineOptionsInput = {}) => new ParserContext(opts, { env: {} });

function valueOf(r: Result<CalcValue | undefined>): CalcValue {
  if (!isOk(r)) throw new Error(`expected ok, got ${r.code}: ${r.msg}`);
  if (!r.v) throw new Error('expected a value');
  return r.v;
}

const evalReal = (src: string, ctx = session()) => valueOf(parse(ctx, src)).real.toNumber();

function failureReason(r: Result<unknown>): unknown {
  if (!isErr(r)) throw new Error('expected an error');
  expect(r.code).toBe('EvaluationFailure');
  return r.data;
}

const display = (src: string, ctx = session()) => {
  const r = calculate(src, undefined, ctx);
  if (!isOk(r)) throw new Error(`expected ok, got ${r.code}: ${r.msg}`);
  return r.v.display;
};

describe('arithmetic', () => {
  it('follows operator precedence', () => {
    expect(evalReal('2+3*4')).toBe(14);
    expect(evalReal('2^3^2')).toBe(512);
    expect(evalReal('-2^2')).toBe(-4);
    expect(evalReal('10/4')).toBe(2.5);
    expect(evalReal('(2+3)*4')).toBe(20);
  });

  it('evaluates absolute value bars', () => {
    expect(evalReal('|-5|')).toBe(5);
  });

  it('reports division by zero', () => {
    expect(failureReason(parse(session(), '1/0'))).toEqual({ reason: 'division_by_zero' });
  });

  it('reports trees too deep to evaluate as failures', () => {
    const src = `${'1 + '.repeat(200_000)}1`;
    expect(failureReason(parse(session(), src))).toEqual({ reason: 'max_depth' });
  });

  it('reports undefined variables', () => {
    expect(failureReason(parse(session(), 'y + 1'))).toEqual({ reason: 'undefined_variable' });
  });
});

describe('complex values', () => {
  it('takes square roots of negative numbers', () => {
    const v = valueOf(parse(session(), 'sqrt(-4)'));
    expect(v.real.toNumber()).toBe(0);
    expect(v.imaginary.toNumber()).toBe(2);
  });

  it('squares i exactly', () => {
    const v = valueOf(parse(session(), 'i^2'));
    expect(v.real.toNumber()).toBe(-1);
    expect(v.imaginary.toNumber()).toBe(0);
  });

  it('multiplies complex numbers', () => {
    const v = valueOf(parse(session(), '(1 + 2i) * (3 - i)'));
    expect(v.real.toNumber()).toBe(5);
    expect(v.imaginary.toNumber()).toBe(5);
  });
});

describe('variables', () => {
  it('reads implicit multiplication with a declared variable', () => {
    const ctx = session();
    expect(evalReal('x = 3', ctx)).toBe(3);
    expect(evalReal('2x', ctx)).toBe(6);
  });

  it('evaluates the right-hand side before assigning', () => {
    const ctx = session();
    parse(ctx, 'x = 3');
    expect(evalReal('x = x + 1', ctx)).toBe(4);
    expect(evalReal('x', ctx)).toBe(4);
  });

  it('resolves built-in constants', () => {
    expect(evalReal('pi')).toBe(Math.PI);
    expect(evalReal('e')).toBe(Math.E);
    expect(evalReal('2pi')).toBeCloseTo(2 * Math.PI, 12);
  });
});

describe('functions', () => {
  it('declares and calls a user function', () => {
    const ctx = session();
    const decl = parse(ctx, 'f(x) = x^2');
    expect(decl).toEqual({ t: 'ok', v: undefined });
    expect(evalReal('f(4)', ctx)).toBe(16);
  });

  it('does not know functions from other sessions', () => {
    expect(failureReason(parse(session(), 'f(4)'))).toEqual({ reason: 'unknown_function' });
  });

  it('reads session variables from a function body', () => {
    const ctx = session();
    parse(ctx, 'a = 2');
    parse(ctx, 'f(x) = a x');
    expect(evalReal('f(3)', ctx)).toBe(6);
  });

  it('checks arity', () => {
    const ctx = session();
    parse(ctx, 'f(x) = x');
    expect(failureReason(parse(ctx, 'f(1, 2)'))).toEqual({ reason: 'arity_mismatch' });
    expect(failureReason(parse(ctx, 'sqrt(1, 2)'))).toEqual({ reason: 'arity_mismatch' });
  });

  it('stops runaway recursion', () => {
    const ctx = session({ maxCallDepth: 16 });
    parse(ctx, 'g(x) = g(x)');
    expect(failureReason(parse(ctx, 'g(1)'))).toEqual({ reason: 'max_depth' });
  });

  it('stops runaway recursion at the largest allowed depth', () => {
    const ctx = session({ maxCallDepth: 1000 });
    parse(ctx, 'g(x) = g(x)');
    expect(failureReason(parse(ctx, 'g(1)'))).toEqual({ reason: 'max_depth' });
  });

  it('calls a function declared earlier in the same input', () => {
    expect(evalReal('f(x) = x + 1 2 f3')).toBe(8);
  });

  it('calls built-ins with a juxtaposed literal', () => {
    expect(evalReal('sqrt64')).toBe(8);
    expect(evalReal('√9')).toBe(3);
  });

  it('takes logarithms in any base', () => {
    expect(evalReal('log(100)')).toBe(2);
    expect(evalReal('log(8, 2)')).toBeCloseTo(3, 12);
    expect(evalReal('ln(e)')).toBeCloseTo(1, 12);
  });

  it('rounds both components', () => {
    expect(evalReal('floor(2.7)')).toBe(2);
    expect(evalReal('ceil(2.1)')).toBe(3);
    expect(evalReal('trunc(-2.7)')).toBe(-2);
  });
});

describe('angles', () => {
  it('honours a degree suffix in radian mode', () => {
    expect(evalReal('sin(90deg)')).toBeCloseTo(1, 12);
  });

  it('reads untagged arguments in the session unit', () => {
    expect(valueOf(parse(session(), 'sin(30)', 'degrees')).real.toNumber()).toBeCloseTo(0.5, 12);
    expect(evalReal('cos(0)', session({ angleUnit: 'degrees' }))).toBe(1);
  });

  it('returns inverse functions in the session unit', () => {
    expect(valueOf(parse(session(), 'asin(1)', 'degrees')).real.toNumber()).toBeCloseTo(90, 10);
    expect(evalReal('asin(1)')).toBeCloseTo(Math.PI / 2, 12);
  });

  it('keeps the unit on the value', () => {
    expect(valueOf(parse(session(), '30deg')).unit).toBe('deg');
  });
});

describe('calculate', () => {
  it('formats results', () => {
    expect(display('0.1 + 0.2')).toBe('0.3');
    expect(display('0.5')).toBe('1/2');
    expect(display('pi/2')).toBe('π/2');
    expect(display('2pi')).toBe('2π');
    expect(display('sin(30)', session({ angleUnit: 'degrees' }))).toBe('1/2');
  });

  it('keeps the sign of negative radicals', () => {
    expect(display('-sqrt(3)')).toBe('-√3');
    expect(display('2 - sqrt(3)i')).toBe('2 - √3i');
  });

  it('formats complex results', () => {
    expect(display('sqrt(-4)')).toBe('2i');
    expect(display('3 - 2i')).toBe('3 - 2i');
    expect(display('1 + i')).toBe('1 + i');
  });

  it('appends units', () => {
    expect(display('30deg')).toBe('30 deg');
  });

  it('has no display for a declaration', () => {
    expect(display('f(x) = 2x')).toBeUndefined();
  });

  it('keeps declarations in a shared context', () => {
    const ctx = session();
    calculate('f(x) = 2x', undefined, ctx);
    expect(display('f(21)', ctx)).toBe('42');
  });

  it('passes syntax errors through', () => {
    const r = calculate('(1', undefined, session());
    expect(isErr(r) && r.code).toBe('UnexpectedToken');
  });

  it('computes exactly on the decimal backend', () => {
    const r = calculate('0.1 + 0.2', undefined, session({ backend: 'decimal' }));
    if (!isOk(r) || !r.v.value) throw new Error('expected a value');
    expect(r.v.value.real.toString()).toBe('0.3');
    expect(r.v.display).toBe('0.3');
  });
});

describe('interpret', () => {
  it('evaluates a hand-built tree', () => {
    const ctx = session();
    const r = interpret(
      [{ t: 'expr', expr: { t: 'binary', left: { t: 'literal', v: '2' }, op: 'star', right: { t: 'var', name: 'tau' } } }],
      { symbols: ctx.symbols, backend: ctx.backend, angleUnit: 'radians', maxCallDepth: 8, log: ctx.log },
    );
    expect(valueOf(r).real.toNumber()).toBeCloseTo(4 * Math.PI, 12);
  });

  it('logs evaluation failures at debug level', () => {
    const sink = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
    const ctx = new ParserContext({}, { env: {}, logger: createLogger({ level: 'debug', sink }) });
    parse(ctx, '1/0');
    expect(sink.debug).toHaveBeenCalledWith('[numen] evaluation failed: Division by zero {"reason":"division_by_zero"}');
  });
});
