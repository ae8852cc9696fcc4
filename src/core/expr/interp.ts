import * as complex from '../complex';
import type { Logger } from '../log';
import type { NumericBackend } from '../numeric/types';
import { err, ok, type Result } from '../result';
import { fnKey, type SymbolTable } from '../symbols';
import type { AngleUnit, CalcValue } from '../types';
import { builtinConstant, BUILTINS } from './builtins';
import { EvalError } from './errors';
import type { Expr, Stmt } from './types';

export interface InterpEnv {
  symbols: SymbolTable;
  backend: NumericBackend;
  angleUnit: AngleUnit;
  maxCallDepth: number;
  log: Logger;
}

/** Function parameters bound for one call. */
type Frame = ReadonlyMap<string, CalcValue>;

/**
 * Runs statements in order against the shared symbol table. The result is
 * the value of the last statement, or undefined when that statement is a
 * function declaration.
 */
export function interpret(statements: Stmt[], env: InterpEnv): Result<CalcValue | undefined> {
  const { symbols, backend, log } = env;
  const ctx = { backend, angleUnit: env.angleUnit };

  function evalStmt(stmt: Stmt): CalcValue | undefined {
    switch (stmt.t) {
      case 'var_decl': {
        const v = evalNode(stmt.value, undefined, 0);
        symbols.assign(stmt, v);
        return v;
      }
      case 'fn_decl':
        symbols.insert(fnKey(stmt.name), stmt);
        return undefined;
      case 'expr':
        return evalNode(stmt.expr, undefined, 0);
    }
  }

  function lookup(name: string, frame: Frame | undefined): CalcValue {
    const v = frame?.get(name) ?? symbols.valueOf(name) ?? builtinConstant(name, backend);
    if (!v) throw new EvalError('undefined_variable', `Undefined variable: ${name}`);
    return v;
  }

  function call(name: string, args: CalcValue[], depth: number): CalcValue {
    const fn = symbols.getFn(name);
    if (fn) {
      if (args.length !== fn.params.length)
        throw new EvalError('arity_mismatch', `${name}() expects ${fn.params.length} argument(s), got ${args.length}`);
      if (depth >= env.maxCallDepth)
        throw new EvalError('max_depth', `Maximum call depth of ${env.maxCallDepth} exceeded in ${name}()`);
      const inner: Frame = new Map(fn.params.map((p, i) => [p, args[i]] as const));
      return evalNode(fn.body, inner, depth + 1);
    }
    const builtin = BUILTINS.get(name);
    if (!builtin) throw new EvalError('unknown_function', `Unknown function: ${name}()`);
    const [min, max] = builtin.arity;
    if (args.length < min || args.length > max)
      throw new EvalError('arity_mismatch', `${name}() expects ${min === max ? min : `${min}-${max}`} argument(s), got ${args.length}`);
    return builtin.apply(args, ctx);
  }

  function evalNode(node: Expr, frame: Frame | undefined, depth: number): CalcValue {
    switch (node.t) {
      case 'literal': {
        const real = backend.from(node.v);
        if (!real.isFinite()) throw new EvalError('invalid_literal', `Invalid number: ${node.v}`);
        return { real, imaginary: backend.from(0), unit: '' };
      }
      case 'var':
        return lookup(node.name, frame);
      case 'group':
        return evalNode(node.expr, frame, depth);
      case 'unit':
        return { ...evalNode(node.expr, frame, depth), unit: node.unit };
      case 'unary':
        return complex.neg(evalNode(node.expr, frame, depth));
      case 'call':
        return call(
          node.name,
          node.args.map((a) => evalNode(a, frame, depth)),
          depth,
        );
      case 'binary': {
        const l = evalNode(node.left, frame, depth);
        const r = evalNode(node.right, frame, depth);
        switch (node.op) {
          case 'plus':
            return complex.add(l, r);
          case 'minus':
            return complex.sub(l, r);
          case 'star':
            return complex.mul(l, r);
          case 'slash':
            return complex.div(l, r);
          case 'power':
            return complex.pow(l, r, backend);
        }
      }
    }
  }

  try {
    let last: CalcValue | undefined;
    for (const stmt of statements) last = evalStmt(stmt);
    return ok(last);
  } catch (e) {
    // stack overflow on a tree too deep to recurse, eg. a long chain of +
    const failure =
      e instanceof RangeError ? new EvalError('max_depth', 'Expression is nested too deeply to evaluate') : e;
    if (!(failure instanceof EvalError)) throw failure;
    log.debug(`evaluation failed: ${failure.message}`, { reason: failure.reason });
    return err('EvaluationFailure', failure.message, { reason: failure.reason });
  }
}
