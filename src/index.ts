/**
 * numen - calculator language core
 *
 * - lexer, parser and interpreter for the expression language (core/expr)
 * - estimation of exact-looking forms for evaluated values (core/rounding)
 * - native and arbitrary-precision numeric backends (core/numeric)
 */

export { tokenize } from './core/expr/lexer';
export { parse, parseStatements, ParserContext, TokenCursor } from './core/expr/parser';
export { interpret, type InterpEnv } from './core/expr/interp';
export { BUILTINS, BUILTIN_NAMES, builtinConstant } from './core/expr/builtins';
export { EvalError, ParseError } from './core/expr/errors';
export type { EvalReason, ParseErrorCode } from './core/expr/errors';
export { sameKind, isUnit } from './core/expr/types';
export type { BinaryOp, Expr, FnDecl, Stmt, Token, TokenKind, UnitKind, VarDecl } from './core/expr/types';

export { estimate, round, roundMagnitude, trimZeroes, RENDER_DIGITS } from './core/rounding';
export { formatValue } from './core/display';
export { SymbolTable, fnKey } from './core/symbols';
export { makeValue, component, withComponent, isReal } from './core/value';
export type { AngleUnit, CalcValue, ComplexPart } from './core/types';

export { createBackend, nativeBackend, createDecimalBackend, NativeMagnitude, DecimalMagnitude } from './core/numeric';
export type { BackendName, Magnitude, NumericBackend, Operand } from './core/numeric';

export { EngineOptions, loadOptions } from './core/config';
export type { EngineOptionsInput, EngineOptionsT } from './core/config';
export { createLogger } from './core/log';
export type { Logger, LoggerOptions, LogLevel, LogSink } from './core/log';
export { ok, err, isOk, isErr, map } from './core/result';
export type { Ok, Err, ErrorCode, Result } from './core/result';

import type { EngineOptionsInput } from './core/config';
import { formatValue } from './core/display';
import { parse, ParserContext } from './core/expr/parser';
import { map, type Result } from './core/result';
import type { CalcValue } from './core/types';

export interface Calculation {
  value: CalcValue | undefined;
  /** Display form of `value`; undefined when the input only declared functions */
  display: string | undefined;
}

/**
 * One-shot evaluation in a fresh context. Pass `context` to keep
 * declarations between calls.
 */
export function calculate(
  input: string,
  options?: EngineOptionsInput,
  context: ParserContext = new ParserContext(options),
): Result<Calculation> {
  return map(parse(context, input), (value) => ({
    value,
    display: value && formatValue(value),
  }));
}
