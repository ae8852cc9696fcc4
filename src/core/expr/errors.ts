import type { ErrorCode } from '../result';
import type { TokenKind } from './types';

export type ParseErrorCode = Exclude<ErrorCode, 'EvaluationFailure'>;

export class ParseError extends Error {
  constructor(
    readonly code: ParseErrorCode,
    message: string,
    readonly position: number,
    readonly expected?: TokenKind,
    readonly found?: TokenKind,
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

export type EvalReason =
  | 'undefined_variable'
  | 'unknown_function'
  | 'arity_mismatch'
  | 'division_by_zero'
  | 'max_depth'
  | 'unsupported_operation'
  | 'invalid_literal';

export class EvalError extends Error {
  constructor(
    readonly reason: EvalReason,
    message: string,
  ) {
    super(message);
    this.name = 'EvalError';
  }
}
