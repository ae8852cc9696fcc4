// Result runtime shared by the parser, interpreter and public entry points

export type ErrorCode =
  | 'UnexpectedToken'
  | 'UnexpectedCharacter'
  | 'InvalidFunctionParameterList'
  | 'EvaluationFailure';

export type Ok<T> = { t: 'ok'; v: T };
export type Err = { t: 'err'; code: ErrorCode; msg?: string; data?: unknown };
export type Result<T> = Ok<T> | Err;

export const ok = <T>(v: T): Ok<T> => ({ t: 'ok', v });
export const err = (code: ErrorCode, msg?: string, data?: unknown): Err => ({ t: 'err', code, msg, data });

export const isOk = <T>(r: Result<T>): r is Ok<T> => r.t === 'ok';
export const isErr = <T>(r: Result<T>): r is Err => r.t === 'err';

export const map = <A, B>(r: Result<A>, f: (a: A) => B): Result<B> =>
  isOk(r) ? ok(f(r.v)) : r;

