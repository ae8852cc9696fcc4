import { loadOptions, type EngineOptionsInput, type EngineOptionsT } from '../config';
import { createLogger, type Logger } from '../log';
import { createBackend } from '../numeric';
import type { NumericBackend } from '../numeric/types';
import { err, type Result } from '../result';
import { fnKey, SymbolTable } from '../symbols';
import type { AngleUnit, CalcValue } from '../types';
import { BUILTIN_NAMES } from './builtins';
import { ParseError } from './errors';
import { interpret } from './interp';
import { tokenize } from './lexer';
import { isUnit, type BinaryOp, type Expr, type Stmt, type Token, type TokenKind } from './types';

/**
 * Position over a token stream that always ends in `eof`. Reads past the end
 * keep returning the `eof` token.
 */
export class TokenCursor {
  private readonly tokens: Token[];
  private pos = 0;

  constructor(tokens: Token[]) {
    const last = tokens[tokens.length - 1];
    this.tokens = last?.k === 'eof' ? tokens : [...tokens, { k: 'eof', v: '', pos: last ? last.pos + last.v.length : 0 }];
  }

  get position(): number {
    return this.pos;
  }

  peek(): Token {
    return this.tokens[Math.min(this.pos, this.tokens.length - 1)];
  }

  peekNext(): Token {
    return this.tokens[Math.min(this.pos + 1, this.tokens.length - 1)];
  }

  atEnd(): boolean {
    return this.peek().k === 'eof';
  }

  check(k: TokenKind): boolean {
    return !this.atEnd() && this.peek().k === k;
  }

  advance(): Token {
    const t = this.peek();
    if (!this.atEnd()) this.pos++;
    return t;
  }

  expect(k: TokenKind): Token {
    if (this.check(k)) return this.advance();
    const t = this.peek();
    throw new ParseError('UnexpectedToken', `Expected ${k} at position ${t.pos}, found ${t.k}`, t.pos, k, t.k);
  }

  /**
   * Snapshot the position, run `attempt`, and keep its progress only when it
   * returns a value. On `undefined` or a throw the position is restored.
   */
  speculate<T>(attempt: () => T | undefined): T | undefined {
    const mark = this.pos;
    try {
      const out = attempt();
      if (out === undefined) this.pos = mark;
      return out;
    } catch (e) {
      this.pos = mark;
      throw e;
    }
  }
}

/**
 * Parse session state. The symbol table outlives single `parse` calls, so
 * functions declared in one input are recognized in later ones.
 */
export class ParserContext {
  readonly options: EngineOptionsT;
  readonly symbols: SymbolTable;
  readonly backend: NumericBackend;
  readonly log: Logger;
  cursor = new TokenCursor([]);

  constructor(options: EngineOptionsInput = {}, deps: { logger?: Logger; env?: Record<string, string | undefined> } = {}) {
    this.options = loadOptions(options, deps.env);
    this.symbols = new SymbolTable(BUILTIN_NAMES);
    this.backend = createBackend(this.options);
    this.log = deps.logger ?? createLogger({ level: this.options.logLevel });
  }

  load(tokens: Token[]): TokenCursor {
    this.cursor = new TokenCursor(tokens);
    return this.cursor;
  }
}

// Recursion levels of unary and exponent parsing, two per parenthesis.
const MAX_NESTING = 512;

export function parseStatements(context: ParserContext, tokens: Token[]): Stmt[] {
  const cur = context.load(tokens);
  const { symbols, log } = context;
  let depth = 0;

  function nested<T>(parseInner: () => T): T {
    if (depth >= MAX_NESTING) {
      const t = cur.peek();
      throw new ParseError('UnexpectedToken', `Expression nested too deeply at position ${t.pos}`, t.pos, undefined, t.k);
    }
    depth++;
    try {
      return parseInner();
    } finally {
      depth--;
    }
  }

  function parseStmt(): Stmt {
    if (cur.check('ident')) {
      switch (cur.peekNext().k) {
        case 'equals':
          return parseVarDecl();
        case 'lparen':
          return parseIdentifierStmt();
      }
    }
    return { t: 'expr', expr: parseExpr() };
  }

  function parseVarDecl(): Stmt {
    const name = cur.advance().v;
    cur.expect('equals');
    return { t: 'var_decl', name, value: parseExpr() };
  }

  // Declarations and calls look the same up to the `=`, so parse a call
  // first and turn it into a declaration if an `=` follows.
  function parseIdentifierStmt(): Stmt {
    const decl = cur.speculate((): Stmt | undefined => {
      const start = cur.peek();
      const primary = parsePrimary();
      if (!cur.check('equals')) return undefined;
      const eq = cur.advance();
      if (primary.t !== 'call')
        throw new ParseError('UnexpectedToken', `Unexpected equals at position ${eq.pos}`, eq.pos, undefined, eq.k);

      const params: string[] = [];
      for (const arg of primary.args) {
        if (arg.t !== 'var')
          throw new ParseError(
            'InvalidFunctionParameterList',
            `Invalid parameter list for ${fnKey(primary.name)} at position ${start.pos}`,
            start.pos,
          );
        params.push(arg.name);
      }

      const fn: Stmt = { t: 'fn_decl', name: primary.name, params, body: parseExpr() };
      symbols.insert(fnKey(primary.name), fn);
      log.debug(`registered ${fnKey(primary.name)}`, { params });
      return fn;
    });
    if (decl) return decl;

    log.debug(`reparsing call at token ${cur.position} as an expression`);
    return { t: 'expr', expr: parseExpr() };
  }

  function parseExpr(): Expr {
    return parseSum();
  }

  function parseSum(): Expr {
    let left = parseFactor();
    while (cur.check('plus') || cur.check('minus')) {
      const op: BinaryOp = cur.advance().k === 'plus' ? 'plus' : 'minus';
      const right = parseFactor();
      left = { t: 'binary', left, op, right };
    }
    return left;
  }

  function parseFactor(): Expr {
    let left = parseUnary();
    while (cur.check('star') || cur.check('slash') || cur.check('ident')) {
      const op: BinaryOp = cur.check('slash') ? 'slash' : 'star';
      // an identifier where an operator belongs multiplies, eg. 3y
      if (!cur.check('ident')) cur.advance();
      const right = parseUnary();
      left = { t: 'binary', left, op, right };
    }
    return left;
  }

  function parseUnary(): Expr {
    return nested((): Expr => {
      if (cur.check('minus')) {
        cur.advance();
        return { t: 'unary', op: 'minus', expr: parseUnary() };
      }
      return parseExponent();
    });
  }

  function parseExponent(): Expr {
    return nested((): Expr => {
      const left = parsePrimary();
      if (cur.check('power')) {
        cur.advance();
        return { t: 'binary', left, op: 'power', right: parseExponent() };
      }
      return left;
    });
  }

  function parsePrimary(): Expr {
    let expr: Expr;
    switch (cur.peek().k) {
      case 'lparen':
        expr = parseGroup();
        break;
      case 'pipe':
        expr = parseAbs();
        break;
      case 'ident':
        expr = parseIdentifier();
        break;
      default:
        expr = { t: 'literal', v: cur.expect('literal').v };
    }

    const next = cur.peek().k;
    if (isUnit(next)) {
      cur.advance();
      return { t: 'unit', expr, unit: next };
    }
    return expr;
  }

  function parseGroup(): Expr {
    cur.advance();
    const expr = parseExpr();
    cur.expect('rparen');
    return { t: 'group', expr };
  }

  function parseAbs(): Expr {
    cur.advance();
    const expr = parseExpr();
    cur.expect('pipe');
    return { t: 'call', name: 'abs', args: [{ t: 'group', expr }] };
  }

  function parseIdentifier(): Expr {
    const id = cur.advance();

    // eg. sqrt64, only for functions known at this point
    if (cur.check('literal') && symbols.containsFunc(id.v)) {
      return { t: 'call', name: id.v, args: [{ t: 'literal', v: cur.advance().v }] };
    }

    // eg. sqrt(64)
    if (cur.check('lparen')) {
      cur.advance();
      const args = [parseExpr()];
      while (cur.check('comma')) {
        cur.advance();
        args.push(parseExpr());
      }
      cur.expect('rparen');
      return { t: 'call', name: id.v, args };
    }

    return { t: 'var', name: id.v };
  }

  const statements: Stmt[] = [];
  while (!cur.atEnd()) statements.push(parseStmt());
  return statements;
}

/**
 * Lexes and parses `input`, then evaluates the statements against the
 * context's symbol table. Syntax errors come back as `UnexpectedToken`,
 * `UnexpectedCharacter` or `InvalidFunctionParameterList`; interpreter
 * failures as `EvaluationFailure`.
 */
export function parse(
  context: ParserContext,
  input: string,
  angleUnit: AngleUnit = context.options.angleUnit,
): Result<CalcValue | undefined> {
  let statements: Stmt[];
  try {
    statements = parseStatements(context, tokenize(input));
  } catch (e) {
    if (!(e instanceof ParseError)) throw e;
    return err(e.code, e.message, { position: e.position, expected: e.expected, found: e.found });
  }

  return interpret(statements, {
    symbols: context.symbols,
    backend: context.backend,
    angleUnit,
    maxCallDepth: context.options.maxCallDepth,
    log: context.log,
  });
}
