export type TokenKind =
  | 'literal'
  | 'ident'
  | 'plus'
  | 'minus'
  | 'star'
  | 'slash'
  | 'power'
  | 'lparen'
  | 'rparen'
  | 'pipe'
  | 'comma'
  | 'equals'
  | 'deg'
  | 'rad'
  | 'eof';

/** `pos` is the character offset of the token in the source text. */
export type Token = { k: TokenKind; v: string; pos: number };

export type UnitKind = 'deg' | 'rad';
export type BinaryOp = 'plus' | 'minus' | 'star' | 'slash' | 'power';

export type Expr =
  | { t: 'binary'; left: Expr; op: BinaryOp; right: Expr }
  | { t: 'unary'; op: 'minus'; expr: Expr }
  | { t: 'unit'; expr: Expr; unit: UnitKind }
  | { t: 'var'; name: string }
  | { t: 'group'; expr: Expr }
  | { t: 'call'; name: string; args: Expr[] }
  | { t: 'literal'; v: string };

export type Stmt =
  | { t: 'var_decl'; name: string; value: Expr }
  | { t: 'fn_decl'; name: string; params: string[]; body: Expr }
  | { t: 'expr'; expr: Expr };

export type VarDecl = Extract<Stmt, { t: 'var_decl' }>;
export type FnDecl = Extract<Stmt, { t: 'fn_decl' }>;

/** Tokens compare by kind only, ignoring their payload. */
export const sameKind = (a: Token, b: Token | TokenKind): boolean =>
  a.k === (typeof b === 'string' ? b : b.k);

export const isUnit = (k: TokenKind): k is UnitKind => k === 'deg' || k === 'rad';
