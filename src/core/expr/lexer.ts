import { ParseError } from './errors';
import type { Token, TokenKind } from './types';

const isWS = (c: string) => /\s/.test(c);
const isDigit = (c: string) => /[0-9]/.test(c);
const isIdChar = (c: string) => /[A-Za-z_πτϕ]/.test(c);

const SINGLE: Record<string, TokenKind> = {
  '+': 'plus',
  '-': 'minus',
  '*': 'star',
  '×': 'star',
  '·': 'star',
  '/': 'slash',
  '÷': 'slash',
  '^': 'power',
  '(': 'lparen',
  ')': 'rparen',
  '|': 'pipe',
  ',': 'comma',
  '=': 'equals',
  '°': 'deg',
};

const UNIT_WORDS: Record<string, TokenKind> = { deg: 'deg', rad: 'rad' };

export function tokenize(input: string): Token[] {
  const tks: Token[] = [];
  let i = 0;
  const peek = () => input[i] ?? '';
  const next = () => input[i++] ?? '';
  while (i < input.length) {
    const c = peek();
    const pos = i;
    if (isWS(c)) {
      next();
      continue;
    }
    if (isDigit(c) || (c === '.' && isDigit(input[i + 1] ?? ''))) {
      let s = '';
      let hasDot = false;
      while (isDigit(peek()) || (peek() === '.' && !hasDot)) {
        if (peek() === '.') hasDot = true;
        s += next();
      }
      tks.push({ k: 'literal', v: s, pos });
      continue;
    }
    if (c === '√') {
      tks.push({ k: 'ident', v: next(), pos });
      continue;
    }
    if (isIdChar(c)) {
      let s = next();
      while (isIdChar(peek())) s += next();
      tks.push({ k: UNIT_WORDS[s] ?? 'ident', v: s, pos });
      continue;
    }
    const kind = SINGLE[c];
    if (kind) {
      tks.push({ k: kind, v: next(), pos });
      continue;
    }
    throw new ParseError('UnexpectedCharacter', `Unexpected char: ${c}`, pos);
  }
  tks.push({ k: 'eof', v: '', pos: input.length });
  return tks;
}
