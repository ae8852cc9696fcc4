import { describe, expect, it } from 'vitest';
import { tokenize } from '../src/core/expr/lexer';
import { ParseError } from '../src/core/expr/errors';
import { sameKind } from '../src/core/expr/types';

const kinds = (src: string) => tokenize(src).map((t) => t.k);

describe('tokenize', () => {
  it('splits implicit multiplication into literal and identifier', () => {
    expect(kinds('3y')).toEqual(['literal', 'ident', 'eof']);
  });

  it('ends identifiers at digits', () => {
    const [fn, arg] = tokenize('sqrt64');
    expect(fn).toEqual({ k: 'ident', v: 'sqrt', pos: 0 });
    expect(arg).toEqual({ k: 'literal', v: '64', pos: 4 });
  });

  it('lexes the root sign on its own', () => {
    expect(tokenize('√2').map((t) => t.v)).toEqual(['√', '2', '']);
  });

  it('recognizes unit suffixes', () => {
    expect(kinds('30deg + 1rad')).toEqual(['literal', 'deg', 'plus', 'literal', 'rad', 'eof']);
    expect(kinds('45°')).toEqual(['literal', 'deg', 'eof']);
  });

  it('keeps words that merely start with a unit name as identifiers', () => {
    expect(kinds('radius')).toEqual(['ident', 'eof']);
  });

  it('accepts operator aliases', () => {
    expect(kinds('2×3÷4')).toEqual(['literal', 'star', 'literal', 'slash', 'literal', 'eof']);
  });

  it('reads numbers with a leading point', () => {
    expect(tokenize('.5')[0]).toEqual({ k: 'literal', v: '.5', pos: 0 });
  });

  it('records source offsets', () => {
    expect(tokenize('1 + x').map((t) => t.pos)).toEqual([0, 2, 4, 5]);
  });

  it('rejects unknown characters', () => {
    try {
      tokenize('2 $');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ParseError);
      if (e instanceof ParseError) {
        expect(e.code).toBe('UnexpectedCharacter');
        expect(e.position).toBe(2);
      }
    }
  });

  it('compares tokens by kind only', () => {
    const [a, , b] = tokenize('1 + 2');
    expect(sameKind(a, b)).toBe(true);
    expect(sameKind(a, 'ident')).toBe(false);
  });
});
