import type { FnDecl, Stmt, VarDecl } from './expr/types';
import type { CalcValue } from './types';

export const fnKey = (name: string) => `${name}()`;

/**
 * Declarations by name. Functions live under `name()` so a variable and a
 * function may share a name. Entries persist until overwritten.
 */
export class SymbolTable {
  private readonly entries = new Map<string, Stmt>();
  private readonly values = new Map<string, CalcValue>();

  constructor(private readonly builtinFns: ReadonlySet<string> = new Set()) {}

  insert(key: string, stmt: Stmt): void {
    this.entries.set(key, stmt);
  }

  /** Records a variable declaration together with the value it evaluated to. */
  assign(decl: VarDecl, value: CalcValue): void {
    this.entries.set(decl.name, decl);
    this.values.set(decl.name, value);
  }

  valueOf(name: string): CalcValue | undefined {
    return this.values.get(name);
  }

  getVar(name: string): VarDecl | undefined {
    const s = this.entries.get(name);
    return s?.t === 'var_decl' ? s : undefined;
  }

  getFn(name: string): FnDecl | undefined {
    const s = this.entries.get(fnKey(name));
    return s?.t === 'fn_decl' ? s : undefined;
  }

  /** True for built-in functions and for functions declared so far. */
  containsFunc(name: string): boolean {
    return this.builtinFns.has(name) || this.entries.has(fnKey(name));
  }
}
