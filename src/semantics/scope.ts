import type { LocalSymbol, TypedDefer } from './typed.js';

/**
 * One lexical scope: its symbols plus the defers registered in it, both in source order.
 */
export class Scope {
  readonly symbols = new Map<string, LocalSymbol>();
  readonly locals: LocalSymbol[] = [];
  readonly defers: TypedDefer[] = [];

  /**
   * Define a symbol in this scope.
   *
   * Returns `false` if this scope already holds the name. Shadowing an enclosing scope's name is
   * allowed.
   */
  define(symbol: LocalSymbol): boolean {
    if (this.symbols.has(symbol.name)) return false;
    this.symbols.set(symbol.name, symbol);
    this.locals.push(symbol);
    return true;
  }
}

/**
 * Stack of per-block scopes for one function; lookups walk innermost to outermost.
 */
export class ScopeStack {
  private readonly scopes: Scope[] = [];

  get current(): Scope {
    const top = this.scopes[this.scopes.length - 1];
    if (!top) throw new Error('No active scope');
    return top;
  }

  push(): Scope {
    const scope = new Scope();
    this.scopes.push(scope);
    return scope;
  }

  pop(): Scope {
    const top = this.scopes.pop();
    if (!top) throw new Error('Scope stack underflow');
    return top;
  }

  lookup(name: string): LocalSymbol | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const found = this.scopes[i]?.symbols.get(name);
      if (found) return found;
    }
    return undefined;
  }
}
