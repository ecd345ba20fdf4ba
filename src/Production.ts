import type { GrammarSymbol, NonTerminal } from './GrammarSymbol.js';

export class Production {
  /** Stable position in the grammar's production list, used by reduce actions. */
  readonly index: number;
  readonly lhs: NonTerminal;
  readonly rhs: readonly GrammarSymbol[];

  constructor(index: number, lhs: NonTerminal, rhs: readonly GrammarSymbol[]) {
    this.index = index;
    this.lhs = lhs;
    this.rhs = Object.freeze([...rhs]);
  }

  get length(): number {
    return this.rhs.length;
  }

  get isEpsilon(): boolean {
    return this.rhs.length === 0;
  }

  equals(other: Production): boolean {
    return (
      this.lhs === other.lhs &&
      this.rhs.length === other.rhs.length &&
      this.rhs.every((sym, i) => sym === other.rhs[i])
    );
  }

  toString(): string {
    const body = this.isEpsilon ? 'ε' : this.rhs.map(s => s.toString()).join(' ');
    return `${this.lhs.toString()} ::= ${body}`;
  }
}
