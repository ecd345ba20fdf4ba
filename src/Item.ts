import type { GrammarSymbol } from './GrammarSymbol.js';
import type { Production } from './Production.js';

/** A production with a dot marking how many right-hand-side symbols have been consumed. */
export class Item {
  readonly production: Production;
  readonly dot: number;

  constructor(production: Production, dot: number = 0) {
    if (!Number.isInteger(dot) || dot < 0 || dot > production.length) {
      throw new Error(`Dot position ${dot} is outside ${production.toString()}`);
    }
    this.production = production;
    this.dot = dot;
  }

  /** Content key; two items with the same key are the same item. */
  get key(): string {
    return `${this.production.index}.${this.dot}`;
  }

  get isComplete(): boolean {
    return this.dot === this.production.length;
  }

  /** The symbol right after the dot, or `null` for a complete item. */
  get nextSymbol(): GrammarSymbol | null {
    return this.production.rhs[this.dot] ?? null;
  }

  advance(): Item {
    if (this.isComplete) {
      throw new Error(`Can't advance item ${this.toString()}: dot is already at the end of the production`);
    }
    return new Item(this.production, this.dot + 1);
  }

  equals(other: Item): boolean {
    return this.production.index === other.production.index && this.dot === other.dot;
  }

  toString(): string {
    const symbols = this.production.rhs.map(s => s.toString());
    symbols.splice(this.dot, 0, '•');
    return `${this.production.lhs.toString()} ::= ${symbols.join(' ')}`;
  }

  static compare(a: Item, b: Item): number {
    return a.production.index - b.production.index || a.dot - b.dot;
  }
}
