import type { Grammar } from './Grammar.js';
import { type GrammarSymbol, NonTerminal } from './GrammarSymbol.js';
import { Item } from './Item.js';

/**
 * Deduplicated set of items held in canonical order (production index, then
 * dot). Sets with the same content have the same {@link ItemSet.key}.
 */
export class ItemSet implements Iterable<Item> {
  readonly items: readonly Item[];
  readonly key: string;
  private readonly keys: ReadonlySet<string>;

  constructor(items: Iterable<Item>) {
    const unique = new Map<string, Item>();
    for (const item of items) {
      if (!unique.has(item.key)) {
        unique.set(item.key, item);
      }
    }
    this.items = Object.freeze([...unique.values()].sort(Item.compare));
    this.keys = new Set(unique.keys());
    this.key = this.items.map(i => i.key).join(',');
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  [Symbol.iterator](): Iterator<Item> {
    return this.items[Symbol.iterator]();
  }

  has(item: Item): boolean {
    return this.keys.has(item.key);
  }

  equals(other: ItemSet): boolean {
    return this.key === other.key;
  }

  isSubsetOf(other: ItemSet): boolean {
    return this.items.every(item => other.has(item));
  }

  /** Symbols that appear right after a dot, in canonical item order, without repeats. */
  nextSymbols(): GrammarSymbol[] {
    const seen = new Set<GrammarSymbol>();
    for (const item of this.items) {
      const sym = item.nextSymbol;
      if (sym) seen.add(sym);
    }
    return [...seen];
  }

  toString(): string {
    return this.items.map(i => i.toString()).join('\n');
  }
}

/**
 * Expands `items` with `N ::= • …` for every non-terminal N found right after
 * a dot, until nothing new is added.
 */
export function closure(grammar: Grammar, items: Iterable<Item>): ItemSet {
  const byKey = new Map<string, Item>();
  const queue: Item[] = [];
  for (const item of items) {
    if (!byKey.has(item.key)) {
      byKey.set(item.key, item);
      queue.push(item);
    }
  }

  let i = 0;
  while (i < queue.length) {
    const sym = queue[i].nextSymbol;
    i++;
    if (!(sym instanceof NonTerminal)) continue;
    for (const production of grammar.productionsOf(sym)) {
      const expanded = new Item(production, 0);
      if (!byKey.has(expanded.key)) {
        byKey.set(expanded.key, expanded);
        queue.push(expanded);
      }
    }
  }

  return new ItemSet(byKey.values());
}

/** Items of `set` advanced over `symbol`. The result is not closed. */
export function goto(set: ItemSet, symbol: GrammarSymbol): ItemSet {
  const advanced: Item[] = [];
  for (const item of set) {
    if (item.nextSymbol === symbol) {
      advanced.push(item.advance());
    }
  }
  return new ItemSet(advanced);
}

/** Every outgoing symbol of `set` mapped to the closed item set it leads to. */
export function transitionsOf(grammar: Grammar, set: ItemSet): Map<GrammarSymbol, ItemSet> {
  const result = new Map<GrammarSymbol, ItemSet>();
  for (const sym of set.nextSymbols()) {
    result.set(sym, closure(grammar, goto(set, sym)));
  }
  return result;
}
