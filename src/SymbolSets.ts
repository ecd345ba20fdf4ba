import type { Grammar } from './Grammar.js';
import { EndOfInput, type GrammarSymbol, NonTerminal, Terminal } from './GrammarSymbol.js';
import { debugSymbols } from './log.js';

export type TerminalSets = Map<NonTerminal, Set<Terminal>>;

export interface FixpointResult<T> {
  value: T;
  /** Full passes over the production list, including the final pass that changed nothing. */
  passes: number;
}

export interface SequenceFirst {
  terminals: Set<Terminal>;
  nullable: boolean;
}

function addAll<T>(from: Iterable<T>, into: Set<T>): boolean {
  let changed = false;
  for (const v of from) {
    if (!into.has(v)) {
      into.add(v);
      changed = true;
    }
  }
  return changed;
}

function copySets(grammar: Grammar, seed?: ReadonlyMap<NonTerminal, ReadonlySet<Terminal>>): TerminalSets {
  const sets: TerminalSets = new Map();
  for (const nt of grammar.nonTerminals) {
    sets.set(nt, new Set(seed?.get(nt) ?? []));
  }
  return sets;
}

function setOf(sets: TerminalSets, nt: NonTerminal): Set<Terminal> {
  let set = sets.get(nt);
  if (!set) {
    set = new Set();
    sets.set(nt, set);
  }
  return set;
}

/**
 * FIRST of `symbols`, given per-non-terminal FIRST sets and nullability.
 * `nullable` is true when every symbol in the sequence can derive ε.
 */
function sequenceFirst(
  symbols: readonly GrammarSymbol[],
  nullable: ReadonlySet<NonTerminal>,
  first: ReadonlyMap<NonTerminal, ReadonlySet<Terminal>>,
): SequenceFirst {
  const terminals = new Set<Terminal>();
  for (const sym of symbols) {
    if (sym instanceof Terminal) {
      terminals.add(sym);
      return { terminals, nullable: false };
    }
    if (sym instanceof NonTerminal) {
      addAll(first.get(sym) ?? [], terminals);
      if (!nullable.has(sym)) {
        return { terminals, nullable: false };
      }
    }
  }
  return { terminals, nullable: true };
}

export function computeNullable(
  grammar: Grammar,
  seed?: ReadonlySet<NonTerminal>,
): FixpointResult<Set<NonTerminal>> {
  const nullable = new Set<NonTerminal>(seed ?? []);
  let passes = 0;
  let changed = true;
  while (changed) {
    changed = false;
    passes++;
    for (const production of grammar.productions) {
      if (nullable.has(production.lhs)) continue;
      const allNullable = production.rhs.every(sym => sym instanceof NonTerminal && nullable.has(sym));
      if (allNullable) {
        nullable.add(production.lhs);
        changed = true;
      }
    }
  }
  return { value: nullable, passes };
}

export function computeFirstSets(
  grammar: Grammar,
  nullable: ReadonlySet<NonTerminal>,
  seed?: ReadonlyMap<NonTerminal, ReadonlySet<Terminal>>,
): FixpointResult<TerminalSets> {
  const first = copySets(grammar, seed);
  let passes = 0;
  let changed = true;
  while (changed) {
    changed = false;
    passes++;
    for (const production of grammar.productions) {
      const contribution = sequenceFirst(production.rhs, nullable, first);
      if (addAll(contribution.terminals, setOf(first, production.lhs))) {
        changed = true;
      }
    }
  }
  return { value: first, passes };
}

export function computeFollowSets(
  grammar: Grammar,
  nullable: ReadonlySet<NonTerminal>,
  first: ReadonlyMap<NonTerminal, ReadonlySet<Terminal>>,
  seed?: ReadonlyMap<NonTerminal, ReadonlySet<Terminal>>,
): FixpointResult<TerminalSets> {
  const follow = copySets(grammar, seed);
  setOf(follow, grammar.start).add(EndOfInput);

  let passes = 0;
  let changed = true;
  while (changed) {
    changed = false;
    passes++;
    for (const production of grammar.productions) {
      const rhs = production.rhs;
      for (let i = 0; i < rhs.length; i++) {
        const sym = rhs[i];
        if (!(sym instanceof NonTerminal)) continue;
        const target = setOf(follow, sym);
        const rest = sequenceFirst(rhs.slice(i + 1), nullable, first);
        if (addAll(rest.terminals, target)) {
          changed = true;
        }
        if (rest.nullable && addAll(setOf(follow, production.lhs), target)) {
          changed = true;
        }
      }
    }
  }
  return { value: follow, passes };
}

const analysisCache = new WeakMap<Grammar, SymbolSets>();

/** Nullable, FIRST and FOLLOW sets of a grammar's non-terminals. */
export class SymbolSets {
  readonly grammar: Grammar;
  readonly nullable: ReadonlySet<NonTerminal>;
  readonly first: ReadonlyMap<NonTerminal, ReadonlySet<Terminal>>;
  readonly follow: ReadonlyMap<NonTerminal, ReadonlySet<Terminal>>;
  readonly passes: { nullable: number; first: number; follow: number };

  private constructor(grammar: Grammar) {
    this.grammar = grammar;
    const nullable = computeNullable(grammar);
    const first = computeFirstSets(grammar, nullable.value);
    const follow = computeFollowSets(grammar, nullable.value, first.value);
    this.nullable = nullable.value;
    this.first = first.value;
    this.follow = follow.value;
    this.passes = { nullable: nullable.passes, first: first.passes, follow: follow.passes };

    debugSymbols(
      'symbol sets: %d nullable, passes nullable=%d first=%d follow=%d',
      this.nullable.size,
      nullable.passes,
      first.passes,
      follow.passes,
    );
  }

  /** Analyses `grammar` once; later calls with the same grammar return the cached result. */
  static of(grammar: Grammar): SymbolSets {
    let sets = analysisCache.get(grammar);
    if (!sets) {
      sets = new SymbolSets(grammar);
      analysisCache.set(grammar, sets);
    }
    return sets;
  }

  isNullable(sym: GrammarSymbol): boolean {
    return sym instanceof NonTerminal && this.nullable.has(sym);
  }

  firstOf(sym: GrammarSymbol): ReadonlySet<Terminal> {
    if (sym instanceof Terminal) {
      return new Set([sym]);
    }
    if (sym instanceof NonTerminal) {
      return this.first.get(sym) ?? new Set();
    }
    return new Set();
  }

  firstOfSequence(symbols: readonly GrammarSymbol[]): SequenceFirst {
    return sequenceFirst(symbols, this.nullable, this.first);
  }

  followOf(nonTerminal: NonTerminal): ReadonlySet<Terminal> {
    return this.follow.get(nonTerminal) ?? new Set();
  }
}
