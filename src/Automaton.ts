import type { Grammar } from './Grammar.js';
import type { GrammarSymbol } from './GrammarSymbol.js';
import { Item } from './Item.js';
import { ItemSet, closure, transitionsOf } from './ItemSet.js';
import { debugAutomaton } from './log.js';

export interface State {
  readonly index: number;
  /** Closed item set; states are identified by its content. */
  readonly items: ItemSet;
}

export interface Transition {
  readonly from: number;
  readonly symbol: GrammarSymbol;
  readonly to: number;
}

/**
 * LR(0) automaton over dotted items. States live in an indexed array and
 * edges refer to them by index, so cycles need no object references.
 */
export class Automaton {
  readonly grammar: Grammar;
  readonly states: readonly State[];
  readonly transitions: readonly Transition[];
  readonly initial: number = 0;
  private readonly edges: ReadonlyMap<GrammarSymbol, number>[];
  private readonly stateByKey: ReadonlyMap<string, number>;

  private constructor(
    grammar: Grammar,
    states: State[],
    transitions: Transition[],
    stateByKey: Map<string, number>,
  ) {
    this.grammar = grammar;
    this.states = Object.freeze(states);
    this.transitions = Object.freeze(transitions);
    this.stateByKey = stateByKey;

    const edges = states.map(() => new Map<GrammarSymbol, number>());
    for (const t of transitions) {
      edges[t.from].set(t.symbol, t.to);
    }
    this.edges = edges;
  }

  static build(grammar: Grammar): Automaton {
    const states: State[] = [];
    const transitions: Transition[] = [];
    const stateByKey = new Map<string, number>();
    const worklist: number[] = [];

    const register = (items: ItemSet): number => {
      const existing = stateByKey.get(items.key);
      if (existing !== undefined) {
        return existing;
      }
      const index = states.length;
      states.push({ index, items });
      stateByKey.set(items.key, index);
      worklist.push(index);
      return index;
    };

    register(closure(grammar, [new Item(grammar.augmentedProduction, 0)]));

    let next = 0;
    while (next < worklist.length) {
      const from = worklist[next++];
      for (const [symbol, target] of transitionsOf(grammar, states[from].items)) {
        if (target.isEmpty) continue;
        const to = register(target);
        transitions.push({ from, symbol, to });
      }
    }

    debugAutomaton('automaton: %d states, %d transitions', states.length, transitions.length);
    return new Automaton(grammar, states, transitions, stateByKey);
  }

  get size(): number {
    return this.states.length;
  }

  /** State reached from the initial state over the start symbol; it holds `S' ::= start •`. */
  get acceptState(): number {
    const state = this.transition(this.initial, this.grammar.start);
    if (state === undefined) {
      throw new Error(`Initial state has no transition on ${this.grammar.start.toString()}`);
    }
    return state;
  }

  state(index: number): State {
    const state = this.states[index];
    if (!state) {
      throw new Error(`No state with index ${index}`);
    }
    return state;
  }

  transition(from: number, symbol: GrammarSymbol): number | undefined {
    return this.edges[from]?.get(symbol);
  }

  transitionsFrom(from: number): Transition[] {
    return this.transitions.filter(t => t.from === from);
  }

  /** The state whose closed content equals `items`, if there is one. */
  stateContaining(items: ItemSet): State | undefined {
    const index = this.stateByKey.get(items.key);
    return index === undefined ? undefined : this.states[index];
  }
}

export function buildAutomaton(grammar: Grammar): Automaton {
  return Automaton.build(grammar);
}
