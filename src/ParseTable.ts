import { Automaton } from './Automaton.js';
import type { Grammar } from './Grammar.js';
import { EndOfInput, NonTerminal, Terminal } from './GrammarSymbol.js';
import type { Production } from './Production.js';
import { SymbolSets } from './SymbolSets.js';
import { debugTable } from './log.js';

export type Action =
  | { readonly type: 'shift'; readonly state: number }
  | { readonly type: 'reduce'; readonly production: number }
  | { readonly type: 'accept' };

export type ConflictKind = 'shift/reduce' | 'reduce/reduce' | 'accept/reduce';

export interface Conflict {
  readonly state: number;
  readonly terminal: Terminal;
  readonly kind: ConflictKind;
  /** Every admissible action for the cell; the first one is what the table holds. */
  readonly actions: readonly Action[];
}

/**
 * `'slr'` reduces a complete item only on FOLLOW of its left-hand side;
 * `'lr0'` reduces it on every terminal.
 */
export type LookaheadMode = 'slr' | 'lr0';

export interface TableOptions {
  lookahead?: LookaheadMode;
}

export function actionsEqual(a: Action, b: Action): boolean {
  switch (a.type) {
    case 'shift':
      return b.type === 'shift' && a.state === b.state;
    case 'reduce':
      return b.type === 'reduce' && a.production === b.production;
    case 'accept':
      return b.type === 'accept';
  }
}

function classify(actions: readonly Action[]): ConflictKind {
  if (actions.some(a => a.type === 'shift')) return 'shift/reduce';
  if (actions.some(a => a.type === 'accept')) return 'accept/reduce';
  return 'reduce/reduce';
}

/** (state, terminal) → action. A missing entry is a syntax error. */
export class ActionTable {
  private readonly rows: ReadonlyMap<Terminal, Action>[];

  constructor(rows: ReadonlyMap<Terminal, Action>[]) {
    this.rows = rows;
  }

  get stateCount(): number {
    return this.rows.length;
  }

  get(state: number, terminal: Terminal): Action | undefined {
    return this.rows[state]?.get(terminal);
  }

  row(state: number): ReadonlyMap<Terminal, Action> {
    return this.rows[state] ?? new Map();
  }
}

/** (state, non-terminal) → state, consulted after a reduction. */
export class GotoTable {
  private readonly rows: ReadonlyMap<NonTerminal, number>[];

  constructor(rows: ReadonlyMap<NonTerminal, number>[]) {
    this.rows = rows;
  }

  get(state: number, nonTerminal: NonTerminal): number | undefined {
    return this.rows[state]?.get(nonTerminal);
  }

  row(state: number): ReadonlyMap<NonTerminal, number> {
    return this.rows[state] ?? new Map();
  }
}

/**
 * Everything a shift/reduce driver needs: start in state 0, look up
 * `actions` with the current state and next terminal, and after reducing by
 * a production pop its length and look up `gotos` with its left-hand side.
 */
export class ParseTables {
  readonly actions: ActionTable;
  readonly gotos: GotoTable;
  readonly startState: number = 0;
  readonly acceptState: number;
  /** Indexed by the production numbers used in reduce actions. */
  readonly productions: readonly Production[];
  private readonly grammar: Grammar;

  constructor(grammar: Grammar, actions: ActionTable, gotos: GotoTable, acceptState: number) {
    this.grammar = grammar;
    this.actions = actions;
    this.gotos = gotos;
    this.acceptState = acceptState;
    this.productions = grammar.indexedProductions;
  }

  actionFor(state: number, terminalName: string): Action | undefined {
    const sym = this.grammar.symbol(terminalName);
    if (!(sym instanceof Terminal)) {
      throw new Error(`'${terminalName}' is not a terminal`);
    }
    return this.actions.get(state, sym);
  }

  gotoFor(state: number, nonTerminalName: string): number | undefined {
    const sym = this.grammar.symbol(nonTerminalName);
    if (!(sym instanceof NonTerminal)) {
      throw new Error(`'${nonTerminalName}' is not a non-terminal`);
    }
    return this.gotos.get(state, sym);
  }
}

export interface TableBuildResult {
  readonly grammar: Grammar;
  readonly automaton: Automaton;
  readonly symbolSets: SymbolSets;
  readonly tables: ParseTables;
  /** Tables are only usable by a driver when this is empty. */
  readonly conflicts: readonly Conflict[];
  readonly parseable: boolean;
}

export function buildParseTables(grammar: Grammar, options?: TableOptions): TableBuildResult {
  const lookahead = options?.lookahead ?? 'slr';
  const symbolSets = SymbolSets.of(grammar);
  const automaton = Automaton.build(grammar);
  const everyTerminal = grammar.lookaheadTerminals;

  const actionRows: Map<Terminal, Action>[] = [];
  const gotoRows: Map<NonTerminal, number>[] = [];
  const conflicts: Conflict[] = [];

  for (const state of automaton.states) {
    const row = new Map<Terminal, Action>();
    const cellConflicts = new Map<Terminal, { state: number; terminal: Terminal; kind: ConflictKind; actions: Action[] }>();

    const write = (terminal: Terminal, action: Action): void => {
      const existing = row.get(terminal);
      if (!existing) {
        row.set(terminal, action);
        return;
      }
      if (actionsEqual(existing, action)) return;

      let conflict = cellConflicts.get(terminal);
      if (!conflict) {
        conflict = { state: state.index, terminal, kind: 'reduce/reduce', actions: [existing] };
        cellConflicts.set(terminal, conflict);
        conflicts.push(conflict);
      }
      if (!conflict.actions.some(a => actionsEqual(a, action))) {
        conflict.actions.push(action);
      }
      conflict.kind = classify(conflict.actions);
    };

    // Shifts and accept first so they win any collision with a reduction.
    for (const item of state.items) {
      if (item.isComplete) {
        if (item.production === grammar.augmentedProduction) {
          write(EndOfInput, { type: 'accept' });
        }
        continue;
      }
      const next = item.nextSymbol;
      if (next instanceof Terminal) {
        const target = automaton.transition(state.index, next);
        if (target !== undefined) {
          write(next, { type: 'shift', state: target });
        }
      }
    }

    for (const item of state.items) {
      if (!item.isComplete || item.production === grammar.augmentedProduction) continue;
      const terminals = lookahead === 'slr' ? symbolSets.followOf(item.production.lhs) : everyTerminal;
      for (const terminal of terminals) {
        write(terminal, { type: 'reduce', production: item.production.index });
      }
    }

    const gotoRow = new Map<NonTerminal, number>();
    for (const t of automaton.transitionsFrom(state.index)) {
      if (t.symbol instanceof NonTerminal) {
        gotoRow.set(t.symbol, t.to);
      }
    }

    actionRows.push(row);
    gotoRows.push(gotoRow);
  }

  for (const conflict of conflicts) {
    debugTable(
      'conflict (%s) in state %d on %s: %d actions',
      conflict.kind,
      conflict.state,
      conflict.terminal.toString(),
      conflict.actions.length,
    );
  }
  debugTable('table: %d states, %d conflicts, lookahead %s', automaton.size, conflicts.length, lookahead);

  const tables = new ParseTables(
    grammar,
    new ActionTable(actionRows),
    new GotoTable(gotoRows),
    automaton.acceptState,
  );
  return {
    grammar,
    automaton,
    symbolSets,
    tables,
    conflicts,
    parseable: conflicts.length === 0,
  };
}
