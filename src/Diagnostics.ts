import type { Automaton } from './Automaton.js';
import type { Grammar } from './Grammar.js';
import type { Action, Conflict } from './ParseTable.js';

export function formatAction(action: Action, grammar: Grammar): string {
  switch (action.type) {
    case 'shift':
      return `shift ${action.state}`;
    case 'reduce':
      return `reduce ${grammar.productionAt(action.production).toString()}`;
    case 'accept':
      return 'accept';
  }
}

/** e.g. `shift/reduce conflict in state 5 on "+": shift 4 | reduce <E> ::= <E> "+" <E>` */
export function formatConflict(conflict: Conflict, grammar: Grammar): string {
  const actions = conflict.actions.map(a => formatAction(a, grammar)).join(' | ');
  return `${conflict.kind} conflict in state ${conflict.state} on ${conflict.terminal.toString()}: ${actions}`;
}

export function formatState(automaton: Automaton, index: number): string {
  const state = automaton.state(index);
  const lines = [`state ${index}`];
  for (const item of state.items) {
    lines.push(`  ${item.toString()}`);
  }
  for (const t of automaton.transitionsFrom(index)) {
    lines.push(`  ${t.symbol.toString()} -> ${t.to}`);
  }
  return lines.join('\n');
}
