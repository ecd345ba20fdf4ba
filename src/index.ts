export { Grammar, GrammarBuilder } from './Grammar.js';
export type {
  GrammarOptions,
  GrammarDefinition,
  ProductionDefinition,
  ProductionSpec,
  SymbolReference,
} from './Grammar.js';

export {
  GrammarSymbol,
  Terminal,
  NonTerminal,
  SpecialTerminal,
  EndOfInput,
} from './GrammarSymbol.js';
export type { SymbolKind, SpecialTerminalKind } from './GrammarSymbol.js';

export { MalformedGrammarError } from './GrammarError.js';
export type { MalformedGrammarReason } from './GrammarError.js';

export { Production } from './Production.js';

export {
  SymbolSets,
  computeNullable,
  computeFirstSets,
  computeFollowSets,
} from './SymbolSets.js';
export type { FixpointResult, SequenceFirst, TerminalSets } from './SymbolSets.js';

export { Item } from './Item.js';
export { ItemSet, closure, goto, transitionsOf } from './ItemSet.js';

export { Automaton, buildAutomaton } from './Automaton.js';
export type { State, Transition } from './Automaton.js';

export {
  ActionTable,
  GotoTable,
  ParseTables,
  buildParseTables,
  actionsEqual,
} from './ParseTable.js';
export type {
  Action,
  Conflict,
  ConflictKind,
  LookaheadMode,
  TableOptions,
  TableBuildResult,
} from './ParseTable.js';

export { formatAction, formatConflict, formatState } from './Diagnostics.js';
