export type MalformedGrammarReason =
  | 'undefined-non-terminal'
  | 'undefined-symbol'
  | 'missing-start-symbol'
  | 'terminal-left-hand-side'
  | 'ambiguous-symbol';

/** Raised when a grammar fails validation; no automaton is built from it. */
export class MalformedGrammarError extends Error {
  reason: MalformedGrammarReason;
  symbol: string | null;
  constructor(reason: MalformedGrammarReason, message: string, symbol: string | null = null) {
    super(`Malformed grammar: ${message}`);
    this.reason = reason;
    this.symbol = symbol;
  }
}
