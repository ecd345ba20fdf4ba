import { describe, it, expect } from 'vitest';
import {
  Grammar,
  GrammarBuilder,
  Terminal,
  NonTerminal,
  SpecialTerminal,
  EndOfInput,
  Production,
  MalformedGrammarError,
  type GrammarDefinition,
} from '../src/index.js';

function expectMalformed(fn: () => unknown): MalformedGrammarError {
  try {
    fn();
  } catch (e) {
    expect(e).toBeInstanceOf(MalformedGrammarError);
    if (e instanceof MalformedGrammarError) return e;
  }
  throw new Error('expected a MalformedGrammarError');
}

const exprDefinition: GrammarDefinition = {
  terminals: ['+', 'id'],
  nonTerminals: ['S', 'E', 'T'],
  productions: [
    { lhs: 'S', rhs: ['E'] },
    { lhs: 'E', rhs: ['E', '+', 'T'] },
    { lhs: 'E', rhs: ['T'] },
    { lhs: 'T', rhs: ['id'] },
  ],
  start: 'S',
};

describe('Symbols', () => {
  it('renders literal terminals quoted', () => {
    const t = new Terminal('A "test" literal');
    expect(t.name).toBe('A "test" literal');
    expect(t.isLiteral).toBe(true);
    expect(t.toString()).toBe('"A ""test"" literal"');
  });

  it('renders named terminals between question marks', () => {
    const t = new Terminal('weird?', false);
    expect(t.toString()).toBe('?weird???');
  });

  it('renders non-terminals in angle brackets', () => {
    expect(new NonTerminal('expr').toString()).toBe('<expr>');
    expect(new NonTerminal('a<b>').toString()).toBe('<a\\<b\\>>');
  });

  it('reports its kind', () => {
    const t = new Terminal('x');
    const n = new NonTerminal('X');
    expect(t.kind).toBe('terminal');
    expect(t.isTerminal()).toBe(true);
    expect(n.isNonTerminal()).toBe(true);
    expect(n.isTerminal()).toBe(false);
  });

  it('provides a singleton end-of-input terminal', () => {
    expect(EndOfInput).toBe(SpecialTerminal.of('EndOfInput'));
    expect(EndOfInput).toBeInstanceOf(Terminal);
    expect(EndOfInput.name).toBe('$');
    expect(EndOfInput.toString()).toBe('$');
  });
});

describe('Production', () => {
  const expr = new NonTerminal('expr');
  const number = new Terminal('number', false);
  const plus = new Terminal('+');

  it('renders as a rule', () => {
    const p = new Production(0, expr, [number, plus, expr]);
    expect(p.toString()).toBe('<expr> ::= ?number? "+" <expr>');
  });

  it('renders an empty right-hand side as epsilon', () => {
    const p = new Production(1, expr, []);
    expect(p.isEpsilon).toBe(true);
    expect(p.length).toBe(0);
    expect(p.toString()).toBe('<expr> ::= ε');
  });

  it('compares by symbols, not by index', () => {
    const a = new Production(0, expr, [number, plus, expr]);
    const b = new Production(3, expr, [number, plus, expr]);
    const c = new Production(0, expr, [number, plus, number]);
    expect(a).not.toBe(b);
    expect(a.equals(b)).toBe(true);
    expect(a.equals(c)).toBe(false);
  });

  it('freezes the right-hand side', () => {
    const p = new Production(0, expr, [number]);
    expect(Object.isFrozen(p.rhs)).toBe(true);
  });
});

describe('GrammarBuilder', () => {
  it('turns unknown string references into cached literal terminals', () => {
    const g = new GrammarBuilder();
    const e = g.nonTerminal('E');
    g.production(e, [e, '+', 'x']).production(e, ['x']);
    const x = g.get('x');
    expect(x).toBeInstanceOf(Terminal);
    expect(g.resolve('x')).toBe(x);
    expect(g.get('+')).toBeInstanceOf(Terminal);
  });

  it('declares a non-terminal for an unknown left-hand side name', () => {
    const g = new GrammarBuilder();
    g.production('E', ['x']);
    expect(g.get('E')).toBeInstanceOf(NonTerminal);
  });

  it('returns the existing symbol when declared twice with the same kind', () => {
    const g = new GrammarBuilder();
    expect(g.terminal('a')).toBe(g.terminal('a'));
    expect(g.nonTerminal('A')).toBe(g.nonTerminal('A'));
  });

  it('rejects a name used as both a terminal and a non-terminal', () => {
    const g = new GrammarBuilder();
    g.terminal('a');
    const err = expectMalformed(() => g.nonTerminal('a'));
    expect(err.reason).toBe('ambiguous-symbol');
    expect(err.symbol).toBe('a');
  });

  it('reserves the end-of-input name', () => {
    const g = new GrammarBuilder();
    expect(expectMalformed(() => g.terminal('$')).reason).toBe('ambiguous-symbol');
  });

  it('rejects a terminal on the left-hand side', () => {
    const g = new GrammarBuilder();
    g.terminal('a');
    const err = expectMalformed(() => g.production('a', ['a']));
    expect(err.reason).toBe('terminal-left-hand-side');
    expect(err.symbol).toBe('a');
    expect(err.message).toBe(
      "Malformed grammar: terminal 'a' cannot appear on the left-hand side of a production",
    );
  });

  it('explains a forward reference that was taken as a terminal', () => {
    const g = new GrammarBuilder();
    g.production('E', ['T']);
    const err = expectMalformed(() => g.production('T', ['id']));
    expect(err.reason).toBe('terminal-left-hand-side');
    expect(err.symbol).toBe('T');
    expect(err.message).toBe(
      "Malformed grammar: terminal 'T' cannot appear on the left-hand side of a production; " +
        'it became a terminal when it was referenced before being declared, so declare it with nonTerminal() first',
    );
  });

  it('accepts forward references declared up front', () => {
    const g = new GrammarBuilder();
    g.nonTerminal('T');
    g.production('E', ['T']).production('T', ['id']);
    expect(g.get('T')).toBeInstanceOf(NonTerminal);
  });

  it('rejects symbol objects from another grammar with a taken name', () => {
    const g = new GrammarBuilder();
    g.terminal('x');
    expect(() => g.production('E', [new Terminal('x')])).toThrow("Symbol 'x' does not belong to this grammar");
  });

  it('throws for unknown names', () => {
    const g = new GrammarBuilder();
    expect(() => g.get('Missing')).toThrow("'Missing' not found");
    expect(g.find('Missing')).toBeUndefined();
  });

  it('builds a grammar with productions in declaration order', () => {
    const g = new GrammarBuilder();
    const e = g.nonTerminal('E');
    const t = g.nonTerminal('T');
    g.production(e, [e, '+', t]).production(e, [t]).production(t, ['id']);
    g.start = e;
    const grammar = g.build();
    expect(grammar.productions.map(p => p.toString())).toEqual([
      '<E> ::= <E> "+" <T>',
      '<E> ::= <T>',
      '<T> ::= "id"',
    ]);
    expect(grammar.productions.map(p => p.index)).toEqual([0, 1, 2]);
    expect(grammar.terminals.map(s => s.name)).toEqual(['+', 'id']);
    expect(grammar.nonTerminals.map(s => s.name)).toEqual(['E', 'T']);
  });
});

describe('Grammar', () => {
  it('groups productions by left-hand side', () => {
    const grammar = Grammar.from(exprDefinition);
    const e = grammar.symbol('E');
    expect(e).toBeInstanceOf(NonTerminal);
    if (!(e instanceof NonTerminal)) return;
    expect(grammar.productionsOf(e).map(p => p.index)).toEqual([1, 2]);
  });

  it('appends the augmented start production after the declared ones', () => {
    const grammar = Grammar.from(exprDefinition);
    expect(grammar.productions).toHaveLength(4);
    expect(grammar.augmentedStart.name).toBe("S'");
    expect(grammar.augmentedProduction.index).toBe(4);
    expect(grammar.augmentedProduction.toString()).toBe("<S'> ::= <S>");
    expect(grammar.productionAt(4)).toBe(grammar.augmentedProduction);
    expect(grammar.productionsOf(grammar.augmentedStart)).toEqual([grammar.augmentedProduction]);
    expect(grammar.indexedProductions).toHaveLength(5);
    expect(grammar.nonTerminals).not.toContain(grammar.augmentedStart);
  });

  it('picks an augmented name that does not collide', () => {
    const grammar = Grammar.from({
      terminals: ['x'],
      nonTerminals: ['S', "S'"],
      productions: [
        { lhs: 'S', rhs: ["S'"] },
        { lhs: "S'", rhs: ['x'] },
      ],
      start: 'S',
    });
    expect(grammar.augmentedStart.name).toBe("S''");
  });

  it('honours an explicit augmented start name', () => {
    const grammar = Grammar.from(exprDefinition, { augmentedStartName: 'Goal' });
    expect(grammar.augmentedStart.name).toBe('Goal');
    const err = expectMalformed(() => Grammar.from(exprDefinition, { augmentedStartName: 'E' }));
    expect(err.reason).toBe('ambiguous-symbol');
  });

  it('looks up symbols by name', () => {
    const grammar = Grammar.from(exprDefinition);
    expect(grammar.symbol('$')).toBe(EndOfInput);
    expect(grammar.symbol('id')).toBeInstanceOf(Terminal);
    expect(grammar.lookaheadTerminals.map(t => t.name)).toEqual(['+', 'id', '$']);
    expect(() => grammar.symbol('nope')).toThrow("'nope' not found");
    expect(() => grammar.productionAt(9)).toThrow('No production with index 9');
  });

  it('is immutable', () => {
    const grammar = Grammar.from(exprDefinition);
    expect(Object.isFrozen(grammar.productions)).toBe(true);
    expect(Object.isFrozen(grammar.terminals)).toBe(true);
    expect(Object.isFrozen(grammar.nonTerminals)).toBe(true);
  });
});

describe('Grammar validation', () => {
  it('names an undefined non-terminal on a right-hand side', () => {
    const err = expectMalformed(() =>
      Grammar.from({
        terminals: ['x'],
        nonTerminals: ['S', 'A'],
        productions: [{ lhs: 'S', rhs: ['A', 'x'] }],
        start: 'S',
      }),
    );
    expect(err.reason).toBe('undefined-non-terminal');
    expect(err.symbol).toBe('A');
    expect(err.message).toBe(
      `Malformed grammar: non-terminal 'A' is used in <S> ::= <A> "x" but has no productions`,
    );
  });

  it('names an undefined non-terminal declared through the builder', () => {
    const g = new GrammarBuilder();
    const s = g.nonTerminal('S');
    const a = g.nonTerminal('A');
    g.production(s, [a]);
    g.start = s;
    const err = expectMalformed(() => g.build());
    expect(err.reason).toBe('undefined-non-terminal');
    expect(err.symbol).toBe('A');
  });

  it('rejects undeclared symbol names', () => {
    const err = expectMalformed(() =>
      Grammar.from({
        terminals: [],
        nonTerminals: ['S'],
        productions: [{ lhs: 'S', rhs: ['q'] }],
        start: 'S',
      }),
    );
    expect(err.reason).toBe('undefined-symbol');
    expect(err.symbol).toBe('q');
  });

  it('requires a start symbol', () => {
    const err = expectMalformed(() => Grammar.from({ ...exprDefinition, start: null }));
    expect(err.reason).toBe('missing-start-symbol');
    expect(err.symbol).toBeNull();
  });

  it('requires the start symbol to be a declared non-terminal', () => {
    expect(expectMalformed(() => Grammar.from({ ...exprDefinition, start: 'Z' })).symbol).toBe('Z');
    expect(expectMalformed(() => Grammar.from({ ...exprDefinition, start: 'id' })).reason).toBe(
      'missing-start-symbol',
    );
  });

  it('requires the start symbol to have productions', () => {
    const err = expectMalformed(() =>
      Grammar.from({ terminals: ['x'], nonTerminals: ['S', 'A'], productions: [{ lhs: 'A', rhs: ['x'] }], start: 'S' }),
    );
    expect(err.reason).toBe('undefined-non-terminal');
    expect(err.symbol).toBe('S');
  });

  it('rejects a name declared as both kinds', () => {
    const err = expectMalformed(() =>
      Grammar.from({ ...exprDefinition, terminals: ['+', 'id', 'T'] }),
    );
    expect(err.reason).toBe('ambiguous-symbol');
    expect(err.symbol).toBe('T');
  });
});

describe('Grammar constructor validation', () => {
  const s = new NonTerminal('S');
  const x = new Terminal('x');

  it('builds from declared symbol objects', () => {
    const grammar = new Grammar([x], [s], [{ lhs: s, rhs: [x] }], s);
    expect(grammar.start).toBe(s);
    expect(grammar.lookaheadTerminals).toEqual([x, EndOfInput]);
  });

  it('reserves the end-of-input name for declared terminals', () => {
    const dollar = new Terminal('$');
    const err = expectMalformed(() => new Grammar([dollar], [s], [{ lhs: s, rhs: [dollar] }], s));
    expect(err.reason).toBe('ambiguous-symbol');
    expect(err.symbol).toBe('$');
    expect(err.message).toBe("Malformed grammar: '$' is reserved for end-of-input");
  });

  it('rejects the end-of-input terminal itself as a declared terminal', () => {
    const err = expectMalformed(() => new Grammar([EndOfInput], [s], [{ lhs: s, rhs: [EndOfInput] }], s));
    expect(err.reason).toBe('ambiguous-symbol');
    expect(err.symbol).toBe('$');
  });

  it('rejects a non-terminal named like end-of-input', () => {
    const err = expectMalformed(() => new Grammar([x], [s, new NonTerminal('$')], [{ lhs: s, rhs: [x] }], s));
    expect(err.reason).toBe('ambiguous-symbol');
  });

  it('rejects a name declared as both kinds', () => {
    const err = expectMalformed(
      () => new Grammar([x, new Terminal('S')], [s], [{ lhs: s, rhs: [x] }], s),
    );
    expect(err.reason).toBe('ambiguous-symbol');
    expect(err.symbol).toBe('S');
    expect(err.message).toBe("Malformed grammar: symbol 'S' is declared more than once");
  });

  it('rejects a right-hand side symbol that is not the declared object', () => {
    const err = expectMalformed(() => new Grammar([x], [s], [{ lhs: s, rhs: [new Terminal('x')] }], s));
    expect(err.reason).toBe('undefined-symbol');
    expect(err.symbol).toBe('x');
    expect(err.message).toBe("Malformed grammar: symbol 'x' in <S> is not declared");
  });

  it('rejects an undeclared left-hand side', () => {
    const a = new NonTerminal('A');
    const err = expectMalformed(() => new Grammar([x], [s], [{ lhs: s, rhs: [x] }, { lhs: a, rhs: [x] }], s));
    expect(err.reason).toBe('undefined-symbol');
    expect(err.symbol).toBe('A');
  });

  it('requires a start symbol', () => {
    const err = expectMalformed(() => new Grammar([x], [s], [{ lhs: s, rhs: [x] }], null));
    expect(err.reason).toBe('missing-start-symbol');
    expect(err.symbol).toBeNull();
  });

  it('requires the start symbol to be declared', () => {
    const other = new NonTerminal('S');
    const err = expectMalformed(() => new Grammar([x], [s], [{ lhs: s, rhs: [x] }], other));
    expect(err.reason).toBe('missing-start-symbol');
    expect(err.symbol).toBe('S');
  });
});
