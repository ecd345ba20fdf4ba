import { EndOfInput, GrammarSymbol, NonTerminal, Terminal } from './GrammarSymbol.js';
import { MalformedGrammarError } from './GrammarError.js';
import { Production } from './Production.js';
import { debugGrammar } from './log.js';

export interface GrammarOptions {
  /** Name of the synthetic start symbol. Defaults to the start name followed by `'`. */
  augmentedStartName?: string;
}

export type SymbolReference = GrammarSymbol | string;

export interface ProductionDefinition {
  lhs: string;
  rhs: readonly string[];
}

/** Plain-data grammar accepted by {@link Grammar.from}. Terminal names become literal terminals. */
export interface GrammarDefinition {
  terminals: readonly string[];
  nonTerminals: readonly string[];
  productions: readonly ProductionDefinition[];
  start: string | null;
}

export interface ProductionSpec {
  lhs: NonTerminal;
  rhs: GrammarSymbol[];
}

function assertNotReserved(name: string): void {
  if (name === EndOfInput.name) {
    throw new MalformedGrammarError('ambiguous-symbol', `'${name}' is reserved for end-of-input`, name);
  }
}

/**
 * Validated, immutable grammar. Productions keep the order they were declared
 * in; the synthetic `S' → start` production is appended after them and is not
 * part of {@link Grammar.productions}.
 */
export class Grammar {
  readonly options: GrammarOptions;
  readonly terminals: readonly Terminal[];
  readonly nonTerminals: readonly NonTerminal[];
  readonly productions: readonly Production[];
  readonly start: NonTerminal;
  readonly augmentedStart: NonTerminal;
  readonly augmentedProduction: Production;
  private readonly allProductions: readonly Production[];
  private readonly productionsByLhs: Map<NonTerminal, Production[]> = new Map();
  private readonly symbolsByName: Map<string, GrammarSymbol> = new Map();

  constructor(
    terminals: readonly Terminal[],
    nonTerminals: readonly NonTerminal[],
    productions: readonly ProductionSpec[],
    start: NonTerminal | null,
    options?: GrammarOptions,
  ) {
    this.options = options ?? {};

    for (const sym of [...terminals, ...nonTerminals]) {
      assertNotReserved(sym.name);
      const existing = this.symbolsByName.get(sym.name);
      if (existing && existing !== sym) {
        throw new MalformedGrammarError(
          'ambiguous-symbol',
          `symbol '${sym.name}' is declared more than once`,
          sym.name,
        );
      }
      this.symbolsByName.set(sym.name, sym);
    }

    if (!start) {
      throw new MalformedGrammarError('missing-start-symbol', 'no start symbol was given');
    }
    if (this.symbolsByName.get(start.name) !== start) {
      throw new MalformedGrammarError(
        'missing-start-symbol',
        `start symbol '${start.name}' is not a declared non-terminal`,
        start.name,
      );
    }

    this.terminals = Object.freeze([...terminals]);
    this.nonTerminals = Object.freeze([...nonTerminals]);
    this.start = start;

    const built = productions.map((spec, index) => {
      if (this.symbolsByName.get(spec.lhs.name) !== spec.lhs) {
        throw new MalformedGrammarError(
          'undefined-symbol',
          `left-hand side '${spec.lhs.name}' is not declared`,
          spec.lhs.name,
        );
      }
      for (const sym of spec.rhs) {
        if (this.symbolsByName.get(sym.name) !== sym) {
          throw new MalformedGrammarError(
            'undefined-symbol',
            `symbol '${sym.name}' in ${spec.lhs.toString()} is not declared`,
            sym.name,
          );
        }
      }
      const production = new Production(index, spec.lhs, spec.rhs);
      this.addProduction(production);
      return production;
    });
    this.productions = Object.freeze(built);

    if (!this.productionsByLhs.has(start)) {
      throw new MalformedGrammarError(
        'undefined-non-terminal',
        `start symbol '${start.name}' has no productions`,
        start.name,
      );
    }
    for (const production of this.productions) {
      for (const sym of production.rhs) {
        if (sym instanceof NonTerminal && !this.productionsByLhs.has(sym)) {
          throw new MalformedGrammarError(
            'undefined-non-terminal',
            `non-terminal '${sym.name}' is used in ${production.toString()} but has no productions`,
            sym.name,
          );
        }
      }
    }

    this.augmentedStart = new NonTerminal(this.augmentedName());
    this.augmentedProduction = new Production(this.productions.length, this.augmentedStart, [start]);
    this.addProduction(this.augmentedProduction);
    this.allProductions = Object.freeze([...this.productions, this.augmentedProduction]);

    debugGrammar(
      'grammar: %d terminals, %d non-terminals, %d productions, start %s',
      this.terminals.length,
      this.nonTerminals.length,
      this.productions.length,
      start.name,
    );
  }

  static from(definition: GrammarDefinition, options?: GrammarOptions): Grammar {
    const builder = new GrammarBuilder(options);
    for (const name of definition.terminals) {
      builder.terminal(name);
    }
    for (const name of definition.nonTerminals) {
      builder.nonTerminal(name);
    }

    const lookup = (name: string): GrammarSymbol => {
      const sym = builder.find(name);
      if (!sym) {
        throw new MalformedGrammarError('undefined-symbol', `symbol '${name}' is not declared`, name);
      }
      return sym;
    };

    for (const { lhs, rhs } of definition.productions) {
      builder.production(lookup(lhs), rhs.map(lookup));
    }

    if (definition.start !== null) {
      const start = builder.find(definition.start);
      if (!(start instanceof NonTerminal)) {
        throw new MalformedGrammarError(
          'missing-start-symbol',
          `start symbol '${definition.start}' is not a declared non-terminal`,
          definition.start,
        );
      }
      builder.start = start;
    }
    return builder.build();
  }

  /** Every production including the augmented one, indexed by {@link Production.index}. */
  get indexedProductions(): readonly Production[] {
    return this.allProductions;
  }

  /** All terminals the action table is keyed by, end-of-input last. */
  get lookaheadTerminals(): readonly Terminal[] {
    return [...this.terminals, EndOfInput];
  }

  productionAt(index: number): Production {
    const production = this.allProductions[index];
    if (!production) {
      throw new Error(`No production with index ${index}`);
    }
    return production;
  }

  productionsOf(nonTerminal: NonTerminal): readonly Production[] {
    return this.productionsByLhs.get(nonTerminal) ?? [];
  }

  symbol(name: string): GrammarSymbol {
    if (name === EndOfInput.name) {
      return EndOfInput;
    }
    const sym = this.symbolsByName.get(name);
    if (!sym) {
      throw new Error(`Grammar symbol '${name}' not found`);
    }
    return sym;
  }

  private addProduction(production: Production): void {
    let list = this.productionsByLhs.get(production.lhs);
    if (!list) {
      list = [];
      this.productionsByLhs.set(production.lhs, list);
    }
    list.push(production);
  }

  private augmentedName(): string {
    const requested = this.options.augmentedStartName;
    if (requested !== undefined) {
      if (this.symbolsByName.has(requested) || requested === EndOfInput.name) {
        throw new MalformedGrammarError(
          'ambiguous-symbol',
          `augmented start name '${requested}' collides with a declared symbol`,
          requested,
        );
      }
      return requested;
    }
    let name = `${this.start.name}'`;
    while (this.symbolsByName.has(name)) {
      name += "'";
    }
    return name;
  }
}

/**
 * Mutable construction API. Symbols are registered by name; string references
 * to names that are not yet declared become literal terminals, so a
 * non-terminal used on a right-hand side before its own productions must be
 * declared with {@link GrammarBuilder.nonTerminal} first.
 */
export class GrammarBuilder {
  readonly options: GrammarOptions;
  start: NonTerminal | null = null;
  private readonly symbols: Map<string, GrammarSymbol> = new Map();
  private readonly productionSpecs: ProductionSpec[] = [];
  /** Names that became terminals only because a right-hand side mentioned them first. */
  private readonly implicitTerminals: Set<string> = new Set();

  constructor(options?: GrammarOptions) {
    this.options = options ?? {};
  }

  terminal(name: string, isLiteral: boolean = true): Terminal {
    const existing = this.symbols.get(name);
    if (existing instanceof Terminal) {
      return existing;
    }
    return this.register(new Terminal(name, isLiteral));
  }

  nonTerminal(name: string): NonTerminal {
    const existing = this.symbols.get(name);
    if (existing instanceof NonTerminal) {
      return existing;
    }
    return this.register(new NonTerminal(name));
  }

  production(lhs: SymbolReference, rhs: readonly SymbolReference[]): this {
    const head = typeof lhs === 'string' ? this.symbols.get(lhs) ?? this.nonTerminal(lhs) : this.resolve(lhs);
    if (!(head instanceof NonTerminal)) {
      const hint = this.implicitTerminals.has(head.name)
        ? '; it became a terminal when it was referenced before being declared, so declare it with nonTerminal() first'
        : '';
      throw new MalformedGrammarError(
        'terminal-left-hand-side',
        `terminal '${head.name}' cannot appear on the left-hand side of a production${hint}`,
        head.name,
      );
    }
    this.productionSpecs.push({ lhs: head, rhs: rhs.map(r => this.resolve(r)) });
    return this;
  }

  find(name: string): GrammarSymbol | undefined {
    return this.symbols.get(name);
  }

  get(name: string): GrammarSymbol {
    const sym = this.symbols.get(name);
    if (!sym) {
      throw new Error(`Grammar symbol '${name}' not found`);
    }
    return sym;
  }

  resolve(ref: SymbolReference): GrammarSymbol {
    if (ref instanceof GrammarSymbol) {
      const existing = this.symbols.get(ref.name);
      if (!existing) {
        return this.register(ref);
      }
      if (existing !== ref) {
        throw new Error(`Symbol '${ref.name}' does not belong to this grammar`);
      }
      return ref;
    }
    const existing = this.symbols.get(ref);
    if (existing) {
      return existing;
    }
    this.implicitTerminals.add(ref);
    return this.terminal(ref);
  }

  build(): Grammar {
    const terminals: Terminal[] = [];
    const nonTerminals: NonTerminal[] = [];
    for (const sym of this.symbols.values()) {
      if (sym instanceof Terminal) {
        terminals.push(sym);
      } else if (sym instanceof NonTerminal) {
        nonTerminals.push(sym);
      }
    }
    return new Grammar(terminals, nonTerminals, this.productionSpecs, this.start, this.options);
  }

  private register<T extends GrammarSymbol>(sym: T): T {
    assertNotReserved(sym.name);
    const existing = this.symbols.get(sym.name);
    if (existing) {
      throw new MalformedGrammarError(
        'ambiguous-symbol',
        `'${sym.name}' is already declared as a ${existing.isTerminal() ? 'terminal' : 'non-terminal'}`,
        sym.name,
      );
    }
    this.symbols.set(sym.name, sym);
    return sym;
  }
}
