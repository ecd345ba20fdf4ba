export type SymbolKind = 'terminal' | 'nonTerminal';

export abstract class GrammarSymbol {
  readonly name: string;
  abstract readonly kind: SymbolKind;

  constructor(name: string) {
    this.name = name;
  }

  isTerminal(): this is Terminal {
    return this.kind === 'terminal';
  }

  isNonTerminal(): this is NonTerminal {
    return this.kind === 'nonTerminal';
  }
}

/**
 * A terminal is either a literal (rendered `"text"`) or a named token class
 * such as an identifier (rendered `?name?`).
 */
export class Terminal extends GrammarSymbol {
  readonly kind = 'terminal';
  readonly isLiteral: boolean;

  constructor(name: string, isLiteral: boolean = true) {
    super(name);
    this.isLiteral = isLiteral;
  }

  toString(): string {
    if (this.isLiteral) {
      return `"${this.name.replace(/"/g, '""')}"`;
    }
    return `?${this.name.replace(/\?/g, '??')}?`;
  }
}

export class NonTerminal extends GrammarSymbol {
  readonly kind = 'nonTerminal';

  toString(): string {
    const visual = this.name.replace(/\\/g, '\\\\').replace(/</g, '\\<').replace(/>/g, '\\>');
    return `<${visual}>`;
  }
}

export type SpecialTerminalKind = 'EndOfInput';

export class SpecialTerminal extends Terminal {
  readonly special: SpecialTerminalKind;

  private static readonly instances = new Map<SpecialTerminalKind, SpecialTerminal>();

  private constructor(special: SpecialTerminalKind, name: string) {
    super(name, false);
    this.special = special;
  }

  static of(special: SpecialTerminalKind): SpecialTerminal {
    let instance = SpecialTerminal.instances.get(special);
    if (!instance) {
      instance = new SpecialTerminal(special, '$');
      SpecialTerminal.instances.set(special, instance);
    }
    return instance;
  }

  toString(): string {
    return this.name;
  }
}

/** Implicit end-of-input terminal shared by every grammar. */
export const EndOfInput = SpecialTerminal.of('EndOfInput');
