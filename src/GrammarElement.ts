export interface TerminalOptions {
  name?: string;
  /** Trivia matches (whitespace, comments) are kept in the CST but skipped by AST lowering. */
  trivia?: boolean;
}

/**
 * A terminal matcher. `match` returns the end offset of a match starting at
 * `offset`, or -1 when the terminal does not match there.
 */
export abstract class Terminal {
  readonly kind = 'terminal' as const;
  name: string | null;
  readonly trivia: boolean;

  protected constructor(options?: TerminalOptions) {
    this.name = options?.name ?? null;
    this.trivia = options?.trivia ?? false;
  }

  abstract match(input: string, offset: number): number;

  /** Human-readable form used in "expected ..." diagnostics. */
  abstract describe(): string;
}

export interface LiteralOptions extends TerminalOptions {
  caseInsensitive?: boolean;
}

export class LiteralTerminal extends Terminal {
  readonly text: string;
  readonly caseInsensitive: boolean;
  private readonly folded: string;

  constructor(text: string, options?: LiteralOptions) {
    super(options);
    this.text = text;
    this.caseInsensitive = options?.caseInsensitive ?? false;
    this.folded = this.caseInsensitive ? text.toLowerCase() : text;
  }

  match(input: string, offset: number): number {
    if (this.caseInsensitive) {
      const slice = input.slice(offset, offset + this.text.length);
      return slice.toLowerCase() === this.folded ? offset + this.text.length : -1;
    }
    return input.startsWith(this.text, offset) ? offset + this.text.length : -1;
  }

  describe(): string {
    return this.name ?? `'${this.text}'`;
  }
}

/** Inclusive code point range, written as characters: `['a', 'z']`. */
export type CharacterRange = readonly [string, string];

export interface CharacterClassOptions extends TerminalOptions {
  negated?: boolean;
}

/** Matches exactly one code point inside (or, when negated, outside) its ranges. */
export class CharacterClass extends Terminal {
  readonly ranges: ReadonlyArray<readonly [number, number]>;
  readonly negated: boolean;

  constructor(ranges: CharacterRange[], options?: CharacterClassOptions) {
    super(options);
    this.ranges = ranges.map(([from, to]) => {
      const low = codePoint(from);
      const high = codePoint(to);
      if (low > high) {
        throw new RangeError(`Empty character range '${from}'-'${to}'`);
      }
      return [low, high] as const;
    });
    this.negated = options?.negated ?? false;
  }

  match(input: string, offset: number): number {
    const cp = input.codePointAt(offset);
    if (cp === undefined) return -1;
    const inside = this.ranges.some(([low, high]) => cp >= low && cp <= high);
    if (inside === this.negated) return -1;
    return offset + (cp > 0xffff ? 2 : 1);
  }

  describe(): string {
    if (this.name) return this.name;
    const body = this.ranges
      .map(([low, high]) =>
        low === high ? String.fromCodePoint(low) : `${String.fromCodePoint(low)}-${String.fromCodePoint(high)}`,
      )
      .join('');
    return `[${this.negated ? '^' : ''}${body}]`;
  }
}

function codePoint(ch: string): number {
  const cp = ch.codePointAt(0);
  if (cp === undefined || String.fromCodePoint(cp) !== ch) {
    throw new RangeError(`Character range bound must be a single character, got '${ch}'`);
  }
  return cp;
}

export class PatternTerminal extends Terminal {
  readonly pattern: RegExp;
  private readonly sticky: RegExp;

  constructor(pattern: RegExp, options?: TerminalOptions) {
    super(options);
    this.pattern = pattern;
    const flags = pattern.flags.replace(/[gy]/g, '');
    this.sticky = new RegExp(pattern.source, flags + 'y');
  }

  match(input: string, offset: number): number {
    this.sticky.lastIndex = offset;
    const m = this.sticky.exec(input);
    return m ? offset + m[0].length : -1;
  }

  describe(): string {
    return this.name ?? `/${this.pattern.source}/`;
  }
}

/** Zero-width terminal that only matches once the whole input has been consumed. */
export class EndOfInput extends Terminal {
  constructor() {
    super({ name: 'end of input' });
  }

  match(input: string, offset: number): number {
    return offset >= input.length ? offset : -1;
  }

  describe(): string {
    return 'end of input';
  }
}

export const EndOfFile = new EndOfInput();

// ─── Nonterminals & productions ───────────────────────────────────────────────

/**
 * How a nonterminal came to exist. Everything except `rule` is synthesized by
 * the grammar builder when it desugars `optional`, `repeat` and `choice`.
 */
export type NonterminalKind = 'rule' | 'optional' | 'repetition' | 'group';

export class Nonterminal {
  readonly kind = 'nonterminal' as const;
  readonly name: string;
  readonly type: NonterminalKind;
  readonly allowEmpty: boolean;
  readonly productions: Production[] = [];

  constructor(name: string, type: NonterminalKind, allowEmpty: boolean) {
    this.name = name;
    this.type = type;
    this.allowEmpty = allowEmpty;
  }

  get synthetic(): boolean {
    return this.type !== 'rule';
  }
}

export type GrammarSymbol = Terminal | Nonterminal;

export interface ProductionItem {
  readonly symbol: GrammarSymbol;
  readonly label: string | null;
}

export class Production {
  readonly id: number;
  readonly nonterminal: Nonterminal;
  /** Position among the nonterminal's alternatives, in declaration order. */
  readonly index: number;
  readonly label: string | null;
  readonly items: readonly ProductionItem[];
  readonly slots: readonly GrammarSlot[];

  constructor(id: number, nonterminal: Nonterminal, index: number, label: string | null, items: ProductionItem[], firstSlotId: number) {
    this.id = id;
    this.nonterminal = nonterminal;
    this.index = index;
    this.label = label;
    this.items = items;
    const slots: GrammarSlot[] = [];
    for (let dot = 0; dot <= items.length; dot++) {
      slots.push(new GrammarSlot(firstSlotId + dot, this, dot));
    }
    this.slots = slots;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  toString(): string {
    const rhs = this.items.length === 0 ? 'ε' : this.items.map(i => describeSymbol(i.symbol)).join(' ');
    return `${this.nonterminal.name} ::= ${rhs}`;
  }
}

/**
 * A grammar position: a production with a dot before item `dot`. The GLL engine
 * labels descriptors, GSS nodes and intermediate SPPF nodes with slots.
 */
export class GrammarSlot {
  readonly id: number;
  readonly production: Production;
  readonly dot: number;

  constructor(id: number, production: Production, dot: number) {
    this.id = id;
    this.production = production;
    this.dot = dot;
  }

  get atEnd(): boolean {
    return this.dot === this.production.items.length;
  }

  /** The symbol right after the dot, or null at the end of the production. */
  get next(): GrammarSymbol | null {
    return this.atEnd ? null : this.production.items[this.dot].symbol;
  }

  get following(): GrammarSlot {
    return this.production.slots[this.dot + 1];
  }

  toString(): string {
    const parts = this.production.items.map(i => describeSymbol(i.symbol));
    parts.splice(this.dot, 0, '·');
    return `${this.production.nonterminal.name} ::= ${parts.join(' ')}`;
  }
}

export function describeSymbol(symbol: GrammarSymbol): string {
  return symbol.kind === 'terminal' ? symbol.describe() : symbol.name;
}
