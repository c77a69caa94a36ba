import { GrammarError } from './Errors.js';
import {
  Grammar,
  ref,
  type ItemDefinition,
  type NonterminalReference,
  type ProductionDefinition,
  type RuleDefinition,
  type SymbolDefinition,
} from './Grammar.js';
import {
  CharacterClass,
  LiteralTerminal,
  PatternTerminal,
  Terminal,
  type CharacterClassOptions,
  type CharacterRange,
  type LiteralOptions,
  type NonterminalKind,
  type TerminalOptions,
} from './GrammarElement.js';

export interface LabeledReference {
  readonly kind: 'labeled';
  readonly label: string;
  readonly element: ElementReference;
}

/** Plain strings are literal terminals. Use `nt(name)` to reference a nonterminal. */
export type ElementReference = Terminal | NonterminalReference | LabeledReference | string;

export type AlternativeDefinition = ElementReference[] | { label?: string; items: ElementReference[] };

export interface GrammarOptions {
  trivia?: Terminal[];
  allowEmpty?: boolean;
}

export interface RuleOptions {
  allowEmpty?: boolean;
}

export interface RepeatOptions {
  /** 0 or 1; larger minimums are spelled out in the enclosing rule. */
  min?: number;
  separator?: ElementReference;
  allowTrailing?: boolean;
}

/** Item labels the builder gives to the pieces of synthesized nonterminals. */
export const ELEMENT_LABEL = 'element';
export const SEPARATOR_LABEL = 'separator';

/**
 * Mutable, programmatic grammar construction. `optional`, `repeat` and `choice`
 * desugar into synthesized nonterminals; `build` validates everything into an
 * immutable `Grammar`.
 */
export class GrammarBuilder {
  readonly options: GrammarOptions;
  private readonly rules: RuleDefinition[] = [];
  private readonly ruleNames = new Set<string>();
  private readonly namedTerminals = new Map<string, Terminal>();
  private readonly fixedStringTerminals = new Map<string, LiteralTerminal>();
  private readonly trivia: Terminal[] = [];

  constructor(options?: GrammarOptions) {
    this.options = options ?? {};
    for (const t of this.options.trivia ?? []) {
      this.addTrivia(t);
    }
  }

  terminal(pattern: RegExp | string, name?: string): Terminal {
    const t = typeof pattern === 'string' ? new LiteralTerminal(pattern, { name }) : new PatternTerminal(pattern, { name });
    return this.registerTerminal(t);
  }

  literal(text: string, options?: LiteralOptions): LiteralTerminal {
    return this.registerTerminal(new LiteralTerminal(text, options));
  }

  charClass(ranges: CharacterRange[], options?: CharacterClassOptions): CharacterClass {
    return this.registerTerminal(new CharacterClass(ranges, options));
  }

  pattern(regex: RegExp, options?: TerminalOptions): PatternTerminal {
    return this.registerTerminal(new PatternTerminal(regex, options));
  }

  /** Add trivia terminals skipped implicitly around every token. Each must be created with `trivia: true`. */
  addTrivia(...terminals: Terminal[]): this {
    for (const t of terminals) {
      if (!t.trivia) {
        throw new GrammarError(`Trivia terminal ${t.describe()} is not flagged as trivia; create it with { trivia: true }`);
      }
      if (!this.trivia.includes(t)) this.trivia.push(t);
    }
    return this;
  }

  nt(name: string): NonterminalReference {
    return ref(name);
  }

  label(label: string, element: ElementReference): LabeledReference {
    return { kind: 'labeled', label, element };
  }

  rule(name: string, alternatives: AlternativeDefinition[], options?: RuleOptions): NonterminalReference {
    const productions = alternatives.map(alt =>
      Array.isArray(alt) ? this.production(alt) : this.production(alt.items, alt.label),
    );
    return this.define({ name, productions, allowEmpty: options?.allowEmpty }, 'rule');
  }

  optional(element: ElementReference): NonterminalReference {
    const inner = this.resolveUnlabeled(element, 'optional');
    return this.define(
      {
        name: this.syntheticName(`${describeDefinition(inner)}?`),
        productions: [{ items: [] }, { items: [{ symbol: inner, label: ELEMENT_LABEL }] }],
      },
      'optional',
    );
  }

  repeat(element: ElementReference, options?: RepeatOptions): NonterminalReference {
    const min = options?.min ?? 0;
    if (min !== 0 && min !== 1) {
      throw new GrammarError(`Repetition minimum must be 0 or 1, got ${min}`);
    }
    const inner = this.resolveUnlabeled(element, 'repeat');
    const elementItem: ItemDefinition = { symbol: inner, label: ELEMENT_LABEL };
    const base = describeDefinition(inner);

    if (options?.separator === undefined) {
      const name = this.syntheticName(`${base}${min === 0 ? '*' : '+'}`);
      const self = ref(name);
      return this.define(
        {
          name,
          productions: [
            { items: min === 0 ? [] : [elementItem] },
            { items: [{ symbol: self }, elementItem] },
          ],
        },
        'repetition',
      );
    }

    const separator = this.resolveUnlabeled(options.separator, 'repeat separator');
    const separatorItem: ItemDefinition = { symbol: separator, label: SEPARATOR_LABEL };
    const listName = this.syntheticName(`${base}+/${describeDefinition(separator)}`);
    const list = this.define(
      {
        name: listName,
        productions: [{ items: [elementItem] }, { items: [{ symbol: ref(listName) }, separatorItem, elementItem] }],
      },
      'repetition',
    );

    if (min === 1 && !options.allowTrailing) {
      return list;
    }

    const productions: ProductionDefinition[] = [];
    if (min === 0) productions.push({ items: [] });
    productions.push({ items: [{ symbol: list }] });
    if (options.allowTrailing) productions.push({ items: [{ symbol: list }, separatorItem] });
    const suffix = `${min === 0 ? '*' : '+'}/${describeDefinition(separator)}${options.allowTrailing ? ',' : ''}`;
    return this.define({ name: this.syntheticName(`${base}${suffix}`), productions }, 'repetition');
  }

  choice(alternatives: AlternativeDefinition[]): NonterminalReference {
    const productions = alternatives.map(alt =>
      Array.isArray(alt) ? this.production(alt) : this.production(alt.items, alt.label),
    );
    const body = productions.map(p => p.items.map(i => describeDefinition(i.symbol)).join(' ')).join(' | ');
    return this.define({ name: this.syntheticName(`(${body})`), productions }, 'group');
  }

  /** Resolve a reference to a symbol. Strings become cached fixed-string terminals. */
  resolve(element: ElementReference): SymbolDefinition {
    if (typeof element === 'string') {
      let t = this.fixedStringTerminals.get(element);
      if (!t) {
        t = new LiteralTerminal(element);
        this.fixedStringTerminals.set(element, t);
      }
      return t;
    }
    if (element instanceof Terminal) {
      return element;
    }
    if (element.kind === 'labeled') {
      return this.resolve(element.element);
    }
    return element;
  }

  build(start: string): Grammar {
    return new Grammar({
      start,
      rules: this.rules.map(r => ({ ...r, productions: r.productions.map(p => ({ ...p, items: [...p.items] })) })),
      trivia: [...this.trivia],
      allowEmpty: this.options.allowEmpty,
    });
  }

  private production(elements: ElementReference[], label?: string): ProductionDefinition {
    const items = elements.map(e => this.item(e));
    return label === undefined ? { items } : { label, items };
  }

  private item(element: ElementReference): ItemDefinition {
    if (typeof element !== 'string' && !(element instanceof Terminal) && element.kind === 'labeled') {
      return { symbol: this.resolve(element.element), label: element.label };
    }
    return { symbol: this.resolve(element) };
  }

  private resolveUnlabeled(element: ElementReference, context: string): SymbolDefinition {
    if (typeof element !== 'string' && !(element instanceof Terminal) && element.kind === 'labeled') {
      throw new GrammarError(`Label '${element.label}' cannot be applied inside ${context}; label the ${context} itself`);
    }
    return this.resolve(element);
  }

  private define(rule: RuleDefinition, type: NonterminalKind): NonterminalReference {
    if (this.ruleNames.has(rule.name)) {
      throw new GrammarError(`Duplicate nonterminal '${rule.name}'`, { nonterminal: rule.name });
    }
    this.ruleNames.add(rule.name);
    this.rules.push({ ...rule, type });
    return ref(rule.name);
  }

  private syntheticName(base: string): string {
    let name = base;
    for (let n = 2; this.ruleNames.has(name); n++) {
      name = `${base}#${n}`;
    }
    return name;
  }

  private registerTerminal<T extends Terminal>(t: T): T {
    if (t.name) {
      if (this.namedTerminals.has(t.name)) {
        throw new GrammarError(`Duplicate terminal name: '${t.name}'`);
      }
      this.namedTerminals.set(t.name, t);
    }
    return t;
  }
}

function describeDefinition(symbol: SymbolDefinition): string {
  return symbol instanceof Terminal ? symbol.describe() : symbol.name;
}
