import { GrammarError } from './Errors.js';
import {
  Nonterminal,
  Production,
  Terminal,
  type GrammarSymbol,
  type NonterminalKind,
  type ProductionItem,
} from './GrammarElement.js';
import { getLogger } from './Logger.js';

// ─── Definition (what front-ends and the builder hand to the engine) ──────────

export interface NonterminalReference {
  readonly kind: 'ref';
  readonly name: string;
}

export function ref(name: string): NonterminalReference {
  return { kind: 'ref', name };
}

export type SymbolDefinition = Terminal | NonterminalReference;

export interface ItemDefinition {
  symbol: SymbolDefinition;
  label?: string;
}

export interface ProductionDefinition {
  label?: string;
  items: ItemDefinition[];
}

export interface RuleDefinition {
  name: string;
  productions: ProductionDefinition[];
  /** Overrides `GrammarDefinition.allowEmpty` for this nonterminal. */
  allowEmpty?: boolean;
  type?: NonterminalKind;
}

export interface GrammarDefinition {
  start: string;
  rules: RuleDefinition[];
  /** Terminals skipped implicitly around every token; each must be flagged as trivia. */
  trivia?: Terminal[];
  /** Whether declared rules may have empty productions. Defaults to true. */
  allowEmpty?: boolean;
}

export interface FirstSet {
  readonly terminals: ReadonlySet<Terminal>;
  /** The production can derive the empty string. */
  readonly nullable: boolean;
}

// ─── Grammar ──────────────────────────────────────────────────────────────────

/**
 * Validated, read-only grammar model. Productions of each nonterminal keep
 * their declaration order, which is also the default disambiguation order.
 */
export class Grammar {
  readonly start: Nonterminal;
  readonly trivia: readonly Terminal[];
  readonly nonterminals: ReadonlyMap<string, Nonterminal>;
  readonly productions: readonly Production[];
  readonly terminals: readonly Terminal[];

  private readonly terminalIds = new Map<Terminal, number>();
  private readonly nullableSet = new Set<Nonterminal>();
  private readonly firstSets = new Map<Production, FirstSet>();

  constructor(definition: GrammarDefinition) {
    if (!definition.start) {
      throw new GrammarError('Grammar has no start symbol');
    }

    const nonterminals = new Map<string, Nonterminal>();
    for (const rule of definition.rules) {
      if (nonterminals.has(rule.name)) {
        throw new GrammarError(`Duplicate nonterminal '${rule.name}'`, { nonterminal: rule.name });
      }
      const type = rule.type ?? 'rule';
      const allowEmpty =
        type === 'optional' || type === 'repetition'
          ? true
          : rule.allowEmpty ?? definition.allowEmpty ?? true;
      nonterminals.set(rule.name, new Nonterminal(rule.name, type, allowEmpty));
    }

    const start = nonterminals.get(definition.start);
    if (!start) {
      throw new GrammarError(`Start symbol '${definition.start}' is not defined`, {
        nonterminal: definition.start,
      });
    }

    const productions: Production[] = [];
    let slotId = 0;
    for (const rule of definition.rules) {
      const owner = nonterminals.get(rule.name);
      if (!owner) continue;
      if (rule.productions.length === 0) {
        throw new GrammarError(`Nonterminal '${rule.name}' has no productions`, { nonterminal: rule.name });
      }
      const labels = new Set<string>();
      rule.productions.forEach((def, index) => {
        if (def.label !== undefined) {
          if (labels.has(def.label)) {
            throw new GrammarError(`Duplicate production label '${def.label}' in '${rule.name}'`, {
              nonterminal: rule.name,
              productionIndex: index,
            });
          }
          labels.add(def.label);
        }
        if (def.items.length === 0 && !owner.allowEmpty) {
          throw new GrammarError(`Empty production ${rule.name}#${index} is not allowed`, {
            nonterminal: rule.name,
            productionIndex: index,
          });
        }
        const items: ProductionItem[] = def.items.map(item => ({
          symbol: this.resolveSymbol(item.symbol, nonterminals, rule.name, index),
          label: item.label ?? null,
        }));
        const production = new Production(productions.length, owner, index, def.label ?? null, items, slotId);
        slotId += items.length + 1;
        owner.productions.push(production);
        productions.push(production);
      });
    }

    const trivia = definition.trivia ?? [];
    for (const t of trivia) {
      if (!t.trivia) {
        throw new GrammarError(`Trivia terminal ${t.describe()} is not flagged as trivia`);
      }
    }

    this.start = start;
    this.trivia = Object.freeze([...trivia]);
    this.nonterminals = nonterminals;
    this.productions = Object.freeze(productions);

    const terminals: Terminal[] = [];
    const register = (t: Terminal) => {
      if (!this.terminalIds.has(t)) {
        this.terminalIds.set(t, terminals.length);
        terminals.push(t);
      }
    };
    for (const p of productions) {
      for (const item of p.items) {
        if (item.symbol.kind === 'terminal') register(item.symbol);
      }
    }
    trivia.forEach(register);
    this.terminals = Object.freeze(terminals);

    for (const nt of nonterminals.values()) {
      Object.freeze(nt.productions);
    }

    this.computeNullable();
    this.computeFirstSets();
    this.reportUselessNonterminals();
  }

  nonterminal(name: string): Nonterminal {
    const nt = this.nonterminals.get(name);
    if (!nt) {
      throw new GrammarError(`Nonterminal '${name}' not found`, { nonterminal: name });
    }
    return nt;
  }

  productionsOf(name: string): readonly Production[] {
    return this.nonterminal(name).productions;
  }

  /** Resolve a production by index or label; null when it does not exist. */
  production(name: string, selector: number | string): Production | null {
    const nt = this.nonterminals.get(name);
    if (!nt) return null;
    if (typeof selector === 'number') {
      return nt.productions[selector] ?? null;
    }
    return nt.productions.find(p => p.label === selector) ?? null;
  }

  terminalId(terminal: Terminal): number {
    const id = this.terminalIds.get(terminal);
    if (id === undefined) {
      throw new GrammarError(`Terminal ${terminal.describe()} does not belong to this grammar`);
    }
    return id;
  }

  isNullable(symbol: GrammarSymbol): boolean {
    return symbol.kind === 'nonterminal' && this.nullableSet.has(symbol);
  }

  firstOf(production: Production): FirstSet {
    const first = this.firstSets.get(production);
    if (!first) {
      throw new GrammarError(`Production ${production.toString()} does not belong to this grammar`);
    }
    return first;
  }

  get slotCount(): number {
    return this.productions.reduce((n, p) => n + p.slots.length, 0);
  }

  // ─── Analysis ─────────────────────────────────────────────────────────

  private resolveSymbol(
    symbol: SymbolDefinition,
    nonterminals: Map<string, Nonterminal>,
    owner: string,
    index: number,
  ): GrammarSymbol {
    if (symbol instanceof Terminal) {
      return symbol;
    }
    const nt = nonterminals.get(symbol.name);
    if (!nt) {
      throw new GrammarError(`Undefined nonterminal '${symbol.name}' referenced by ${owner}#${index}`, {
        nonterminal: owner,
        productionIndex: index,
      });
    }
    return nt;
  }

  private computeNullable(): void {
    let changed = true;
    while (changed) {
      changed = false;
      for (const p of this.productions) {
        if (this.nullableSet.has(p.nonterminal)) continue;
        if (p.items.every(i => this.isNullable(i.symbol))) {
          this.nullableSet.add(p.nonterminal);
          changed = true;
        }
      }
    }
  }

  private computeFirstSets(): void {
    const byNonterminal = new Map<Nonterminal, Set<Terminal>>();
    for (const nt of this.nonterminals.values()) {
      byNonterminal.set(nt, new Set());
    }

    const firstOfItems = (p: Production, into: Set<Terminal>): boolean => {
      let grew = false;
      for (const item of p.items) {
        const symbol = item.symbol;
        if (symbol.kind === 'terminal') {
          if (!into.has(symbol)) {
            into.add(symbol);
            grew = true;
          }
          return grew;
        }
        for (const t of byNonterminal.get(symbol) ?? []) {
          if (!into.has(t)) {
            into.add(t);
            grew = true;
          }
        }
        if (!this.nullableSet.has(symbol)) return grew;
      }
      return grew;
    };

    let changed = true;
    while (changed) {
      changed = false;
      for (const p of this.productions) {
        const target = byNonterminal.get(p.nonterminal);
        if (target && firstOfItems(p, target)) changed = true;
      }
    }

    for (const p of this.productions) {
      const terminals = new Set<Terminal>();
      firstOfItems(p, terminals);
      this.firstSets.set(p, {
        terminals,
        nullable: p.items.every(i => this.isNullable(i.symbol)),
      });
    }
  }

  private reportUselessNonterminals(): void {
    const logger = getLogger('grammar');

    const productive = new Set<Nonterminal>();
    let changed = true;
    while (changed) {
      changed = false;
      for (const p of this.productions) {
        if (productive.has(p.nonterminal)) continue;
        if (p.items.every(i => i.symbol.kind === 'terminal' || productive.has(i.symbol))) {
          productive.add(p.nonterminal);
          changed = true;
        }
      }
    }

    const reachable = new Set<Nonterminal>([this.start]);
    const pending = [this.start];
    while (pending.length > 0) {
      const nt = pending.pop();
      if (!nt) break;
      for (const p of nt.productions) {
        for (const item of p.items) {
          if (item.symbol.kind === 'nonterminal' && !reachable.has(item.symbol)) {
            reachable.add(item.symbol);
            pending.push(item.symbol);
          }
        }
      }
    }

    for (const nt of this.nonterminals.values()) {
      if (!productive.has(nt)) {
        logger.warn('Nonterminal derives no terminal string', { nonterminal: nt.name });
      }
      if (!reachable.has(nt)) {
        logger.warn('Nonterminal is unreachable from the start symbol', { nonterminal: nt.name });
      }
    }
    logger.debug('Grammar validated', {
      start: this.start.name,
      nonterminals: this.nonterminals.size,
      productions: this.productions.length,
      terminals: this.terminals.length,
    });
  }
}
