import type { Grammar } from './Grammar.js';
import type { GrammarSlot, Nonterminal, Production, Terminal } from './GrammarElement.js';

/** A trivia match consumed next to a token. */
export interface TriviaMatch {
  readonly terminal: Terminal;
  readonly start: number;
  readonly end: number;
}

/** "nonterminal matches input[start:end]" */
export class SymbolNode {
  readonly kind = 'symbol' as const;
  readonly packed: PackedNode[] = [];

  constructor(
    readonly id: number,
    readonly nonterminal: Nonterminal,
    readonly start: number,
    readonly end: number,
  ) {}

  get label(): string {
    return this.nonterminal.name;
  }

  get ambiguous(): boolean {
    return this.packed.length > 1;
  }
}

/** A partially matched production prefix, ending at the slot's dot. */
export class IntermediateNode {
  readonly kind = 'intermediate' as const;
  readonly packed: PackedNode[] = [];

  constructor(
    readonly id: number,
    readonly slot: GrammarSlot,
    readonly start: number,
    readonly end: number,
  ) {}

  get label(): string {
    return this.slot.toString();
  }

  get ambiguous(): boolean {
    return this.packed.length > 1;
  }
}

/**
 * A terminal leaf. `[start, end)` covers the token plus the trivia after it,
 * so the leaves of one derivation tile the input after its leading trivia;
 * `[tokenStart, tokenEnd)` is the token itself.
 */
export class TerminalNode {
  readonly kind = 'terminal' as const;

  constructor(
    readonly id: number,
    readonly terminal: Terminal,
    readonly start: number,
    readonly end: number,
    readonly tokenStart: number,
    readonly tokenEnd: number,
    readonly trailing: readonly TriviaMatch[],
  ) {}

  get label(): string {
    return this.terminal.describe();
  }
}

export class EpsilonNode {
  readonly kind = 'epsilon' as const;

  constructor(
    readonly id: number,
    readonly start: number,
  ) {}

  get end(): number {
    return this.start;
  }

  get label(): string {
    return 'ε';
  }
}

export type SppfNode = SymbolNode | IntermediateNode | TerminalNode | EpsilonNode;
export type PackedParent = SymbolNode | IntermediateNode;

/**
 * One way of deriving its parent: the production prefix up to `slot` split at
 * `pivot` into `left` (absent for the first symbol) and `right`.
 */
export class PackedNode {
  readonly kind = 'packed' as const;

  constructor(
    readonly id: number,
    readonly parent: PackedParent,
    readonly slot: GrammarSlot,
    readonly pivot: number,
    readonly left: SppfNode | null,
    readonly right: SppfNode,
  ) {}

  get production(): Production {
    return this.slot.production;
  }
}

export interface TerminalScan {
  tokenStart: number;
  tokenEnd: number;
  trailing: readonly TriviaMatch[];
}

/**
 * Owns every forest node of one parse. Nodes live in an arena indexed by `id`
 * and are interned by structural key, so asking twice for the same key returns
 * the same node.
 */
export class SppfBuilder {
  readonly grammar: Grammar;
  private readonly arena: Array<SppfNode | PackedNode> = [];
  private readonly table = new Map<string, SppfNode>();
  private readonly packedKeys = new Map<PackedParent, Set<string>>();
  private sealed = false;

  constructor(grammar: Grammar) {
    this.grammar = grammar;
  }

  get size(): number {
    return this.arena.length;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  node(id: number): SppfNode | PackedNode | undefined {
    return this.arena[id];
  }

  symbolNode(nonterminal: Nonterminal, start: number, end: number): SymbolNode {
    const key = `S${nonterminal.name}:${start}:${end}`;
    const existing = this.table.get(key);
    if (existing && existing.kind === 'symbol') return existing;
    this.assertOpen();
    const node = new SymbolNode(this.arena.length, nonterminal, start, end);
    this.store(key, node);
    return node;
  }

  intermediateNode(slot: GrammarSlot, start: number, end: number): IntermediateNode {
    const key = `I${slot.id}:${start}:${end}`;
    const existing = this.table.get(key);
    if (existing && existing.kind === 'intermediate') return existing;
    this.assertOpen();
    const node = new IntermediateNode(this.arena.length, slot, start, end);
    this.store(key, node);
    return node;
  }

  terminalNode(terminal: Terminal, start: number, end: number, scan: TerminalScan): TerminalNode {
    const key = `T${this.grammar.terminalId(terminal)}:${start}:${end}`;
    const existing = this.table.get(key);
    if (existing && existing.kind === 'terminal') return existing;
    this.assertOpen();
    const node = new TerminalNode(
      this.arena.length,
      terminal,
      start,
      end,
      scan.tokenStart,
      scan.tokenEnd,
      scan.trailing,
    );
    this.store(key, node);
    return node;
  }

  epsilonNode(offset: number): EpsilonNode {
    const key = `E${offset}`;
    const existing = this.table.get(key);
    if (existing && existing.kind === 'epsilon') return existing;
    this.assertOpen();
    const node = new EpsilonNode(this.arena.length, offset);
    this.store(key, node);
    return node;
  }

  /** Add a derivation to `parent` unless one with the same slot and pivot exists. */
  addPacked(parent: PackedParent, slot: GrammarSlot, pivot: number, left: SppfNode | null, right: SppfNode): PackedNode {
    const key = `${slot.id}:${pivot}`;
    let keys = this.packedKeys.get(parent);
    if (!keys) {
      keys = new Set();
      this.packedKeys.set(parent, keys);
    }
    if (keys.has(key)) {
      const found = parent.packed.find(p => p.slot === slot && p.pivot === pivot);
      if (found) return found;
    }
    this.assertOpen();
    keys.add(key);
    const packed = new PackedNode(this.arena.length, parent, slot, pivot, left, right);
    this.arena.push(packed);
    parent.packed.push(packed);
    return packed;
  }

  /**
   * Extend the derivation `left` (the prefix before the symbol just matched, or
   * null) with `right` (that symbol's node), for the slot after the symbol.
   * A single-symbol prefix that does not finish the production needs no node of
   * its own and `right` is returned unchanged.
   */
  extend(slot: GrammarSlot, left: SppfNode | null, right: SppfNode): SppfNode {
    if (slot.dot === 1 && !slot.atEnd) {
      return right;
    }
    const start = left ? left.start : right.start;
    const parent: PackedParent = slot.atEnd
      ? this.symbolNode(slot.production.nonterminal, start, right.end)
      : this.intermediateNode(slot, start, right.end);
    this.addPacked(parent, slot, right.start, left, right);
    return parent;
  }

  findSymbol(nonterminal: Nonterminal, start: number, end: number): SymbolNode | undefined {
    const node = this.table.get(`S${nonterminal.name}:${start}:${end}`);
    return node && node.kind === 'symbol' ? node : undefined;
  }

  /** Freeze the forest; any further interning request that would create a node throws. */
  seal(): void {
    this.sealed = true;
  }

  private store(key: string, node: SppfNode): void {
    this.arena.push(node);
    this.table.set(key, node);
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new Error('SPPF is sealed: the parse that owned it has completed');
    }
  }
}
