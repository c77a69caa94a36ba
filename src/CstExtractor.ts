import { CstNode, CstToken, type CstChild } from './CstNode.js';
import { defaultPolicy, type DisambiguationPolicy } from './Disambiguation.js';
import { AmbiguityError } from './Errors.js';
import type { Nonterminal, Production, Terminal } from './GrammarElement.js';
import { getLogger } from './Logger.js';
import type { ParseForest } from './ParseForest.js';
import type {
  IntermediateNode,
  PackedNode,
  PackedParent,
  SppfNode,
  SymbolNode,
  TerminalNode,
} from './Sppf.js';
import { out, runTask, type Out, type Task } from './Trampoline.js';

// ─── Public API ────────────────────────────────────────────────────────────────

export interface ExtractOptions {
  policy?: DisambiguationPolicy;
  /** Extract below this node instead of the forest root. */
  root?: SymbolNode;
  /** Splice nested repetition nodes into one list node. Defaults to true. */
  flattenRepetitions?: boolean;
}

export type ExtractResult = { ok: true; tree: CstNode } | { ok: false; error: AmbiguityError };

/**
 * Resolve every ambiguity below the root with the policy and build one CST.
 * Fails with an AmbiguityError when the policy leaves two viable derivations tied.
 */
export function extractCst(forest: ParseForest, options?: ExtractOptions): ExtractResult {
  const extractor = new CstExtractor(forest, options);
  const logger = getLogger('extractor');
  try {
    const tree = extractor.extract();
    logger.debug('Extracted CST', { root: tree.name, policy: extractor.policy.name });
    return { ok: true, tree };
  } catch (error) {
    if (error instanceof AmbiguityError) {
      logger.debug('Unresolved ambiguity', { symbol: error.symbol, start: error.start, end: error.end });
      return { ok: false, error };
    }
    throw error;
  }
}

export interface EnumerateOptions extends ExtractOptions {
  /** Upper bound on the number of trees returned. Defaults to 10. */
  limit?: number;
}

/** Up to `limit` distinct CSTs, in the order the policy prefers them. */
export function enumerateCsts(forest: ParseForest, options?: EnumerateOptions): CstNode[] {
  return new CstExtractor(forest, options).enumerate(options?.limit ?? 10);
}

// ─── Internal: derivation shapes ───────────────────────────────────────────────

// A chosen derivation before it becomes CstNodes; shapes can be shared, trees cannot.
interface NodeShape {
  kind: 'node';
  node: SymbolNode;
  production: Production;
  parts: PartShape[];
}

interface PartShape {
  label: string | null;
  value: NodeShape | TerminalNode;
}

interface Picked<T> {
  packed: PackedNode;
  value: T;
}

type Build<T> = (packed: PackedNode, result: Out<T | null>) => Task;

// One CST node under construction; `pending` holds the parts still to visit, last first.
interface Frame {
  shape: NodeShape;
  label: string | null;
  pending: Array<{ owner: Nonterminal; part: PartShape }>;
  children: CstChild[];
}

class CstExtractor {
  readonly policy: DisambiguationPolicy;
  private readonly forest: ParseForest;
  private readonly root: SymbolNode;
  private readonly flatten: boolean;
  private readonly active = new Set<number>();
  private limit = 1;

  // Enumeration memo, filled at the full limit; entries computed while a cycle was cut stay out of it.
  private cuts = 0;
  private readonly symbolMemo = new Map<number, NodeShape[]>();
  private readonly intermediateMemo = new Map<number, PartShape[][]>();

  constructor(forest: ParseForest, options?: ExtractOptions) {
    this.forest = forest;
    this.policy = options?.policy ?? defaultPolicy;
    this.root = options?.root ?? forest.root;
    this.flatten = options?.flattenRepetitions ?? true;
  }

  extract(): CstNode {
    const shape = out<NodeShape | null>(null);
    runTask(this.chooseSymbol(this.root, shape));
    if (!shape.value) {
      // Only cyclic derivations remain below the root.
      throw new AmbiguityError(this.root.nonterminal.name, this.root.start, this.root.end, this.forest.locate(this.root.start), 0);
    }
    return this.materialize(shape.value);
  }

  enumerate(limit: number): CstNode[] {
    if (limit <= 0) return [];
    this.limit = limit;
    const shapes = out<NodeShape[]>([]);
    runTask(this.enumerateSymbol(this.root, shapes));
    return shapes.value.map(shape => this.materialize(shape));
  }

  // ─── Single choice ────────────────────────────────────────────────────

  private *chooseSymbol(node: SymbolNode, result: Out<NodeShape | null>): Task {
    const picked = out<Picked<PartShape[]> | null>(null);
    yield this.pick(node, (packed, parts) => this.chooseParts(packed, parts), picked);
    result.value = picked.value ? { kind: 'node', node, production: picked.value.packed.production, parts: picked.value.value } : null;
  }

  private *chooseParts(packed: PackedNode, result: Out<PartShape[] | null>): Task {
    const production = packed.production;
    const left = out<PartShape[] | null>([]);
    if (packed.left !== null) yield this.choosePart(packed.left, production, 0, left);
    if (left.value === null) {
      result.value = null;
      return;
    }
    const right = out<PartShape[] | null>(null);
    yield this.choosePart(packed.right, production, packed.slot.dot - 1, right);
    result.value = right.value === null ? null : [...left.value, ...right.value];
  }

  private *choosePart(node: SppfNode, production: Production, itemIndex: number, result: Out<PartShape[] | null>): Task {
    switch (node.kind) {
      case 'epsilon':
        result.value = [];
        return;
      case 'terminal':
        result.value = [{ label: labelAt(production, itemIndex), value: node }];
        return;
      case 'symbol': {
        const shape = out<NodeShape | null>(null);
        yield this.chooseSymbol(node, shape);
        result.value = shape.value ? [{ label: labelAt(production, itemIndex), value: shape.value }] : null;
        return;
      }
      case 'intermediate': {
        const picked = out<Picked<PartShape[]> | null>(null);
        yield this.pick(node, (packed, parts) => this.chooseParts(packed, parts), picked);
        result.value = picked.value ? picked.value.value : null;
        return;
      }
    }
  }

  /**
   * Try derivations of `parent` in policy order and keep the first that can be
   * built. Derivations that re-enter a node on the current path are not viable.
   */
  private *pick<T>(parent: PackedParent, build: Build<T>, result: Out<Picked<T> | null>): Task {
    result.value = null;
    if (this.active.has(parent.id)) return;
    this.active.add(parent.id);
    try {
      const ordered = this.order(parent);
      for (let i = 0; i < ordered.length; i++) {
        const built = out<T | null>(null);
        yield build(ordered[i], built);
        if (built.value === null) continue;

        let viable = 1;
        for (let j = i + 1; j < ordered.length && this.policy.compare(ordered[i], ordered[j], parent) === 0; j++) {
          const derives = out<boolean>(false);
          yield this.isViable(ordered[j], build, derives);
          if (derives.value) viable++;
        }
        if (viable > 1) {
          throw new AmbiguityError(ownerName(parent), parent.start, parent.end, this.forest.locate(parent.start), viable);
        }
        result.value = { packed: ordered[i], value: built.value };
        return;
      }
    } finally {
      this.active.delete(parent.id);
    }
  }

  private *isViable<T>(packed: PackedNode, build: Build<T>, result: Out<boolean>): Task {
    const built = out<T | null>(null);
    try {
      yield build(packed, built);
      result.value = built.value !== null;
    } catch (error) {
      // Ambiguous further down still means it derives something.
      if (!(error instanceof AmbiguityError)) throw error;
      result.value = true;
    }
  }

  private order(parent: PackedParent): PackedNode[] {
    return [...parent.packed].sort((a, b) => this.policy.compare(a, b, parent));
  }

  // ─── Enumeration ──────────────────────────────────────────────────────

  private *enumerateSymbol(node: SymbolNode, result: Out<NodeShape[]>): Task {
    const memo = this.symbolMemo.get(node.id);
    if (memo) {
      result.value = memo;
      return;
    }
    if (this.active.has(node.id)) {
      this.cuts++;
      result.value = [];
      return;
    }
    const cutsBefore = this.cuts;
    this.active.add(node.id);
    const shapes: NodeShape[] = [];
    try {
      for (const packed of this.order(node)) {
        const parts = out<PartShape[][]>([]);
        yield this.enumerateParts(packed, parts);
        for (const p of parts.value) {
          shapes.push({ kind: 'node', node, production: packed.production, parts: p });
          if (shapes.length >= this.limit) break;
        }
        if (shapes.length >= this.limit) break;
      }
    } finally {
      this.active.delete(node.id);
    }
    if (this.cuts === cutsBefore) this.symbolMemo.set(node.id, shapes);
    result.value = shapes;
  }

  private *enumerateIntermediate(node: IntermediateNode, result: Out<PartShape[][]>): Task {
    const memo = this.intermediateMemo.get(node.id);
    if (memo) {
      result.value = memo;
      return;
    }
    if (this.active.has(node.id)) {
      this.cuts++;
      result.value = [];
      return;
    }
    const cutsBefore = this.cuts;
    this.active.add(node.id);
    const combined: PartShape[][] = [];
    try {
      for (const packed of this.order(node)) {
        const parts = out<PartShape[][]>([]);
        yield this.enumerateParts(packed, parts);
        for (const p of parts.value) {
          combined.push(p);
          if (combined.length >= this.limit) break;
        }
        if (combined.length >= this.limit) break;
      }
    } finally {
      this.active.delete(node.id);
    }
    if (this.cuts === cutsBefore) this.intermediateMemo.set(node.id, combined);
    result.value = combined;
  }

  private *enumerateParts(packed: PackedNode, result: Out<PartShape[][]>): Task {
    const production = packed.production;
    const lefts = out<PartShape[][]>([[]]);
    if (packed.left !== null) yield this.enumeratePart(packed.left, production, 0, lefts);
    const combined: PartShape[][] = [];
    result.value = combined;
    if (lefts.value.length === 0) return;

    const rights = out<PartShape[][]>([]);
    yield this.enumeratePart(packed.right, production, packed.slot.dot - 1, rights);
    for (const left of lefts.value) {
      for (const right of rights.value) {
        combined.push([...left, ...right]);
        if (combined.length >= this.limit) return;
      }
    }
  }

  private *enumeratePart(node: SppfNode, production: Production, itemIndex: number, result: Out<PartShape[][]>): Task {
    switch (node.kind) {
      case 'epsilon':
        result.value = [[]];
        return;
      case 'terminal':
        result.value = [[{ label: labelAt(production, itemIndex), value: node }]];
        return;
      case 'symbol': {
        const shapes = out<NodeShape[]>([]);
        yield this.enumerateSymbol(node, shapes);
        result.value = shapes.value.map(shape => [{ label: labelAt(production, itemIndex), value: shape }]);
        return;
      }
      case 'intermediate':
        yield this.enumerateIntermediate(node, result);
        return;
    }
  }

  // ─── Tree building ────────────────────────────────────────────────────

  /** Build CstNodes bottom-up; nested repetition parts are spliced into their parent's frame. */
  private materialize(root: NodeShape): CstNode {
    const stack: Frame[] = [this.frame(root, null)];
    for (;;) {
      const frame = stack[stack.length - 1];
      const next = frame.pending.pop();
      if (next === undefined) {
        stack.pop();
        const parent = stack.at(-1);
        if (!parent) return this.node(frame, this.root === this.forest.root);
        parent.children.push(this.node(frame, false));
        continue;
      }

      const { owner, part } = next;
      if (part.value.kind === 'terminal') {
        frame.children.push(...this.tokens(part.value, part.label));
        continue;
      }
      const child = part.value;
      const nested = child.node.nonterminal;
      if (this.flatten && part.label === null && isRepetition(owner) && isRepetition(nested)) {
        for (let i = child.parts.length - 1; i >= 0; i--) {
          frame.pending.push({ owner: nested, part: child.parts[i] });
        }
      } else {
        stack.push(this.frame(child, part.label));
      }
    }
  }

  private frame(shape: NodeShape, label: string | null): Frame {
    const owner = shape.node.nonterminal;
    const pending = shape.parts.map(part => ({ owner, part })).reverse();
    return { shape, label, pending, children: [] };
  }

  /** `withLeading`: the tree root also owns the trivia before the first token. */
  private node({ shape, label, children }: Frame, withLeading: boolean): CstNode {
    const { node } = shape;
    let start = node.start;
    if (withLeading && this.forest.leadingTrivia.length > 0) {
      start = 0;
      children.unshift(...this.forest.leadingTrivia.map(t => this.token(t.terminal, t.start, t.end, true, null)));
    }
    return new CstNode(
      node.nonterminal,
      shape.production,
      this.forest.locate(start),
      this.forest.locate(node.end),
      this.forest.input.slice(start, node.end),
      children,
      label,
    );
  }

  private tokens(leaf: TerminalNode, label: string | null): CstToken[] {
    const tokens = [this.token(leaf.terminal, leaf.tokenStart, leaf.tokenEnd, leaf.terminal.trivia, label)];
    for (const t of leaf.trailing) {
      tokens.push(this.token(t.terminal, t.start, t.end, true, null));
    }
    return tokens;
  }

  private token(terminal: Terminal, start: number, end: number, trivia: boolean, label: string | null): CstToken {
    return new CstToken(
      terminal,
      this.forest.input.slice(start, end),
      this.forest.locate(start),
      this.forest.locate(end),
      trivia,
      label,
    );
  }
}

function labelAt(production: Production, itemIndex: number): string | null {
  return itemIndex >= 0 ? production.items[itemIndex].label : null;
}

function ownerName(parent: PackedParent): string {
  return parent.kind === 'symbol' ? parent.nonterminal.name : parent.slot.production.nonterminal.name;
}

function isRepetition(nonterminal: Nonterminal): boolean {
  return nonterminal.type === 'repetition';
}
