import { LineMap, type TextLocation } from './CstNode.js';
import { defaultPolicy } from './Disambiguation.js';
import type { Grammar } from './Grammar.js';
import type { PackedParent, SppfBuilder, SppfNode, SymbolNode, TerminalNode, TriviaMatch } from './Sppf.js';
import { out, runTask, type Out, type Task } from './Trampoline.js';

export interface ParseStats {
  descriptors: number;
  gssNodes: number;
  sppfNodes: number;
  elapsedMs: number;
}

/**
 * The sealed result of a successful parse: the root symbol node plus the
 * input it spans. Read-only; safe to traverse any number of times.
 */
export class ParseForest {
  readonly grammar: Grammar;
  readonly input: string;
  readonly root: SymbolNode;
  /** Trivia before the first token; the root starts where it ends. */
  readonly leadingTrivia: readonly TriviaMatch[];
  readonly stats: ParseStats;
  private readonly builder: SppfBuilder;
  private lineMap: LineMap | null = null;

  constructor(
    grammar: Grammar,
    input: string,
    root: SymbolNode,
    leadingTrivia: readonly TriviaMatch[],
    builder: SppfBuilder,
    stats: ParseStats,
  ) {
    this.grammar = grammar;
    this.input = input;
    this.root = root;
    this.leadingTrivia = leadingTrivia;
    this.builder = builder;
    this.stats = stats;
  }

  get nodeCount(): number {
    return this.builder.size;
  }

  locate(offset: number): TextLocation {
    if (!this.lineMap) {
      this.lineMap = new LineMap(this.input);
    }
    return this.lineMap.locate(offset);
  }

  /** The symbol node for `nonterminal` over `[start, end)`, if the parse produced one. */
  find(nonterminal: string, start: number, end: number): SymbolNode | undefined {
    const nt = this.grammar.nonterminals.get(nonterminal);
    return nt ? this.builder.findSymbol(nt, start, end) : undefined;
  }

  /** Nodes reachable from `from`, each once, parents before children. */
  *nodes(from: SppfNode = this.root): Generator<SppfNode> {
    const seen = new Set<number>();
    const stack: SppfNode[] = [from];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node || seen.has(node.id)) continue;
      seen.add(node.id);
      yield node;
      if (node.kind === 'symbol' || node.kind === 'intermediate') {
        for (let i = node.packed.length - 1; i >= 0; i--) {
          const packed = node.packed[i];
          stack.push(packed.right);
          if (packed.left) stack.push(packed.left);
        }
      }
    }
  }

  /** Reachable nodes with more than one derivation. */
  ambiguousNodes(from: SppfNode = this.root): PackedParent[] {
    const result: PackedParent[] = [];
    for (const node of this.nodes(from)) {
      if ((node.kind === 'symbol' || node.kind === 'intermediate') && node.packed.length > 1) {
        result.push(node);
      }
    }
    return result;
  }

  /** Terminal leaves of the derivation `defaultPolicy` prefers below `node`, in input order. */
  terminalLeaves(node: SppfNode = this.root): TerminalNode[] {
    const leaves: TerminalNode[] = [];
    const active = new Set<number>();

    function* visit(current: SppfNode, found: Out<boolean>): Task {
      if (current.kind === 'terminal') {
        leaves.push(current);
        found.value = true;
        return;
      }
      found.value = current.kind === 'epsilon';
      if (current.kind === 'epsilon' || active.has(current.id)) return;

      active.add(current.id);
      const parent: PackedParent = current;
      const mark = leaves.length;
      const ordered = [...parent.packed].sort((a, b) => defaultPolicy.compare(a, b, parent));
      for (const packed of ordered) {
        const complete = out<boolean>(true);
        if (packed.left !== null) yield visit(packed.left, complete);
        if (complete.value) yield visit(packed.right, complete);
        if (complete.value) {
          found.value = true;
          break;
        }
        leaves.length = mark;
      }
      active.delete(current.id);
    }

    runTask(visit(node, out<boolean>(false)));
    return leaves;
  }

  /** Number of distinct derivations below `node`; Infinity when a cycle is reachable. */
  countDerivations(node: SppfNode = this.root): number {
    const memo = new Map<number, number>();
    const active = new Set<number>();

    function* count(current: SppfNode, result: Out<number>): Task {
      if (current.kind === 'terminal' || current.kind === 'epsilon') {
        result.value = 1;
        return;
      }
      const known = memo.get(current.id);
      if (known !== undefined) {
        result.value = known;
        return;
      }
      if (active.has(current.id)) {
        result.value = Infinity;
        return;
      }
      active.add(current.id);
      let total = 0;
      for (const packed of current.packed) {
        const left = out<number>(1);
        if (packed.left !== null) yield count(packed.left, left);
        const right = out<number>(0);
        yield count(packed.right, right);
        total += left.value * right.value;
      }
      active.delete(current.id);
      memo.set(current.id, total);
      result.value = total;
    }

    const total = out<number>(0);
    runTask(count(node, total));
    return total.value;
  }
}
