import type { GrammarSlot } from './GrammarElement.js';
import type { SppfNode } from './Sppf.js';

export interface GssEdge {
  /** The caller waiting for this node's result. */
  readonly target: GssNode;
  /** Derivation of the caller's production prefix before the call, if any. */
  readonly sppf: SppfNode | null;
}

/**
 * A call site: "return to `slot` once the callee, started at `offset`, completes".
 * The root node has no slot.
 */
export class GssNode {
  readonly id: number;
  readonly slot: GrammarSlot | null;
  readonly offset: number;
  readonly edges: GssEdge[] = [];
  /** SPPF nodes this node has been popped with; their end offsets are the callee's completions. */
  readonly pops: SppfNode[] = [];
  private readonly edgeKeys = new Set<string>();
  private readonly popIds = new Set<number>();

  constructor(id: number, slot: GrammarSlot | null, offset: number) {
    this.id = id;
    this.slot = slot;
    this.offset = offset;
  }

  get isRoot(): boolean {
    return this.slot === null;
  }

  /** Returns false when an identical edge already exists. */
  addEdge(target: GssNode, sppf: SppfNode | null): boolean {
    const key = `${target.id}:${sppf ? sppf.id : -1}`;
    if (this.edgeKeys.has(key)) return false;
    this.edgeKeys.add(key);
    this.edges.push({ target, sppf });
    return true;
  }

  /** Returns false when the node was already popped with this SPPF node. */
  addPop(sppf: SppfNode): boolean {
    if (this.popIds.has(sppf.id)) return false;
    this.popIds.add(sppf.id);
    this.pops.push(sppf);
    return true;
  }
}

/** Graph-structured stack of one parse: one node per (slot, offset). */
export class Gss {
  readonly root: GssNode;
  private readonly nodes: GssNode[] = [];
  private readonly table = new Map<string, GssNode>();

  constructor() {
    this.root = new GssNode(0, null, 0);
    this.nodes.push(this.root);
  }

  get size(): number {
    return this.nodes.length;
  }

  /** The node for (slot, offset), and whether this call created it. */
  node(slot: GrammarSlot, offset: number): { node: GssNode; created: boolean } {
    const key = `${slot.id}:${offset}`;
    const existing = this.table.get(key);
    if (existing) return { node: existing, created: false };
    const node = new GssNode(this.nodes.length, slot, offset);
    this.nodes.push(node);
    this.table.set(key, node);
    return { node, created: true };
  }

  find(slot: GrammarSlot, offset: number): GssNode | undefined {
    return this.table.get(`${slot.id}:${offset}`);
  }
}
