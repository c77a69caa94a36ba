import { LineMap } from './CstNode.js';
import { ParseAbortedError, ParseFailure, type FailedAttempt } from './Errors.js';
import type { Grammar } from './Grammar.js';
import type { GrammarSlot, Nonterminal, Production, Terminal } from './GrammarElement.js';
import { Gss, type GssNode } from './Gss.js';
import { getLogger } from './Logger.js';
import { ParseForest, type ParseStats } from './ParseForest.js';
import { SppfBuilder, type SppfNode, type SymbolNode, type TerminalScan, type TriviaMatch } from './Sppf.js';

// ─── Public API ────────────────────────────────────────────────────────────────

export interface ParseOptions {
  /** Parse from this nonterminal instead of the grammar's start symbol. */
  start?: string;
  /** Skip productions whose FIRST terminals cannot match. Defaults to true. */
  lookahead?: boolean;
  /** Epoch milliseconds after which the parse is abandoned. */
  deadline?: number;
  /** Abandon the parse after processing this many descriptors. */
  maxDescriptors?: number;
}

export type ParseResult =
  | { ok: true; root: SymbolNode; forest: ParseForest }
  | { ok: false; failure: ParseFailure };

export function parse(grammar: Grammar, input: string, options?: ParseOptions): ParseResult {
  return new GllEngine(grammar, input, options).run();
}

// ─── Internal: descriptors & scanning ──────────────────────────────────────────

/** A unit of pending work: continue `slot` under `gss` at `offset` with the prefix derivation `sppf`. */
interface Descriptor {
  slot: GrammarSlot;
  gss: GssNode;
  offset: number;
  sppf: SppfNode | null;
}

interface Scan extends TerminalScan {
  end: number;
}

interface TriviaRun {
  end: number;
  matches: TriviaMatch[];
}

const DEADLINE_CHECK_INTERVAL = 256;

// ─── Engine ───────────────────────────────────────────────────────────────────

/**
 * One GLL parse. All tables (GSS, SPPF, descriptor set) belong to the instance
 * and live exactly as long as the parse; an engine runs once.
 */
export class GllEngine {
  private readonly grammar: Grammar;
  private readonly input: string;
  private readonly start: Nonterminal;
  private readonly lookahead: boolean;
  private readonly deadline: number | undefined;
  private readonly maxDescriptors: number | undefined;

  private readonly gss = new Gss();
  private readonly sppf: SppfBuilder;
  private readonly worklist: Descriptor[] = [];
  private head = 0;
  private readonly scheduled = new Set<string>();
  private descriptorsProcessed = 0;

  private readonly scanCache = new Map<string, Scan | null>();
  private readonly triviaCache = new Map<number, TriviaRun>();

  // Error tracking
  private furthestOffset = -1;
  private attemptsAtFurthest: FailedAttempt[] = [];
  private readonly attemptKeys = new Set<string>();
  private readonly rootCompletions: number[] = [];

  private used = false;

  constructor(grammar: Grammar, input: string, options?: ParseOptions) {
    this.grammar = grammar;
    this.input = input;
    this.start = options?.start !== undefined ? grammar.nonterminal(options.start) : grammar.start;
    this.lookahead = options?.lookahead ?? true;
    this.deadline = options?.deadline;
    this.maxDescriptors = options?.maxDescriptors;
    this.sppf = new SppfBuilder(grammar);
  }

  run(): ParseResult {
    if (this.used) {
      throw new Error('A GllEngine parses a single input; create a new engine for every parse');
    }
    this.used = true;
    const startedAt = performance.now();

    // Trivia before the first token belongs to no terminal; the parse proper starts after it.
    const leading = this.skipTrivia(0);
    this.predict(this.start, this.gss.root, leading.end);

    while (this.head < this.worklist.length) {
      this.checkBudget();
      const descriptor = this.worklist[this.head++];
      this.process(descriptor);
    }

    this.sppf.seal();
    const stats: ParseStats = {
      descriptors: this.descriptorsProcessed,
      gssNodes: this.gss.size,
      sppfNodes: this.sppf.size,
      elapsedMs: performance.now() - startedAt,
    };

    const root = this.sppf.findSymbol(this.start, leading.end, this.input.length);
    const logger = getLogger('engine');
    logger.debug('Parse completed', { start: this.start.name, length: this.input.length, ok: root !== undefined, ...stats });

    if (root) {
      const forest = new ParseForest(this.grammar, this.input, root, leading.matches, this.sppf, stats);
      return { ok: true, root, forest };
    }
    return { ok: false, failure: this.buildFailure() };
  }

  // ─── Main loop ────────────────────────────────────────────────────────

  private process({ slot, gss, offset, sppf }: Descriptor): void {
    const symbol = slot.next;

    if (symbol === null) {
      const completed = sppf ?? this.sppf.extend(slot, null, this.sppf.epsilonNode(offset));
      this.pop(gss, offset, completed);
      return;
    }

    if (symbol.kind === 'terminal') {
      const scan = this.scan(symbol, offset);
      if (!scan) return;
      const leaf = this.sppf.terminalNode(symbol, offset, scan.end, scan);
      const next = slot.following;
      this.add(next, gss, scan.end, this.sppf.extend(next, sppf, leaf));
      return;
    }

    const callee = this.create(slot.following, gss, offset, sppf);
    this.predict(symbol, callee, offset);
  }

  /** Schedule every viable production of `nonterminal` at `offset`, returning to `caller`. */
  private predict(nonterminal: Nonterminal, caller: GssNode, offset: number): void {
    for (const production of nonterminal.productions) {
      if (this.lookahead && !this.viable(production, offset)) continue;
      this.add(production.slots[0], caller, offset, null);
    }
  }

  /**
   * Record a call returning to `returnSlot`. When the callee node already
   * completed earlier, the new caller is resumed with every earlier result.
   */
  private create(returnSlot: GrammarSlot, caller: GssNode, offset: number, sppf: SppfNode | null): GssNode {
    const { node } = this.gss.node(returnSlot, offset);
    if (node.addEdge(caller, sppf)) {
      for (const result of [...node.pops]) {
        this.add(returnSlot, caller, result.end, this.sppf.extend(returnSlot, sppf, result));
      }
    }
    return node;
  }

  /** The callee under `node` completed with `result`; resume every caller waiting on it. */
  private pop(node: GssNode, offset: number, result: SppfNode): void {
    if (node.slot === null) {
      this.rootCompletions.push(offset);
      return;
    }
    if (!node.addPop(result)) return;
    const slot = node.slot;
    for (const edge of [...node.edges]) {
      this.add(slot, edge.target, offset, this.sppf.extend(slot, edge.sppf, result));
    }
  }

  private add(slot: GrammarSlot, gss: GssNode, offset: number, sppf: SppfNode | null): void {
    const key = `${slot.id}:${gss.id}:${offset}:${sppf ? sppf.id : -1}`;
    if (this.scheduled.has(key)) return;
    this.scheduled.add(key);
    this.worklist.push({ slot, gss, offset, sppf });
  }

  private checkBudget(): void {
    this.descriptorsProcessed++;
    if (this.maxDescriptors !== undefined && this.descriptorsProcessed > this.maxDescriptors) {
      throw new ParseAbortedError('descriptors', this.descriptorsProcessed - 1);
    }
    if (
      this.deadline !== undefined &&
      this.descriptorsProcessed % DEADLINE_CHECK_INTERVAL === 1 &&
      Date.now() > this.deadline
    ) {
      throw new ParseAbortedError('deadline', this.descriptorsProcessed - 1);
    }
  }

  // ─── Terminal Matching ────────────────────────────────────────────────

  private viable(production: Production, offset: number): boolean {
    const first = this.grammar.firstOf(production);
    if (first.nullable) return true;
    let matched = false;
    for (const terminal of first.terminals) {
      if (this.scan(terminal, offset)) matched = true;
    }
    return matched;
  }

  /** Match `terminal` at `offset`, then consume the trivia after it. */
  private scan(terminal: Terminal, offset: number): Scan | null {
    const key = `${this.grammar.terminalId(terminal)}:${offset}`;
    const cached = this.scanCache.get(key);
    if (cached !== undefined) return cached;

    const tokenEnd = terminal.match(this.input, offset);
    if (tokenEnd < 0) {
      this.recordFailure(terminal, terminal.describe(), offset);
      this.scanCache.set(key, null);
      return null;
    }

    const trailing = this.skipTrivia(tokenEnd);
    const scan: Scan = { tokenStart: offset, tokenEnd, trailing: trailing.matches, end: trailing.end };
    this.scanCache.set(key, scan);
    return scan;
  }

  private skipTrivia(offset: number): TriviaRun {
    const cached = this.triviaCache.get(offset);
    if (cached) return cached;

    const matches: TriviaMatch[] = [];
    let pos = offset;
    let changed = this.grammar.trivia.length > 0;
    while (changed) {
      changed = false;
      for (const terminal of this.grammar.trivia) {
        const end = terminal.match(this.input, pos);
        if (end > pos) {
          matches.push({ terminal, start: pos, end });
          pos = end;
          changed = true;
        }
      }
    }

    const run = { end: pos, matches };
    this.triviaCache.set(offset, run);
    return run;
  }

  // ─── Failure reporting ────────────────────────────────────────────────

  private recordFailure(terminal: Terminal | null, expected: string, offset: number): void {
    if (offset > this.furthestOffset) {
      this.furthestOffset = offset;
      this.attemptsAtFurthest = [];
      this.attemptKeys.clear();
    }
    if (offset === this.furthestOffset && !this.attemptKeys.has(expected)) {
      this.attemptKeys.add(expected);
      this.attemptsAtFurthest.push({ terminal, expected, offset });
    }
  }

  private buildFailure(): ParseFailure {
    // The start symbol matched a prefix: what was missing is the end of the input.
    for (const end of this.rootCompletions) {
      if (end < this.input.length) {
        this.recordFailure(null, 'end of input', end);
      }
    }
    const offset = Math.max(this.furthestOffset, 0);
    const location = new LineMap(this.input).locate(offset);
    const failure = new ParseFailure(location, this.attemptsAtFurthest);
    getLogger('engine').debug('Parse failed', { offset, expected: failure.expected });
    return failure;
  }
}
