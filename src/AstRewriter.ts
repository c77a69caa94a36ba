import type { CstChild, CstNode } from './CstNode.js';
import { GrammarError, LoweringError, UnhandledProductionError } from './Errors.js';
import type { Grammar } from './Grammar.js';
import type { Production } from './GrammarElement.js';
import { ELEMENT_LABEL } from './GrammarBuilder.js';
import { getLogger } from './Logger.js';

export interface RewriterOptions {
  /** Fail when a transform leaves a child node unlowered. Defaults to true. */
  requireAllChildren?: boolean;
}

/** What a transform sees of the node it lowers. */
export interface LoweringContext<T> {
  readonly node: CstNode;
  /** Non-trivia children in source order; the children of `choice()` groups stand in for the group. */
  readonly items: CstChild[];
  /** Lower a child node of `node`; each child may be lowered once. */
  lower(child: CstChild | undefined): T;
  /**
   * Lower every `element` node of a repetition or optional child, in source
   * order. The child counts as lowered.
   */
  lowerElements(child: CstChild | undefined): T[];
  field(label: string): CstChild | undefined;
  /** Source text of `child`, or of the whole node. */
  text(child?: CstChild): string;
}

export type LoweringTransform<T> = (context: LoweringContext<T>) => T;

interface ViewEntry {
  child: CstChild;
  label: string | null;
}

/**
 * Lowers a CST into a caller-defined AST by dispatching on the production
 * each node was derived with.
 */
export class AstRewriter<T> {
  private readonly grammar: Grammar;
  private readonly requireAllChildren: boolean;
  private readonly transforms = new Map<Production, LoweringTransform<T>>();
  private readonly logger = getLogger('rewriter');

  constructor(grammar: Grammar, options?: RewriterOptions) {
    this.grammar = grammar;
    this.requireAllChildren = options?.requireAllChildren ?? true;
  }

  /** Register `transform` for a production given by index or label. */
  register(nonterminal: string, production: number | string, transform: LoweringTransform<T>): this {
    if (!this.grammar.nonterminals.has(nonterminal)) {
      throw new GrammarError(`Cannot register a lowering rule for unknown nonterminal '${nonterminal}'`, { nonterminal });
    }
    const target = this.grammar.production(nonterminal, production);
    if (!target) {
      throw new GrammarError(`Nonterminal '${nonterminal}' has no production ${JSON.stringify(production)}`, {
        nonterminal,
        productionIndex: typeof production === 'number' ? production : undefined,
      });
    }
    if (this.transforms.has(target)) {
      this.logger.warn('Replacing lowering rule', { production: target.toString() });
    }
    this.transforms.set(target, transform);
    return this;
  }

  /**
   * Productions of declared rules that have no transform yet. Synthesized
   * nonterminals need none: repetitions and optionals are read through
   * `lowerElements`, and `choice()` groups are inlined into their parent.
   */
  missingRules(): Production[] {
    return this.grammar.productions.filter(p => !p.nonterminal.synthetic && !this.transforms.has(p));
  }

  lower(node: CstNode): T {
    const transform = this.transforms.get(node.production);
    if (!transform) {
      throw new UnhandledProductionError(node.name, node.productionIndex, node.start.index, node.end.index);
    }

    const entries = this.view(node);
    const members = new Set<CstChild>(entries.map(e => e.child));
    const lowered = new Set<CstNode>();
    const consume = (child: CstChild | undefined): CstNode => {
      if (!child || child.kind !== 'node') {
        throw new LoweringError(`Only child nodes of ${node.name} can be lowered`, { nonterminal: node.name });
      }
      if (!members.has(child)) {
        throw new LoweringError(`${child.name} is not a child of ${node.name}`, { nonterminal: node.name });
      }
      if (lowered.has(child)) {
        throw new LoweringError(`Child ${child.name} of ${node.name} was lowered twice`, {
          nonterminal: node.name,
          child: child.name,
          offset: child.start.index,
        });
      }
      lowered.add(child);
      return child;
    };

    const context: LoweringContext<T> = {
      node,
      items: entries.filter(e => e.child.kind === 'node' || !e.child.trivia).map(e => e.child),
      lower: child => this.lower(consume(child)),
      lowerElements: child => this.lowerElements(consume(child)),
      field: label => entries.find(e => e.label === label)?.child,
      text: child => (child ? child.text : node.text),
    };

    const result = transform(context);

    if (this.requireAllChildren) {
      for (const { child } of entries) {
        if (child.kind === 'node' && !lowered.has(child)) {
          throw new LoweringError(`Lowering rule for ${node.production.toString()} ignored child ${child.name}`, {
            nonterminal: node.name,
            productionIndex: node.productionIndex,
            child: child.name,
            offset: child.start.index,
          });
        }
      }
    }
    return result;
  }

  /**
   * Children of `node` as its transform sees them: group nodes without a rule
   * of their own are replaced by their children, which take the group's label
   * unless they carry one.
   */
  private view(node: CstNode): ViewEntry[] {
    const entries: ViewEntry[] = [];
    const stack: ViewEntry[] = node.children.map(child => ({ child, label: child.label })).reverse();
    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;
      const { child } = entry;
      if (child.kind === 'node' && this.isTransparent(child)) {
        for (let i = child.children.length - 1; i >= 0; i--) {
          const inner = child.children[i];
          stack.push({ child: inner, label: inner.label ?? entry.label });
        }
      } else {
        entries.push(entry);
      }
    }
    return entries;
  }

  private isTransparent(node: CstNode): boolean {
    return node.nonterminal.type === 'group' && !this.transforms.has(node.production);
  }

  private lowerElements(container: CstNode): T[] {
    if (container.nonterminal.type !== 'repetition' && container.nonterminal.type !== 'optional') {
      throw new LoweringError(`${container.name} is not a repetition or optional`, { nonterminal: container.name });
    }
    const results: T[] = [];
    const stack: CstChild[] = [...container.children].reverse();
    while (stack.length > 0) {
      const child = stack.pop();
      if (!child) break;
      if (child.kind === 'node' && child.label === null && child.nonterminal.type === 'repetition') {
        // Unflattened nested list.
        for (let i = child.children.length - 1; i >= 0; i--) {
          stack.push(child.children[i]);
        }
      } else if (child.label === ELEMENT_LABEL) {
        results.push(this.lowerElement(container, child));
      }
    }
    return results;
  }

  private lowerElement(container: CstNode, element: CstChild): T {
    if (element.kind === 'token') {
      throw new LoweringError(`Element '${element.text}' of ${container.name} is a token; read it with field() or text()`, {
        nonterminal: container.name,
        offset: element.start.index,
      });
    }
    if (!this.isTransparent(element)) {
      return this.lower(element);
    }
    const inner = this.view(element).filter(e => e.child.kind === 'node' || !e.child.trivia);
    const only = inner.length === 1 ? inner[0].child : undefined;
    if (only === undefined || only.kind !== 'node') {
      throw new LoweringError(`Element ${element.name} of ${container.name} does not derive exactly one node; register a rule for it`, {
        nonterminal: container.name,
        offset: element.start.index,
      });
    }
    return this.lower(only);
  }
}
