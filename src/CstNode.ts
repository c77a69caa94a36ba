import type { Nonterminal, Production, Terminal } from './GrammarElement.js';

export interface TextLocation {
  index: number;
  line: number;
  column: number;
}

/** Offset to line/column conversion over one input text. */
export class LineMap {
  private readonly lineStarts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') this.lineStarts.push(i + 1);
    }
  }

  locate(offset: number): TextLocation {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { index: offset, line: low + 1, column: offset - this.lineStarts[low] + 1 };
  }
}

export type CstChild = CstNode | CstToken;

export class CstToken {
  readonly kind = 'token' as const;
  readonly terminal: Terminal;
  readonly text: string;
  readonly start: TextLocation;
  readonly end: TextLocation;
  /** Whitespace or comment; AST lowering skips these. */
  readonly trivia: boolean;
  /** Item label in the parent's production, if any. */
  label: string | null;
  parent: CstNode | null = null;

  constructor(terminal: Terminal, text: string, start: TextLocation, end: TextLocation, trivia: boolean, label: string | null) {
    this.terminal = terminal;
    this.text = text;
    this.start = start;
    this.end = end;
    this.trivia = trivia;
    this.label = label;
  }
}

/**
 * One nonterminal in a concrete syntax tree. `children` keeps every token in
 * source order, trivia included, so concatenating the leaves reproduces the input.
 */
export class CstNode {
  readonly kind = 'node' as const;
  readonly nonterminal: Nonterminal;
  readonly production: Production;
  readonly start: TextLocation;
  readonly end: TextLocation;
  readonly text: string;
  readonly children: CstChild[];
  label: string | null;
  parent: CstNode | null = null;

  constructor(
    nonterminal: Nonterminal,
    production: Production,
    start: TextLocation,
    end: TextLocation,
    text: string,
    children: CstChild[],
    label: string | null,
  ) {
    this.nonterminal = nonterminal;
    this.production = production;
    this.start = start;
    this.end = end;
    this.text = text;
    this.children = children;
    this.label = label;
    for (const child of children) {
      child.parent = this;
    }
  }

  get name(): string {
    return this.nonterminal.name;
  }

  get productionIndex(): number {
    return this.production.index;
  }

  /** Children that carry meaning: everything except trivia tokens. */
  get items(): CstChild[] {
    return this.children.filter(c => c.kind === 'node' || !c.trivia);
  }

  field(label: string): CstChild | undefined {
    return this.children.find(c => c.label === label);
  }

  fields(label: string): CstChild[] {
    return this.children.filter(c => c.label === label);
  }

  /** Every leaf token below this node, in source order. */
  tokens(): CstToken[] {
    const result: CstToken[] = [];
    const stack: CstChild[] = [this];
    while (stack.length > 0) {
      const current = stack.pop();
      if (!current) break;
      if (current.kind === 'token') {
        result.push(current);
      } else {
        for (let i = current.children.length - 1; i >= 0; i--) {
          stack.push(current.children[i]);
        }
      }
    }
    return result;
  }

  /** Compact bracketed form without trivia, e.g. `(E (E 1) + 2)`. */
  toString(): string {
    const parts: string[] = [];
    const stack: Array<CstChild | string> = [this];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      if (typeof current === 'string' || current.kind === 'token') {
        parts.push(typeof current === 'string' ? current : current.text);
        continue;
      }
      const items = current.items;
      parts.push(`(${current.name}`);
      stack.push(')');
      for (let i = items.length - 1; i >= 0; i--) {
        stack.push(items[i], ' ');
      }
    }
    return parts.join('');
  }
}
