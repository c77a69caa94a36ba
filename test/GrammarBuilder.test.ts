import { describe, it, expect } from 'vitest';
import {
  GrammarBuilder,
  GrammarError,
  CstNode,
  EndOfFile,
  extractCst,
  parse,
  whitespace,
  type Grammar,
} from '../src/index.js';

function treeOf(grammar: Grammar, input: string): CstNode {
  const result = parse(grammar, input);
  if (!result.ok) throw result.failure;
  const extracted = extractCst(result.forest);
  if (!extracted.ok) throw extracted.error;
  return extracted.tree;
}

function nodeField(node: CstNode, label: string): CstNode {
  const child = node.field(label);
  if (!(child instanceof CstNode)) throw new Error(`no node labelled ${label}`);
  return child;
}

describe('GrammarBuilder terminals', () => {
  it('creates literal and pattern terminals from terminal()', () => {
    const b = new GrammarBuilder();
    expect(b.terminal('if').describe()).toBe("'if'");
    expect(b.terminal(/[0-9]+/, 'number').describe()).toBe('number');
  });

  it('reuses one terminal per plain string', () => {
    const b = new GrammarBuilder();
    expect(b.resolve('+')).toBe(b.resolve('+'));
  });

  it('rejects duplicate terminal names', () => {
    const b = new GrammarBuilder();
    b.pattern(/[a-z]+/, { name: 'word' });
    expect(() => b.pattern(/[A-Z]+/, { name: 'word' })).toThrow("Duplicate terminal name: 'word'");
  });

  it('registers trivia terminals', () => {
    const b = new GrammarBuilder();
    const comment = b.pattern(/#[^\n]*/, { name: 'comment', trivia: true });
    b.addTrivia(comment, comment);
    b.rule('S', [['x']]);
    expect(b.build('S').trivia).toEqual([comment]);
  });

  it('leaves terminals not created as trivia untouched', () => {
    const b = new GrammarBuilder();
    const x = b.terminal('x');
    expect(() => b.addTrivia(x)).toThrow("Trivia terminal 'x' is not flagged as trivia");
    expect(() => b.addTrivia(EndOfFile)).toThrow(GrammarError);
    expect(x.trivia).toBe(false);
    expect(EndOfFile.trivia).toBe(false);
    expect(() => new GrammarBuilder({ trivia: [EndOfFile] })).toThrow(GrammarError);
  });
});

describe('GrammarBuilder rules', () => {
  it('labels alternatives and items', () => {
    const b = new GrammarBuilder();
    const num = b.terminal(/[0-9]+/, 'number');
    b.rule('Pair', [{ label: 'pair', items: [b.label('left', num), ',', b.label('right', num)] }]);
    const g = b.build('Pair');
    const [pair] = g.productionsOf('Pair');
    expect(pair.label).toBe('pair');
    expect(pair.items.map(i => i.label)).toEqual(['left', null, 'right']);

    const tree = treeOf(g, '3,4');
    expect(tree.field('left')?.text).toBe('3');
    expect(tree.field('right')?.text).toBe('4');
  });

  it('rejects a nonterminal defined twice', () => {
    const b = new GrammarBuilder();
    b.rule('S', [['x']]);
    expect(() => b.rule('S', [['y']])).toThrow("Duplicate nonterminal 'S'");
  });

  it('applies allowEmpty from the builder options', () => {
    const b = new GrammarBuilder({ allowEmpty: false });
    b.rule('S', [[]]);
    expect(() => b.build('S')).toThrow(GrammarError);
  });
});

describe('optional', () => {
  const b = new GrammarBuilder();
  const num = b.terminal(/[0-9]+/, 'number');
  b.rule('Num', [[b.label('sign', b.optional('-')), num]]);
  const g = b.build('Num');

  it('desugars into an optional nonterminal', () => {
    const opt = g.nonterminal("'-'?");
    expect(opt.type).toBe('optional');
    expect(opt.synthetic).toBe(true);
    expect(opt.productions.map(p => p.toString())).toEqual(["'-'? ::= ε", "'-'? ::= '-'"]);
  });

  it('yields an empty node when the element is absent', () => {
    const tree = treeOf(g, '5');
    expect(nodeField(tree, 'sign').children).toHaveLength(0);
  });

  it('labels the present element', () => {
    const sign = nodeField(treeOf(g, '-5'), 'sign');
    expect(sign.children.map(c => [c.label, c.kind === 'token' ? c.text : c.name])).toEqual([['element', '-']]);
  });

  it('rejects labels inside the optional element', () => {
    expect(() => b.optional(b.label('x', '-'))).toThrow(GrammarError);
  });
});

describe('repeat', () => {
  it('desugars into a left-recursive repetition', () => {
    const b = new GrammarBuilder();
    const num = b.terminal(/[0-9]+/, 'number');
    b.rule('Nums', [[b.label('values', b.repeat(num))]]);
    const g = b.build('Nums');
    const rep = g.nonterminal('number*');
    expect(rep.type).toBe('repetition');
    expect(rep.productions.map(p => p.toString())).toEqual(['number* ::= ε', 'number* ::= number* number']);
  });

  it('splices nested repetition nodes into one list', () => {
    const b = new GrammarBuilder({ trivia: [whitespace()] });
    const num = b.terminal(/[0-9]+/, 'number');
    b.rule('Nums', [[b.label('values', b.repeat(num))]]);
    const values = nodeField(treeOf(b.build('Nums'), '1 2 3'), 'values');
    expect(values.fields('element').map(c => c.text)).toEqual(['1', '2', '3']);
    expect(values.children.every(c => c.kind === 'token')).toBe(true);
  });

  it('requires one element when min is 1', () => {
    const b = new GrammarBuilder();
    const num = b.terminal(/[0-9]+/, 'number');
    b.rule('Nums', [[b.repeat(num, { min: 1 })]]);
    const g = b.build('Nums');
    expect(g.nonterminal('number+').productions.map(p => p.toString())).toEqual([
      'number+ ::= number',
      'number+ ::= number+ number',
    ]);
    expect(parse(g, '').ok).toBe(false);
  });

  it('rejects other minimums', () => {
    const b = new GrammarBuilder();
    expect(() => b.repeat('x', { min: 2 })).toThrow('Repetition minimum must be 0 or 1, got 2');
  });

  describe('with a separator', () => {
    const b = new GrammarBuilder();
    const num = b.terminal(/[0-9]+/, 'number');
    b.rule('List', [['[', b.label('items', b.repeat(num, { separator: ',' })), ']']]);
    const g = b.build('List');

    it('builds a list rule and a wrapper that admits no elements', () => {
      expect(g.nonterminal("number+/','").productions.map(p => p.toString())).toEqual([
        "number+/',' ::= number",
        "number+/',' ::= number+/',' ',' number",
      ]);
      expect(g.nonterminal("number*/','").productions.map(p => p.toString())).toEqual([
        "number*/',' ::= ε",
        "number*/',' ::= number+/','",
      ]);
    });

    it('labels elements and separators', () => {
      const items = nodeField(treeOf(g, '[1,2,3]'), 'items');
      expect(items.fields('element').map(c => c.text)).toEqual(['1', '2', '3']);
      expect(items.fields('separator')).toHaveLength(2);
      expect(items.children.map(c => c.label)).toEqual(['element', 'separator', 'element', 'separator', 'element']);
    });

    it('accepts an empty list', () => {
      expect(nodeField(treeOf(g, '[]'), 'items').children).toHaveLength(0);
    });

    it('rejects a trailing separator', () => {
      expect(parse(g, '[1,]').ok).toBe(false);
    });
  });

  it('accepts a trailing separator when allowed', () => {
    const b = new GrammarBuilder();
    const num = b.terminal(/[0-9]+/, 'number');
    b.rule('List', [['[', b.label('items', b.repeat(num, { separator: ',', min: 1, allowTrailing: true })), ']']]);
    const g = b.build('List');
    const items = nodeField(treeOf(g, '[1,2,]'), 'items');
    expect(items.children.map(c => c.label)).toEqual(['element', 'separator', 'element', 'separator']);
    expect(parse(g, '[]').ok).toBe(false);
  });
});

describe('choice', () => {
  it('desugars into a group nonterminal', () => {
    const b = new GrammarBuilder();
    b.rule('Bool', [[b.choice([['true'], ['false']])]]);
    const g = b.build('Bool');
    const group = g.nonterminal("('true' | 'false')");
    expect(group.type).toBe('group');
    expect(treeOf(g, 'false').toString()).toBe("(Bool (('true' | 'false') false))");
  });

  it('disambiguates synthetic names that collide', () => {
    const b = new GrammarBuilder();
    const first = b.optional('x');
    const second = b.optional('x');
    expect(first.name).toBe("'x'?");
    expect(second.name).toBe("'x'?#2");
  });
});
