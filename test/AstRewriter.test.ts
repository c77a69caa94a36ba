import { describe, it, expect } from 'vitest';
import {
  AstRewriter,
  GrammarBuilder,
  GrammarError,
  LoweringError,
  UnhandledProductionError,
  extractCst,
  parse,
  type CstNode,
  type Grammar,
} from '../src/index.js';

function sumGrammar(): Grammar {
  const b = new GrammarBuilder();
  const num = b.terminal(/[0-9]+/, 'number');
  b.rule('Expr', [
    { label: 'add', items: [b.label('left', b.nt('Expr')), '+', b.label('right', b.nt('Term'))] },
    { label: 'term', items: [b.nt('Term')] },
  ]);
  b.rule('Term', [[num]]);
  return b.build('Expr');
}

function cstOf(grammar: Grammar, input: string): CstNode {
  const result = parse(grammar, input);
  if (!result.ok) throw result.failure;
  const extracted = extractCst(result.forest);
  if (!extracted.ok) throw extracted.error;
  return extracted.tree;
}

function evaluator(grammar: Grammar): AstRewriter<number> {
  return new AstRewriter<number>(grammar)
    .register('Expr', 'add', ctx => ctx.lower(ctx.field('left')) + ctx.lower(ctx.field('right')))
    .register('Expr', 'term', ctx => ctx.lower(ctx.items[0]))
    .register('Term', 0, ctx => Number(ctx.text()));
}

type Ast = { kind: 'add'; left: Ast; right: Ast } | { kind: 'num'; value: number };

describe('AstRewriter', () => {
  const g = sumGrammar();

  it('lowers a tree bottom-up', () => {
    expect(evaluator(g).lower(cstOf(g, '1+2+3'))).toBe(6);
  });

  it('builds caller-defined node types', () => {
    const rewriter = new AstRewriter<Ast>(g)
      .register('Expr', 'add', ctx => ({ kind: 'add', left: ctx.lower(ctx.field('left')), right: ctx.lower(ctx.field('right')) }))
      .register('Expr', 'term', ctx => ctx.lower(ctx.items[0]))
      .register('Term', 0, ctx => ({ kind: 'num', value: Number(ctx.text()) }));
    expect(rewriter.lower(cstOf(g, '4+5'))).toEqual({
      kind: 'add',
      left: { kind: 'num', value: 4 },
      right: { kind: 'num', value: 5 },
    });
  });

  it('reads token text through the context', () => {
    const rewriter = new AstRewriter<string>(g)
      .register('Expr', 'add', ctx => `${ctx.lower(ctx.field('left'))}${ctx.text(ctx.items[1])}${ctx.lower(ctx.field('right'))}`)
      .register('Expr', 'term', ctx => ctx.lower(ctx.items[0]))
      .register('Term', 0, ctx => `<${ctx.text()}>`);
    expect(rewriter.lower(cstOf(g, '1+2'))).toBe('<1>+<2>');
  });

  it('lists productions without a rule', () => {
    const rewriter = new AstRewriter<number>(g).register('Expr', 'add', () => 0);
    expect(rewriter.missingRules().map(p => p.toString())).toEqual(['Expr ::= Term', 'Term ::= number']);
    expect(evaluator(g).missingRules()).toEqual([]);
  });

  it('names the production and span that has no rule', () => {
    const rewriter = new AstRewriter<number>(g)
      .register('Expr', 'add', ctx => ctx.lower(ctx.field('left')) + ctx.lower(ctx.field('right')))
      .register('Expr', 'term', ctx => ctx.lower(ctx.items[0]));
    let error: unknown;
    try {
      rewriter.lower(cstOf(g, '1+2'));
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(UnhandledProductionError);
    if (!(error instanceof UnhandledProductionError)) return;
    expect([error.nonterminal, error.productionIndex, error.start, error.end]).toEqual(['Term', 0, 0, 1]);
    expect(error.message).toBe('No lowering rule for Term#0 (span [0, 1))');
  });

  it('rejects rules for unknown targets', () => {
    const rewriter = new AstRewriter<number>(g);
    expect(() => rewriter.register('Nope', 0, () => 0)).toThrow(GrammarError);
    expect(() => rewriter.register('Expr', 'sub', () => 0)).toThrow(GrammarError);
    expect(() => rewriter.register('Expr', 5, () => 0)).toThrow(GrammarError);
  });

  it('requires every child node to be lowered', () => {
    const lazy = new AstRewriter<number>(g)
      .register('Expr', 'add', ctx => ctx.lower(ctx.field('left')))
      .register('Expr', 'term', ctx => ctx.lower(ctx.items[0]))
      .register('Term', 0, ctx => Number(ctx.text()));
    expect(() => lazy.lower(cstOf(g, '1+2'))).toThrow(LoweringError);
  });

  it('allows skipped children when configured', () => {
    const lazy = new AstRewriter<number>(g, { requireAllChildren: false })
      .register('Expr', 'add', ctx => ctx.lower(ctx.field('left')))
      .register('Expr', 'term', ctx => ctx.lower(ctx.items[0]))
      .register('Term', 0, ctx => Number(ctx.text()));
    expect(lazy.lower(cstOf(g, '1+2+3'))).toBe(1);
  });

  it('lowers each child at most once', () => {
    const greedy = new AstRewriter<number>(g)
      .register('Expr', 'add', ctx => ctx.lower(ctx.field('left')) + ctx.lower(ctx.field('left')))
      .register('Expr', 'term', ctx => ctx.lower(ctx.items[0]))
      .register('Term', 0, ctx => Number(ctx.text()));
    expect(() => greedy.lower(cstOf(g, '1+2'))).toThrow('was lowered twice');
  });

  it('does not lower tokens', () => {
    const wrong = new AstRewriter<number>(g)
      .register('Expr', 'add', ctx => ctx.lower(ctx.items[1]))
      .register('Expr', 'term', ctx => ctx.lower(ctx.items[0]))
      .register('Term', 0, ctx => Number(ctx.text()));
    expect(() => wrong.lower(cstOf(g, '1+2'))).toThrow(LoweringError);
  });

  it('lowers the elements of a repetition', () => {
    const b = new GrammarBuilder();
    const num = b.terminal(/[0-9]+/, 'number');
    b.rule('List', [['(', b.label('items', b.repeat(b.nt('Item'), { separator: ',' })), ')']]);
    b.rule('Item', [[num]]);
    const list = b.build('List');
    const rewriter = new AstRewriter<number[]>(list)
      .register('List', 0, ctx => ctx.lowerElements(ctx.field('items')).flat())
      .register('Item', 0, ctx => [Number(ctx.text()) * 10]);
    expect(rewriter.lower(cstOf(list, '(1,2,3)'))).toEqual([10, 20, 30]);
    expect(rewriter.lower(cstOf(list, '()'))).toEqual([]);
  });

  it('refuses token elements in lowerElements', () => {
    const b = new GrammarBuilder();
    const num = b.terminal(/[0-9]+/, 'number');
    b.rule('List', [[b.label('items', b.repeat(num))]]);
    const list = b.build('List');
    const rewriter = new AstRewriter<number>(list).register('List', 0, ctx => ctx.lowerElements(ctx.field('items')).length);
    expect(() => rewriter.lower(cstOf(list, '7'))).toThrow(LoweringError);
  });
  describe('choice groups', () => {
    function pairGrammar(): Grammar {
      const b = new GrammarBuilder();
      b.rule('Pair', [[b.choice([['a'], ['b']]), 'c']]);
      return b.build('Pair');
    }

    function letters(build: (b: GrammarBuilder) => void): Grammar {
      const b = new GrammarBuilder();
      build(b);
      b.rule('A', [['a']]);
      b.rule('B', [['b']]);
      return b.build('S');
    }

    const named = (rewriter: AstRewriter<string>): AstRewriter<string> =>
      rewriter.register('A', 0, ctx => `A:${ctx.text()}`).register('B', 0, ctx => `B:${ctx.text()}`);

    it('needs no rule of their own', () => {
      const pair = pairGrammar();
      const rewriter = new AstRewriter<string>(pair).register('Pair', 0, ctx => ctx.items.map(i => ctx.text(i)).join(''));
      expect(rewriter.missingRules()).toEqual([]);
      expect(rewriter.lower(cstOf(pair, 'ac'))).toBe('ac');
      expect(rewriter.lower(cstOf(pair, 'bc'))).toBe('bc');
    });

    it('hands their label to the node they derive', () => {
      const g = letters(b => b.rule('S', [[b.label('value', b.choice([[b.nt('A')], [b.nt('B')]]))]]));
      const rewriter = named(new AstRewriter<string>(g).register('S', 0, ctx => ctx.lower(ctx.field('value'))));
      expect(rewriter.lower(cstOf(g, 'a'))).toBe('A:a');
      expect(rewriter.lower(cstOf(g, 'b'))).toBe('B:b');
    });

    it('still requires the nodes inside them to be lowered', () => {
      const g = letters(b => b.rule('S', [[b.label('value', b.choice([[b.nt('A')], [b.nt('B')]]))]]));
      const rewriter = named(new AstRewriter<string>(g).register('S', 0, () => 'none'));
      expect(() => rewriter.lower(cstOf(g, 'b'))).toThrow('ignored child B');
    });

    it('lowers repeated alternatives element by element', () => {
      const g = letters(b => b.rule('S', [[b.label('items', b.repeat(b.choice([[b.nt('A')], [b.nt('B')]])))]]));
      const rewriter = named(new AstRewriter<string>(g).register('S', 0, ctx => ctx.lowerElements(ctx.field('items')).join(',')));
      expect(rewriter.lower(cstOf(g, 'aba'))).toBe('A:a,B:b,A:a');
    });

    it('refuses repeated alternatives that derive more than one node', () => {
      const g = letters(b => b.rule('S', [[b.label('items', b.repeat(b.choice([[b.nt('A'), b.nt('B')]])))]]));
      const rewriter = named(new AstRewriter<string>(g).register('S', 0, ctx => ctx.lowerElements(ctx.field('items')).join(',')));
      expect(() => rewriter.lower(cstOf(g, 'ab'))).toThrow('does not derive exactly one node');
    });
  });
});
