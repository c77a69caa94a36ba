import type { NonterminalReference } from './Grammar.js';
import type { GrammarBuilder } from './GrammarBuilder.js';
import { PatternTerminal, type Terminal } from './GrammarElement.js';

const IDENTIFIER = '(?:[a-zA-Z][a-zA-Z0-9_]*|_[a-zA-Z0-9_]+)';

/** Identifier or keyword, with optional raw prefix: `foo`, `_42`, `r#match`. */
export function ident(): PatternTerminal {
  return new PatternTerminal(new RegExp(`(?:r#)?${IDENTIFIER}`), { name: 'ident' });
}

/** `'a`, `'static` */
export function lifetime(): PatternTerminal {
  return new PatternTerminal(new RegExp(`'${IDENTIFIER}(?!')`), { name: 'lifetime' });
}

/** Single-character punctuation. Brackets are excluded; they delimit token trees. */
export function punct(): PatternTerminal {
  return new PatternTerminal(/[;,.@#~?:$=!<>\-&+*/^%]/, { name: 'punct' });
}

const LITERAL_PATTERNS = [
  // binary, hexadecimal and decimal numbers, with an optional type suffix
  '0b(?:[01_]+\\.?[01_]*|[01_]*\\.[01_]+)(?:[fui][0-9]+)?',
  '0x(?:[0-9a-fA-F_]+\\.?[0-9a-fA-F_]*|[0-9a-fA-F_]*\\.[0-9a-fA-F_]+)(?:[fui][0-9]+)?',
  '(?:[0-9][0-9_]*\\.?[0-9_]*|(?:[0-9][0-9_]*)?\\.[0-9_]+)(?:[fui][0-9]+)?',
  // characters and bytes
  "b?'(?:\\\\.|[^\\\\'])'",
  // strings and byte strings
  'b?"(?:\\\\[\\s\\S]|[^\\\\"])*"',
];

/** Numeric, character and string literals. */
export function literal(): PatternTerminal {
  return new PatternTerminal(new RegExp(LITERAL_PATTERNS.join('|')), { name: 'literal' });
}

export function whitespace(): PatternTerminal {
  return new PatternTerminal(/\s+/, { name: 'whitespace', trivia: true });
}

export function lineComment(prefix = '//'): PatternTerminal {
  return new PatternTerminal(new RegExp(`${escapeRegExp(prefix)}[^\\n]*`), { name: 'comment', trivia: true });
}

/** Non-nesting block comment. */
export function blockComment(open = '/*', close = '*/'): PatternTerminal {
  return new PatternTerminal(new RegExp(`${escapeRegExp(open)}[\\s\\S]*?${escapeRegExp(close)}`), {
    name: 'comment',
    trivia: true,
  });
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

export interface TokenTreeTerminals {
  literal: Terminal;
  ident: Terminal;
  lifetime: Terminal;
  punct: Terminal;
}

/**
 * Add a `TokenTree` rule: a single literal, identifier, lifetime or punctuation
 * token, or a bracketed sequence of token trees.
 */
export function addTokenTreeRules(
  builder: GrammarBuilder,
  name = 'TokenTree',
  terminals?: Partial<TokenTreeTerminals>,
): NonterminalReference {
  const self = builder.nt(name);
  const trees = builder.repeat(self);
  return builder.rule(name, [
    { label: 'literal', items: [terminals?.literal ?? literal()] },
    { label: 'ident', items: [terminals?.ident ?? ident()] },
    { label: 'lifetime', items: [terminals?.lifetime ?? lifetime()] },
    { label: 'punct', items: [terminals?.punct ?? punct()] },
    { label: 'parens', items: ['(', builder.label('trees', trees), ')'] },
    { label: 'braces', items: ['{', builder.label('trees', trees), '}'] },
    { label: 'brackets', items: ['[', builder.label('trees', trees), ']'] },
  ]);
}
