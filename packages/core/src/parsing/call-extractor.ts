import type { SyntaxNode } from 'tree-sitter';
import { LanguageTag } from '../types.js';
import { GrammarRegistry } from './grammar-registry.js';
import { LanguageSyntax, syntaxFor } from './languages.js';
import { searchIdentifier, walkPreOrder } from './syntax-tree.js';

/**
 * Collect the distinct callee names of every call expression under `root`.
 * Order and multiplicity of calls are not kept.
 */
export function collectCalls(root: SyntaxNode, syntax: LanguageSyntax): Set<string> {
  const calls = new Set<string>();

  walkPreOrder(root, (node) => {
    if (!syntax.callTypes.has(node.type)) return;

    const callee = node.childForFieldName(syntax.calleeField);
    if (!callee) return;

    // Zero-width MISSING identifiers from error recovery have empty text.
    const name = searchIdentifier(callee);
    if (name) {
      calls.add(name);
    }
  });

  return calls;
}

/**
 * Parse a function's source text on its own and return the set of names it
 * invokes.
 */
export function extractCalls(
  registry: GrammarRegistry,
  functionText: string,
  language: LanguageTag,
): Set<string> {
  const syntax = syntaxFor(language);
  const source = syntax.fragment
    ? syntax.fragment.prefix + functionText + syntax.fragment.suffix
    : functionText;

  const tree = registry.parse(source, language);
  return collectCalls(tree.rootNode, syntax);
}
