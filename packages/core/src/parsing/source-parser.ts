import type { SyntaxNode } from 'tree-sitter';
import { FunctionDefinition, LanguageTag, ScannedFunction } from '../types.js';
import { GrammarRegistry } from './grammar-registry.js';
import { LanguageSyntax, syntaxFor } from './languages.js';
import { collectCalls } from './call-extractor.js';
import { findFirstOfType, searchIdentifier, walkPreOrder } from './syntax-tree.js';

function findParameters(node: SyntaxNode, syntax: LanguageSyntax): SyntaxNode | null {
  if (syntax.parametersHost === null) {
    return node.childForFieldName(syntax.parametersField);
  }

  // C declarators nest: `int *f(void)` is a pointer_declarator wrapping the
  // function_declarator that owns the parameter list.
  const declarator = node.childForFieldName(syntax.nameField);
  if (!declarator) return null;

  const host = findFirstOfType(declarator, syntax.parametersHost);
  return host ? host.childForFieldName(syntax.parametersField) : null;
}

function toDefinition(
  node: SyntaxNode,
  syntax: LanguageSyntax,
  language: LanguageTag,
  filePath: string,
): FunctionDefinition {
  const nameNode = node.childForFieldName(syntax.nameField);
  const parameters = findParameters(node, syntax);
  const returnType = node.childForFieldName(syntax.returnTypeField);

  return {
    name: (nameNode && searchIdentifier(nameNode)) || '',
    filePath,
    language,
    signature: parameters ? parameters.text : '',
    returnType: returnType ? returnType.text : '',
    code: node.text,
    // tree-sitter rows are 0-based.
    startLine: node.startPosition.row + 1,
    endLine: node.endPosition.row + 1,
  };
}

function definitionNodes(root: SyntaxNode, syntax: LanguageSyntax): SyntaxNode[] {
  const nodes: SyntaxNode[] = [];
  walkPreOrder(root, (node) => {
    if (syntax.definitionTypes.has(node.type)) {
      nodes.push(node);
    }
    // Keep descending: methods live inside class and namespace bodies.
  });
  return nodes;
}

/**
 * Parse one file into its function definitions, in document order.
 *
 * Syntax errors do not abort the scan: tree-sitter recovers locally and any
 * definition still recognizable in the partial tree is returned.
 */
export function parseFunctions(
  registry: GrammarRegistry,
  source: string,
  language: LanguageTag,
  filePath: string = '',
): FunctionDefinition[] {
  const syntax = syntaxFor(language);
  const tree = registry.parse(source, language);
  return definitionNodes(tree.rootNode, syntax).map((node) =>
    toDefinition(node, syntax, language, filePath),
  );
}

/**
 * {@link parseFunctions}, plus the set of names each body calls, taken from
 * the same tree instead of re-parsing every body.
 */
export function scanFunctions(
  registry: GrammarRegistry,
  source: string,
  language: LanguageTag,
  filePath: string = '',
): ScannedFunction[] {
  const syntax = syntaxFor(language);
  const tree = registry.parse(source, language);
  return definitionNodes(tree.rootNode, syntax).map((node) => ({
    definition: toDefinition(node, syntax, language, filePath),
    calls: collectCalls(node, syntax),
  }));
}
