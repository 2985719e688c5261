import type { SyntaxNode } from 'tree-sitter';

/**
 * Visit `root` and its descendants in pre-order (document order), using an
 * explicit stack. Returning `false` from the visitor stops the walk.
 */
export function walkPreOrder(
  root: SyntaxNode,
  visit: (node: SyntaxNode) => boolean | void,
): void {
  const stack: SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;

    if (visit(node) === false) return;

    // Push in reverse so the leftmost child is visited next.
    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
}

/** First node of `type` in the subtree, in pre-order, or `null`. */
export function findFirstOfType(root: SyntaxNode, type: string): SyntaxNode | null {
  const stack: SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    if (node.type === type) return node;

    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  return null;
}

/** The parts of a syntax node that identifier search reads. */
export interface IdentifierSearchNode {
  type: string;
  text: string;
  children: IdentifierSearchNode[];
}

/**
 * Text of the first non-empty `identifier` token in the subtree. Identifiers
 * the parser inserted to recover from an error span no text and are skipped.
 *
 * This is a heuristic: qualified names resolve to their first plain
 * identifier, and member or pointer calls resolve to whatever identifier
 * comes first, which is usually the receiver rather than the method.
 */
export function searchIdentifier(root: IdentifierSearchNode): string | null {
  const stack: IdentifierSearchNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    if (node.type === 'identifier' && node.text.length > 0) return node.text;

    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  return null;
}
