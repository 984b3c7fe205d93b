import type { Node } from './nodes.js';
import { formatRange, describeUnrecognized, unrecognizedType } from './nodes.js';

interface AstJsonBase {
  type: string;
  value: string | null;
}

export interface AstLeafJson extends AstJsonBase {
  children?: never;
  expr?: never;
}

export interface AstBranchJson extends AstJsonBase {
  children: AstJson[];
  expr?: never;
}

export interface AstScopedJson extends AstJsonBase {
  expr: AstJson;
  children?: never;
}

/** JSON-safe form of a Node. A node carries `children` or `expr`, never both. */
export type AstJson = AstLeafJson | AstBranchJson | AstScopedJson;

/**
 * Converts a Node tree into its JSON-safe structure.
 * Must stay in step with renderDeterministic: every variant handled there has an arm here.
 */
export function serializeNode(node: Node): AstJson {
  switch (node.type) {
    case 'Word':
    case 'Phrase':
      return { type: node.type, value: node.value };
    case 'Range':
      return { type: node.type, value: formatRange(node) };
    case 'SearchField':
      return { type: node.type, value: node.name, expr: serializeNode(node.expr) };
    case 'FieldGroup':
      return { type: node.type, value: null, expr: serializeNode(node.expr) };
    case 'Fuzzy':
    case 'Proximity':
      return { type: node.type, value: node.degree, children: node.children.map(serializeNode) };
    case 'Boost':
      return { type: node.type, value: node.force, children: node.children.map(serializeNode) };
    case 'Group':
    case 'Plus':
    case 'OrOperation':
    case 'AndOperation':
    case 'Not':
    case 'UnknownOperation':
      return { type: node.type, value: null, children: node.children.map(serializeNode) };
    default:
      return serializeUnrecognized(node);
  }
}

function serializeUnrecognized(node: never): AstLeafJson {
  const raw: unknown = node;
  return { type: unrecognizedType(raw), value: describeUnrecognized(raw) };
}

/** Depth of a serialized tree; a lone leaf has depth 0. */
export function astDepth(ast: AstJson): number {
  if (ast.children !== undefined) {
    return ast.children.reduce((max, child) => Math.max(max, astDepth(child) + 1), 0);
  }
  if (ast.expr !== undefined) {
    return astDepth(ast.expr) + 1;
  }
  return 0;
}
