import type { Node, SearchFieldNode } from '../ast/nodes.js';
import { formatRange, formatSource, describeUnrecognized } from '../ast/nodes.js';

const ITEM_SEPARATOR = '; ';

/**
 * Renders a Node tree into fixed-template text describing the set operations
 * the query performs. The narrative normalizer matches on these exact phrases,
 * so any wording change here must be mirrored there.
 */
export function renderDeterministic(node: Node): string {
  switch (node.type) {
    case 'Phrase':
      return node.value;
    case 'Word':
      return `contains "${node.value}"`;
    case 'SearchField':
      return renderSearchField(node);
    case 'OrOperation':
      return `Include items that match ANY of: (${node.children.map(renderDeterministic).join(ITEM_SEPARATOR)})`;
    case 'AndOperation':
      return `Include items that match ALL of: (${node.children.map(renderDeterministic).join(ITEM_SEPARATOR)})`;
    case 'Not':
      // Extra children are ignored.
      return `EXCLUDE items where: (${renderDeterministic(node.children[0])})`;
    case 'Group':
      return renderDeterministic(node.children[0]);
    case 'FieldGroup':
      return renderDeterministic(node.expr);
    case 'UnknownOperation':
      return node.children.map(renderDeterministic).join(' ');
    case 'Range':
      return formatRange(node);
    case 'Fuzzy':
    case 'Proximity':
    case 'Boost':
    case 'Plus':
      // No template: written back as Lucene source.
      return formatSource(node);
    default:
      return renderUnrecognized(node);
  }
}

function renderSearchField(node: SearchFieldNode): string {
  const { name, expr } = node;
  if (expr.type !== 'FieldGroup') {
    return `${name}: ${renderDeterministic(expr)}`;
  }

  const inner = expr.expr;
  switch (inner.type) {
    case 'Phrase':
      return `${name}: contains the EXACT PHRASE "${stripQuotes(inner.value)}"`;
    case 'OrOperation':
      return `${name}: contains ANY of [${inner.children.map(renderListItem).join(ITEM_SEPARATOR)}]`;
    case 'AndOperation':
      return `${name}: contains ALL of [${inner.children.map(renderListItem).join(ITEM_SEPARATOR)}]`;
    default:
      return `${name}: ${renderDeterministic(inner)}`;
  }
}

/** Member of a field-scoped bracket list: bare words are quoted, not prefixed with "contains". */
function renderListItem(node: Node): string {
  if (node.type === 'Phrase') return node.value;
  if (node.type === 'Word') return `"${node.value}"`;
  return renderDeterministic(node);
}

function stripQuotes(value: string): string {
  return value.replace(/^"+|"+$/g, '');
}

function renderUnrecognized(node: never): string {
  return describeUnrecognized(node);
}
