export type Node =
  | WordNode
  | PhraseNode
  | SearchFieldNode
  | GroupNode
  | FieldGroupNode
  | OrOperationNode
  | AndOperationNode
  | NotNode
  | UnknownOperationNode
  | RangeNode
  | FuzzyNode
  | ProximityNode
  | BoostNode
  | PlusNode;

export type NodeType = Node['type'];

export interface WordNode {
  readonly type: 'Word';
  readonly value: string;
}

/** `value` keeps the surrounding double quotes. */
export interface PhraseNode {
  readonly type: 'Phrase';
  readonly value: string;
}

export interface SearchFieldNode {
  readonly type: 'SearchField';
  readonly name: string;
  readonly expr: Node;
}

export interface GroupNode {
  readonly type: 'Group';
  readonly children: readonly [Node];
}

/** Parenthesized expression directly under a field scope: `field:( ... )`. */
export interface FieldGroupNode {
  readonly type: 'FieldGroup';
  readonly expr: Node;
}

export interface OrOperationNode {
  readonly type: 'OrOperation';
  readonly children: readonly Node[];
}

export interface AndOperationNode {
  readonly type: 'AndOperation';
  readonly children: readonly Node[];
}

/** Only the first child is ever rendered. */
export interface NotNode {
  readonly type: 'Not';
  readonly children: readonly [Node, ...Node[]];
}

/** Terms written side by side with no operator between them. */
export interface UnknownOperationNode {
  readonly type: 'UnknownOperation';
  readonly children: readonly Node[];
}

/** `[low TO high]`, `{low TO high}` or a mix of both brackets. */
export interface RangeNode {
  readonly type: 'Range';
  readonly low: string;
  readonly high: string;
  readonly includeLow: boolean;
  readonly includeHigh: boolean;
}

/** `term~degree` on an unquoted term. */
export interface FuzzyNode {
  readonly type: 'Fuzzy';
  readonly children: readonly [Node];
  readonly degree: string;
}

/** `"phrase"~degree`. */
export interface ProximityNode {
  readonly type: 'Proximity';
  readonly children: readonly [Node];
  readonly degree: string;
}

export interface BoostNode {
  readonly type: 'Boost';
  readonly children: readonly [Node];
  readonly force: string;
}

/** `+term`: the term is required. */
export interface PlusNode {
  readonly type: 'Plus';
  readonly children: readonly [Node];
}

export function word(value: string): WordNode {
  return { type: 'Word', value };
}

export function phrase(value: string): PhraseNode {
  return { type: 'Phrase', value };
}

export function searchField(name: string, expr: Node): SearchFieldNode {
  return { type: 'SearchField', name, expr };
}

export function group(child: Node): GroupNode {
  return { type: 'Group', children: [child] };
}

export function fieldGroup(expr: Node): FieldGroupNode {
  return { type: 'FieldGroup', expr };
}

export function orOperation(...children: Node[]): OrOperationNode {
  return { type: 'OrOperation', children };
}

export function andOperation(...children: Node[]): AndOperationNode {
  return { type: 'AndOperation', children };
}

export function not(child: Node, ...rest: Node[]): NotNode {
  return { type: 'Not', children: [child, ...rest] };
}

export function unknownOperation(...children: Node[]): UnknownOperationNode {
  return { type: 'UnknownOperation', children };
}

export function range(low: string, high: string, includeLow = true, includeHigh = true): RangeNode {
  return { type: 'Range', low, high, includeLow, includeHigh };
}

export function fuzzy(child: Node, degree: string): FuzzyNode {
  return { type: 'Fuzzy', children: [child], degree };
}

export function proximity(child: Node, degree: string): ProximityNode {
  return { type: 'Proximity', children: [child], degree };
}

export function boost(child: Node, force: string): BoostNode {
  return { type: 'Boost', children: [child], force };
}

export function plus(child: Node): PlusNode {
  return { type: 'Plus', children: [child] };
}

/** Lucene source form of a range, e.g. `[1 TO 5}`. */
export function formatRange(node: RangeNode): string {
  const open = node.includeLow ? '[' : '{';
  const close = node.includeHigh ? ']' : '}';
  return `${open}${node.low} TO ${node.high}${close}`;
}

/**
 * Lucene source form of a tree, e.g. `title:(foo~2 OR "a b"~3)^2`.
 * Variants with no explanation template of their own are rendered this way.
 */
export function formatSource(node: Node): string {
  switch (node.type) {
    case 'Word':
    case 'Phrase':
      return node.value;
    case 'Range':
      return formatRange(node);
    case 'SearchField':
      return `${node.name}:${formatSource(node.expr)}`;
    case 'Group':
      return `(${formatSource(node.children[0])})`;
    case 'FieldGroup':
      return `(${formatSource(node.expr)})`;
    case 'OrOperation':
      return node.children.map(formatSource).join(' OR ');
    case 'AndOperation':
      return node.children.map(formatSource).join(' AND ');
    case 'UnknownOperation':
      return node.children.map(formatSource).join(' ');
    case 'Not':
      return `NOT ${formatSource(node.children[0])}`;
    case 'Fuzzy':
    case 'Proximity':
      return `${formatSource(node.children[0])}~${node.degree}`;
    case 'Boost':
      return `${formatSource(node.children[0])}^${node.force}`;
    case 'Plus':
      return `+${formatSource(node.children[0])}`;
    default:
      return formatUnrecognized(node);
  }
}

function formatUnrecognized(node: never): string {
  return describeUnrecognized(node);
}

/**
 * Text for a value that arrived where a Node was expected but matches no
 * variant. Never empty, never throws.
 */
export function describeUnrecognized(raw: unknown): string {
  let text: string | undefined;
  try {
    text = JSON.stringify(raw);
  } catch {
    text = undefined;
  }
  text ??= String(raw);
  return text.length > 0 ? text : '<unrecognized node>';
}

/** Type name reported for a value that matches no variant. */
export function unrecognizedType(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'type' in raw && typeof raw.type === 'string') {
    return raw.type;
  }
  return 'Unknown';
}
