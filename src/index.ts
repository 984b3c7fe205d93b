export { QueryParser, parseQuery } from './parser.js';
export type {
  QueryResult,
  QueryParserConfig,
  GrammarParser,
  GrammarResult,
  GrammarError,
} from './types.js';
export { QuerySyntaxError } from './errors.js';
export {
  word,
  phrase,
  searchField,
  group,
  fieldGroup,
  orOperation,
  andOperation,
  not,
  unknownOperation,
  range,
  fuzzy,
  proximity,
  boost,
  plus,
} from './ast/nodes.js';
export type {
  Node,
  NodeType,
  WordNode,
  PhraseNode,
  SearchFieldNode,
  GroupNode,
  FieldGroupNode,
  OrOperationNode,
  AndOperationNode,
  NotNode,
  UnknownOperationNode,
  RangeNode,
  FuzzyNode,
  ProximityNode,
  BoostNode,
  PlusNode,
} from './ast/nodes.js';
export { serializeNode, astDepth } from './ast/serializer.js';
export type { AstJson, AstLeafJson, AstBranchJson, AstScopedJson } from './ast/serializer.js';
export { renderDeterministic } from './render/deterministic.js';
export { normalizeNarrative } from './render/narrative.js';
export { createLuceneGrammar } from './grammar/lucene-grammar.js';
