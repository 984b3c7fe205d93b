import type { Node } from './ast/nodes.js';
import type { AstJson } from './ast/serializer.js';

/** Everything produced for one query. Keys match the JSON wire shape. */
export interface QueryResult {
  readonly query: string;
  readonly deterministic_text: string;
  readonly narrative_text: string;
  readonly ast_json: AstJson;
}

export interface GrammarError {
  message: string;
  /** Zero-based offset into the raw query, when the grammar reports one. */
  offset?: number;
}

export type GrammarResult =
  | { ok: true; node: Node }
  | { ok: false; error: GrammarError };

/** Turns raw query syntax into a Node tree. */
export interface GrammarParser {
  parse(raw: string): GrammarResult;
}

export interface QueryParserConfig {
  /** Defaults to the Lucene grammar. */
  grammar?: GrammarParser;
  /** Called once for every query that fails, before the error is thrown. */
  onError?: (query: string, error: Error) => void;
}
