import { QuerySyntaxError } from './errors.js';
import { serializeNode } from './ast/serializer.js';
import { renderDeterministic } from './render/deterministic.js';
import { normalizeNarrative } from './render/narrative.js';
import { createLuceneGrammar } from './grammar/lucene-grammar.js';
import type { GrammarParser, QueryParserConfig, QueryResult } from './types.js';

const ERROR_PREFIX = 'Invalid Lucene query syntax: ';

/**
 * Parses a query and renders it as deterministic text, narrative text and AST JSON.
 *
 * @example
 * const parser = new QueryParser();
 * parser.parse('("Python" OR "Java") NOT "JavaScript"').narrative_text;
 * // 'Search for documents containing any of the following: "Python", "Java" but exclude documents where "JavaScript".'
 */
export class QueryParser {
  private readonly grammar: GrammarParser;
  private readonly onError: ((query: string, error: Error) => void) | undefined;

  constructor(config: QueryParserConfig = {}) {
    this.grammar = config.grammar ?? createLuceneGrammar();
    this.onError = config.onError;
  }

  /** @throws {QuerySyntaxError} for empty input, grammar rejections and rendering failures */
  parse(query: string): QueryResult {
    try {
      return this.explain(query);
    } catch (err) {
      const error = err instanceof QuerySyntaxError
        ? err
        : new QuerySyntaxError(ERROR_PREFIX + (err instanceof Error ? err.message : String(err)), err);
      this.onError?.(query, error);
      throw error;
    }
  }

  private explain(query: string): QueryResult {
    if (query.trim().length === 0) {
      throw new QuerySyntaxError(`${ERROR_PREFIX}query is empty`);
    }

    const parsed = this.grammar.parse(query);
    if (!parsed.ok) {
      throw new QuerySyntaxError(ERROR_PREFIX + parsed.error.message, parsed.error);
    }

    const deterministicText = renderDeterministic(parsed.node);
    return Object.freeze({
      query,
      deterministic_text: deterministicText,
      narrative_text: normalizeNarrative(deterministicText),
      ast_json: serializeNode(parsed.node),
    });
  }
}

let defaultParser: QueryParser | undefined;

/** Parses with a shared Lucene-backed parser. */
export function parseQuery(query: string): QueryResult {
  defaultParser ??= new QueryParser();
  return defaultParser.parse(query);
}
