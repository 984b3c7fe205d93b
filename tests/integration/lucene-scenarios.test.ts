import { describe, it, expect } from 'vitest';
import { QueryParser, parseQuery, QuerySyntaxError } from '../../src/index.js';

// Runs the whole pipeline on the real `lucene` grammar.
describe('parseQuery with the Lucene grammar', () => {
  it('bare word', () => {
    const result = parseQuery('test');
    expect(result.deterministic_text).toBe('contains "test"');
    expect(result.narrative_text).toBe('The term "test".');
    expect(result.ast_json).toEqual({ type: 'Word', value: 'test' });
  });

  it('bare phrase', () => {
    const result = parseQuery('"Python Programming"');
    expect(result.deterministic_text).toBe('"Python Programming"');
    expect(result.narrative_text).toBe('"Python Programming".');
  });

  it('parenthesized OR', () => {
    const result = parseQuery('("Python" OR "Java")');
    expect(result.query).toBe('("Python" OR "Java")');
    expect(result.deterministic_text).toBe('Include items that match ANY of: ("Python"; "Java")');
    expect(result.narrative_text).toBe('Search for documents containing any of the following: "Python", "Java".');
    expect(result.ast_json).toEqual({
      type: 'Group',
      value: null,
      children: [
        {
          type: 'OrOperation',
          value: null,
          children: [
            { type: 'Phrase', value: '"Python"' },
            { type: 'Phrase', value: '"Java"' },
          ],
        },
      ],
    });
  });

  it('field-scoped OR', () => {
    const result = parseQuery('title:("Machine Learning" OR "AI")');
    expect(result.deterministic_text).toBe('title: contains ANY of ["Machine Learning"; "AI"]');
    expect(result.narrative_text).toBe('Title contains any of ["Machine Learning", "AI"].');
  });

  it('OR group followed by NOT', () => {
    const result = parseQuery('("A" OR "B") NOT "C"');
    expect(result.deterministic_text).toBe('Include items that match ANY of: ("A"; "B") EXCLUDE items where: ("C")');
    expect(result.narrative_text)
      .toBe('Search for documents containing any of the following: "A", "B" but exclude documents where "C".');
    expect(result.ast_json.type).toBe('UnknownOperation');
  });

  it('fielded phrase without parentheses', () => {
    expect(parseQuery('title:"Machine Learning"').deterministic_text).toBe('title: "Machine Learning"');
  });

  it('AND across fields', () => {
    const result = parseQuery('status:published AND category:tech');
    expect(result.deterministic_text)
      .toBe('Include items that match ALL of: (status: contains "published"; category: contains "tech")');
    expect(result.narrative_text).toBe(
      'Search for documents that must contain all of the following: status: the term "published", category: the term "tech".',
    );
  });

  it('empty and unbalanced queries raise QuerySyntaxError', () => {
    expect(() => parseQuery('')).toThrow(QuerySyntaxError);
    expect(() => parseQuery('((unclosed')).toThrow(QuerySyntaxError);
    expect(() => parseQuery('((unclosed')).toThrow(/syntax/i);
  });

  it('separate parser instances agree', () => {
    const a = new QueryParser().parse('(title:"AI" OR title:"ML") AND status:published');
    const b = new QueryParser().parse('(title:"AI" OR title:"ML") AND status:published');
    expect(JSON.stringify(a)).toBe(JSON.stringify(b));
  });
});

describe('Operator precedence and negation', () => {
  it('a AND b OR c groups the AND first', () => {
    expect(parseQuery('a AND b OR c').deterministic_text).toBe(
      'Include items that match ANY of: (Include items that match ALL of: (contains "a"; contains "b"); contains "c")',
    );
  });

  it('a OR b AND c groups the AND first', () => {
    expect(parseQuery('a OR b AND c').deterministic_text).toBe(
      'Include items that match ANY of: (contains "a"; Include items that match ALL of: (contains "b"; contains "c"))',
    );
  });

  it('a AND b OR c AND d yields two AND groups under one OR', () => {
    const result = parseQuery('a AND b OR c AND d');
    expect(result.deterministic_text).toBe(
      'Include items that match ANY of: (Include items that match ALL of: (contains "a"; contains "b"); '
        + 'Include items that match ALL of: (contains "c"; contains "d"))',
    );
    expect(result.ast_json.type).toBe('OrOperation');
  });

  it('"!" excludes the term it prefixes', () => {
    expect(parseQuery('!a').deterministic_text).toBe('EXCLUDE items where: (contains "a")');
    expect(parseQuery('a && !b').deterministic_text)
      .toBe('Include items that match ALL of: (contains "a"; EXCLUDE items where: (contains "b"))');
  });
});

describe('Term modifiers', () => {
  it('fuzzy term is written back as source', () => {
    const result = parseQuery('foo~2');
    expect(result.deterministic_text).toBe('foo~2');
    expect(result.ast_json).toEqual({ type: 'Fuzzy', value: '2', children: [{ type: 'Word', value: 'foo' }] });
  });

  it('proximity phrase is written back as source', () => {
    expect(parseQuery('"a b"~3').deterministic_text).toBe('"a b"~3');
  });

  it('boost is written back as source', () => {
    expect(parseQuery('foo^3').deterministic_text).toBe('foo^3');
  });

  it('required term is written back as source', () => {
    expect(parseQuery('+foo').deterministic_text).toBe('+foo');
  });
});
