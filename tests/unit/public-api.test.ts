import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the QueryParser class and parseQuery', async () => {
    const { QueryParser, parseQuery } = await import('../../src/index.js');
    expect(typeof QueryParser).toBe('function'); // class is a function
    expect(typeof parseQuery).toBe('function');
  });

  it('exports the pipeline stages', async () => {
    const api = await import('../../src/index.js');
    expect(typeof api.renderDeterministic).toBe('function');
    expect(typeof api.normalizeNarrative).toBe('function');
    expect(typeof api.serializeNode).toBe('function');
    expect(typeof api.astDepth).toBe('function');
    expect(typeof api.createLuceneGrammar).toBe('function');
  });

  it('exports node constructors', async () => {
    const { word, phrase, orOperation } = await import('../../src/index.js');
    expect(orOperation(word('a'), phrase('"b"'))).toEqual({
      type: 'OrOperation',
      children: [
        { type: 'Word', value: 'a' },
        { type: 'Phrase', value: '"b"' },
      ],
    });
  });

  it('exports QuerySyntaxError as a class usable with instanceof', async () => {
    const { QuerySyntaxError } = await import('../../src/index.js');
    const err = new QuerySyntaxError('test error');
    expect(err).toBeInstanceOf(QuerySyntaxError);
    expect(err.name).toBe('QuerySyntaxError');
  });

  it('does NOT export fromLuceneAst (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['fromLuceneAst']).toBeUndefined();
  });

  it('does NOT export formatRange (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['formatRange']).toBeUndefined();
  });
});
