import { describe, it, expect } from 'vitest';
import {
  analyze,
  collectFieldUsages,
  extractQueryFields,
  matchesDocument,
  parseQuery,
} from '../../../src/query/lucene.js';
import type { QueryNode } from '../../../src/query/lucene.js';
import { MalformedQueryError } from '../../../src/utils/errors.js';
import type { FieldTypeMap } from '../../../src/types/evaluation.js';
import type { FlatDocument } from '../../../src/utils/flatten.js';

function matches(query: string, doc: FlatDocument, types: FieldTypeMap = {}): boolean {
  return matchesDocument(parseQuery(query), doc, types);
}

describe('parseQuery', () => {
  it('parses a field term', () => {
    expect(parseQuery('process.name:cmd.exe')).toEqual({
      kind: 'term',
      field: 'process.name',
      match: { type: 'exact', value: 'cmd.exe' },
    });
  });

  it('parses AND and && as conjunction', () => {
    for (const query of ['a:1 AND b:2', 'a:1 && b:2']) {
      const node = parseQuery(query);
      expect(node.kind).toBe('and');
    }
  });

  it('combines adjacent clauses with OR', () => {
    const node = parseQuery('a:1 b:2');
    expect(node.kind).toBe('or');
  });

  it('turns "a NOT b" into a AND NOT b', () => {
    const expected: QueryNode = {
      kind: 'and',
      children: [
        { kind: 'term', field: 'a', match: { type: 'exact', value: '1' } },
        { kind: 'not', child: { kind: 'term', field: 'b', match: { type: 'exact', value: '2' } } },
      ],
    };
    expect(parseQuery('a:1 NOT b:2')).toEqual(expected);
  });

  it('applies NOT to every clause of the list', () => {
    const term = (field: string, value: string): QueryNode => ({ kind: 'term', field, match: { type: 'exact', value } });
    const expected: QueryNode = {
      kind: 'and',
      children: [
        { kind: 'or', children: [term('a', '1'), term('b', '2')] },
        { kind: 'not', child: term('c', '3') },
      ],
    };
    expect(parseQuery('a:1 OR b:2 NOT c:3')).toEqual(expected);
    expect(parseQuery('a:1 b:2 -c:3')).toEqual(expected);
    expect(parseQuery('-c:3 a:1 OR b:2')).toEqual(expected);
  });

  it('treats a leading dash as NOT', () => {
    const node = parseQuery('-a:1');
    expect(node.kind).toBe('not');
  });

  it('applies a field to every term of a group', () => {
    const node = parseQuery('process.name:(cmd.exe OR powershell.exe)');
    expect(node).toEqual({
      kind: 'or',
      children: [
        { kind: 'term', field: 'process.name', match: { type: 'exact', value: 'cmd.exe' } },
        { kind: 'term', field: 'process.name', match: { type: 'exact', value: 'powershell.exe' } },
      ],
    });
  });

  it('parses phrases', () => {
    const node = parseQuery('message:"delete shadows"');
    expect(node).toEqual({ kind: 'term', field: 'message', match: { type: 'phrase', value: 'delete shadows' } });
  });

  it('builds anchored patterns from wildcards', () => {
    const node = parseQuery('process.name:*vssadmin*');
    if (node.kind !== 'term' || node.match.type !== 'pattern') throw new Error('expected a pattern term');
    expect(node.match.source).toBe('*vssadmin*');
    expect(node.match.matchesAnything).toBe(false);
    expect(node.match.regex.test('vssadmin.exe')).toBe(true);
    expect(node.match.regex.test('wmic.exe')).toBe(false);
  });

  it('keeps escaped operators as terms', () => {
    const node = parseQuery('tag:\\AND');
    expect(node).toEqual({ kind: 'term', field: 'tag', match: { type: 'exact', value: 'AND' } });
  });

  it.each([
    ['', 'Empty query'],
    ['a:1 AND', 'Dangling AND operator'],
    ['a:1 OR', 'Dangling OR operator'],
    ['(a:1', 'Unbalanced parentheses'],
    ['a:1)', 'Unbalanced parentheses'],
    ['a:[1 TO 2]', 'Unsupported operator "["'],
    ['a:/unterminated', 'Unterminated regular expression'],
    ['a:"open', 'Unterminated phrase'],
    ['a:(b:1)', 'Nested field'],
    ['*:foo', 'Wildcards in field names'],
    ['a:', 'Missing value for field "a"'],
    ['a:b/c', 'Unescaped "/"'],
  ])('rejects %j', (query, message) => {
    expect(() => parseQuery(query)).toThrow(MalformedQueryError);
    expect(() => parseQuery(query)).toThrow(message);
  });
});

describe('collectFieldUsages', () => {
  it('records pattern use and negation per field', () => {
    const usages = collectFieldUsages(parseQuery('a:*x* AND NOT b:y AND c:*'));
    expect(usages).toEqual([
      { field: 'a', pattern: true, negated: false },
      { field: 'b', pattern: false, negated: true },
      { field: 'c', pattern: false, negated: false },
    ]);
  });

  it('counts regex terms as pattern use', () => {
    expect(collectFieldUsages(parseQuery('a:/x.*/'))).toEqual([{ field: 'a', pattern: true, negated: false }]);
  });

  it('marks a field negated only when every use is negated', () => {
    expect(collectFieldUsages(parseQuery('a:1 AND NOT a:2'))).toEqual([{ field: 'a', pattern: false, negated: false }]);
  });
});

describe('extractQueryFields', () => {
  it('returns no fields for an unparseable query', () => {
    expect(extractQueryFields('a:(')).toEqual([]);
  });
});

describe('matchesDocument', () => {
  const doc: FlatDocument = {
    'process.name': 'cmd.exe',
    'user.name': 'SYSTEM',
    'process.args': ['cmd.exe', '-enc'],
  };

  it('matches keyword values exactly', () => {
    expect(matches('process.name:cmd.exe', doc)).toBe(true);
    expect(matches('process.name:CMD.EXE', doc)).toBe(false);
  });

  it('never matches patterns on keyword fields', () => {
    expect(matches('process.name:*cmd*', doc)).toBe(false);
    expect(matches('process.name:*cmd*', doc, { 'process.name': 'wildcard' })).toBe(true);
  });

  it('matches regex terms on wildcard fields only', () => {
    expect(matches('process.name:/cmd\\.exe/', doc, { 'process.name': 'wildcard' })).toBe(true);
    expect(matches('process.name:/cmd\\.exe/', doc)).toBe(false);
  });

  it('treats a bare * as an existence check', () => {
    expect(matches('process.name:*', doc)).toBe(true);
    expect(matches('process.parent.name:*', doc)).toBe(false);
  });

  it('searches every field for bare terms', () => {
    expect(matches('SYSTEM', doc)).toBe(true);
    expect(matches('explorer.exe', doc)).toBe(false);
  });

  it('matches any element of a multi-valued field', () => {
    expect(matches('process.args:"-enc"', doc)).toBe(true);
  });

  it('applies NOT', () => {
    expect(matches('process.name:cmd.exe AND NOT user.name:SYSTEM', doc)).toBe(false);
    expect(matches('process.name:cmd.exe AND NOT user.name:alice', doc)).toBe(true);
  });

  it('excludes a NOT clause from every alternative', () => {
    const query = 'process.name:vssadmin.exe OR process.name:wmic.exe NOT process.command_line:*list*';
    const types: FieldTypeMap = { 'process.command_line': 'wildcard' };
    expect(matches(query, { 'process.name': 'vssadmin.exe', 'process.command_line': 'vssadmin list shadows' }, types)).toBe(false);
    expect(matches(query, { 'process.name': 'vssadmin.exe', 'process.command_line': 'vssadmin delete shadows' }, types)).toBe(true);
    expect(matches(query, { 'process.name': 'wmic.exe', 'process.command_line': 'wmic shadowcopy list' }, types)).toBe(false);
  });

  it('honours escaped characters in patterns', () => {
    const fileDoc: FlatDocument = { 'file.path': 'C:\\Windows\\System32\\cmd.exe' };
    expect(matches(String.raw`file.path:C\:\\Windows\\*`, fileDoc, { 'file.path': 'wildcard' })).toBe(true);
  });

  describe('text fields', () => {
    const textDoc: FlatDocument = { message: 'User ran VSSadmin.exe to delete shadows' };
    const types: FieldTypeMap = { message: 'text' };

    it('matches terms against lowercased tokens', () => {
      expect(matches('message:DELETE', textDoc, types)).toBe(true);
      expect(matches('message:shadow', textDoc, types)).toBe(false);
    });

    it('matches phrases as token sequences', () => {
      expect(matches('message:"delete shadows"', textDoc, types)).toBe(true);
      expect(matches('message:"shadows delete"', textDoc, types)).toBe(false);
    });

    it('matches patterns per token', () => {
      expect(matches('message:VSS*', textDoc, types)).toBe(true);
    });
  });
});

describe('analyze', () => {
  it('lowercases and splits while keeping dotted names', () => {
    expect(analyze('Run VSSADMIN.exe, now!')).toEqual(['run', 'vssadmin.exe', 'now']);
  });
});
