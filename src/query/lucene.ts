/**
 * Lucene query_string parser and in-process evaluator.
 *
 * Covers the subset detection rules are written in: `field:value`,
 * `field:"phrase"`, `field:(a OR b)`, bare terms, `*` / `?` wildcards,
 * `/regex/`, backslash escapes, AND / OR / NOT (and `&&`, `||`, `!`, `-`),
 * and parentheses. Adjacent clauses combine with OR; a clause introduced
 * by NOT (or `-`) must be absent for any of the others to count, so
 * `a OR b NOT c` reads as `(a OR b) AND NOT c`.
 *
 * Ranges, boosts and fuzzy operators are rejected.
 */

import type { FieldType, FieldTypeMap } from '@/types/evaluation.js';
import { MalformedQueryError } from '@/utils/errors.js';
import { fieldValues } from '@/utils/flatten.js';
import type { FlatDocument } from '@/utils/flatten.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export type PatternSegment =
  | { kind: 'literal'; text: string }
  | { kind: 'any' }    // *
  | { kind: 'single' }; // ?

export type TermMatch =
  | { type: 'exact'; value: string }
  | { type: 'phrase'; value: string }
  | { type: 'pattern'; source: string; regex: RegExp; matchesAnything: boolean }
  | { type: 'regex'; source: string; regex: RegExp };

export interface TermNode {
  kind: 'term';
  /** null for bare terms, which search every field. */
  field: string | null;
  match: TermMatch;
}

export type QueryNode =
  | { kind: 'and'; children: QueryNode[] }
  | { kind: 'or'; children: QueryNode[] }
  | { kind: 'not'; child: QueryNode }
  | TermNode;

export interface FieldUsage {
  field: string;
  /** Queried with a wildcard or regex operator somewhere. */
  pattern: boolean;
  /** Every usage sits under a NOT. */
  negated: boolean;
}

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

type TokenType = 'AND' | 'OR' | 'NOT' | 'LPAREN' | 'RPAREN' | 'FIELD' | 'TERM' | 'PHRASE' | 'REGEX';

interface Token {
  type: TokenType;
  value: string;
  position: number;
  segments?: PatternSegment[];
}

const TERM_BREAKERS = new Set([' ', '\t', '\n', '\r', '(', ')', '"']);
const UNSUPPORTED_CHARS = new Set(['[', ']', '{', '}', '^', '~']);

function tokenize(query: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  const fail = (message: string, position: number): never => {
    throw new MalformedQueryError(`${message} at position ${position}`, query, position);
  };

  while (i < query.length) {
    const ch = query[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === '(') {
      tokens.push({ type: 'LPAREN', value: ch, position: i++ });
      continue;
    }
    if (ch === ')') {
      tokens.push({ type: 'RPAREN', value: ch, position: i++ });
      continue;
    }
    if (query.startsWith('&&', i)) {
      tokens.push({ type: 'AND', value: '&&', position: i });
      i += 2;
      continue;
    }
    if (query.startsWith('||', i)) {
      tokens.push({ type: 'OR', value: '||', position: i });
      i += 2;
      continue;
    }
    if (ch === '!' || (ch === '-' && i + 1 < query.length && !/\s/.test(query[i + 1]))) {
      tokens.push({ type: 'NOT', value: ch, position: i++ });
      continue;
    }
    if (ch === '+') {
      // Required-clause marker; clauses are required by the surrounding operator already.
      i++;
      continue;
    }

    if (ch === '"') {
      const start = i++;
      let value = '';
      while (i < query.length && query[i] !== '"') {
        if (query[i] === '\\' && i + 1 < query.length) {
          value += query[i + 1];
          i += 2;
        } else {
          value += query[i++];
        }
      }
      if (i >= query.length) fail('Unterminated phrase', start);
      i++;
      tokens.push({ type: 'PHRASE', value, position: start });
      continue;
    }

    if (ch === '/') {
      const start = i++;
      let source = '';
      while (i < query.length && query[i] !== '/') {
        if (query[i] === '\\' && i + 1 < query.length) {
          source += query.slice(i, i + 2);
          i += 2;
        } else {
          source += query[i++];
        }
      }
      if (i >= query.length) fail('Unterminated regular expression (escape literal "/" as "\\/")', start);
      i++;
      tokens.push({ type: 'REGEX', value: source, position: start });
      continue;
    }

    // Bare word: a term, an operator, or a field name followed by ':'
    const start = i;
    const segments: PatternSegment[] = [];
    let literal = '';
    let escapedAny = false;
    let isField = false;

    const flushLiteral = (): void => {
      if (literal.length > 0) {
        segments.push({ kind: 'literal', text: literal });
        literal = '';
      }
    };

    while (i < query.length && !TERM_BREAKERS.has(query[i])) {
      const c = query[i];
      if (c === '\\') {
        if (i + 1 >= query.length) fail('Dangling escape character', i);
        literal += query[i + 1];
        escapedAny = true;
        i += 2;
        continue;
      }
      if (c === ':') {
        isField = true;
        i++;
        break;
      }
      if (c === '/') fail('Unescaped "/" inside a term', i);
      if (UNSUPPORTED_CHARS.has(c)) fail(`Unsupported operator "${c}"`, i);
      if (c === '*') {
        flushLiteral();
        segments.push({ kind: 'any' });
      } else if (c === '?') {
        flushLiteral();
        segments.push({ kind: 'single' });
      } else {
        literal += c;
      }
      i++;
    }
    flushLiteral();

    const text = segments.map(segmentText).join('');

    if (isField) {
      if (segments.length === 0) fail('Missing field name before ":"', start);
      if (segments.some((s) => s.kind !== 'literal')) fail('Wildcards in field names are not supported', start);
      tokens.push({ type: 'FIELD', value: text, position: start });
      continue;
    }

    if (!escapedAny && (text === 'AND' || text === 'OR' || text === 'NOT')) {
      tokens.push({ type: text, value: text, position: start });
      continue;
    }

    tokens.push({ type: 'TERM', value: text, position: start, segments });
  }

  return tokens;
}

function segmentText(segment: PatternSegment): string {
  switch (segment.kind) {
    case 'literal':
      return segment.text;
    case 'any':
      return '*';
    case 'single':
      return '?';
  }
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse a query string into an AST.
 *
 * @throws MalformedQueryError on any syntax error.
 */
export function parseQuery(query: string): QueryNode {
  const tokens = tokenize(query);
  if (tokens.length === 0) {
    throw new MalformedQueryError('Empty query', query, 0);
  }

  let pos = 0;

  const fail = (message: string, token?: Token): never => {
    const position = token?.position ?? query.length;
    throw new MalformedQueryError(`${message} at position ${position}`, query, position);
  };
  const peek = (): Token | undefined => tokens[pos];
  const consume = (): Token | undefined => tokens[pos++];

  const startsOperand = (token: Token | undefined): boolean =>
    token !== undefined && token.type !== 'AND' && token.type !== 'OR' && token.type !== 'RPAREN';

  function parseOr(field: string | null): QueryNode {
    const optional: QueryNode[] = [];
    // Clauses starting with NOT exclude matches of the whole clause list
    const excluded: QueryNode[] = [];
    const parseClause = (): void => {
      const negated = peek()?.type === 'NOT';
      (negated ? excluded : optional).push(parseAnd(field));
    };

    parseClause();
    for (;;) {
      const token = peek();
      if (!token || token.type === 'RPAREN') break;

      if (token.type === 'OR') {
        consume();
        if (!startsOperand(peek())) fail('Dangling OR operator', token);
      }
      parseClause();
    }

    const children: QueryNode[] = [...excluded];
    if (optional.length === 1) children.unshift(optional[0]);
    if (optional.length > 1) children.unshift({ kind: 'or', children: optional });
    return children.length === 1 ? children[0] : { kind: 'and', children };
  }

  function parseAnd(field: string | null): QueryNode {
    const children: QueryNode[] = [parseNot(field)];
    for (let token = peek(); token?.type === 'AND'; token = peek()) {
      consume();
      if (!startsOperand(peek())) fail('Dangling AND operator', token);
      children.push(parseNot(field));
    }
    return children.length === 1 ? children[0] : { kind: 'and', children };
  }

  function parseNot(field: string | null): QueryNode {
    const token = peek();
    if (token?.type === 'NOT') {
      consume();
      if (!startsOperand(peek())) fail('Dangling NOT operator', token);
      return { kind: 'not', child: parseNot(field) };
    }
    return parsePrimary(field);
  }

  function parsePrimary(field: string | null): QueryNode {
    const token = consume();
    if (!token) return fail('Unexpected end of query');

    switch (token.type) {
      case 'LPAREN': {
        const node = parseOr(field);
        if (consume()?.type !== 'RPAREN') fail('Unbalanced parentheses: missing ")"', token);
        return node;
      }
      case 'FIELD': {
        if (field !== null) fail(`Nested field "${token.value}" inside "${field}" group`, token);
        const next = consume();
        if (!next) return fail(`Missing value for field "${token.value}"`, token);
        if (next.type === 'LPAREN') {
          const node = parseOr(token.value);
          if (consume()?.type !== 'RPAREN') fail('Unbalanced parentheses: missing ")"', next);
          return node;
        }
        if (next.type === 'TERM' || next.type === 'PHRASE' || next.type === 'REGEX') {
          return buildTerm(token.value, next, query);
        }
        return fail(`Missing value for field "${token.value}"`, next);
      }
      case 'TERM':
      case 'PHRASE':
      case 'REGEX':
        return buildTerm(field, token, query);
      case 'RPAREN':
        return fail('Unbalanced parentheses: unexpected ")"', token);
      default:
        return fail(`Dangling ${token.value} operator`, token);
    }
  }

  const root = parseOr(null);
  const leftover = peek();
  if (leftover) fail('Unbalanced parentheses: unexpected ")"', leftover);
  return root;
}

function buildTerm(field: string | null, token: Token, query: string): TermNode {
  if (token.type === 'PHRASE') {
    return { kind: 'term', field, match: { type: 'phrase', value: token.value } };
  }

  if (token.type === 'REGEX') {
    let regex: RegExp;
    try {
      regex = new RegExp(`^(?:${token.value})$`, 's');
    } catch {
      throw new MalformedQueryError(`Invalid regular expression /${token.value}/ at position ${token.position}`, query, token.position);
    }
    return { kind: 'term', field, match: { type: 'regex', source: token.value, regex } };
  }

  const segments = token.segments ?? [];
  if (!segments.some((s) => s.kind !== 'literal')) {
    return { kind: 'term', field, match: { type: 'exact', value: token.value } };
  }

  return {
    kind: 'term',
    field,
    match: {
      type: 'pattern',
      source: token.value,
      regex: segmentsToRegex(segments),
      matchesAnything: segments.every((s) => s.kind === 'any'),
    },
  };
}

function segmentsToRegex(segments: PatternSegment[]): RegExp {
  let source = '';
  for (const segment of segments) {
    if (segment.kind === 'any') source += '.*';
    else if (segment.kind === 'single') source += '.';
    else source += segment.text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
  }
  return new RegExp(`^${source}$`, 's');
}

// ---------------------------------------------------------------------------
// Field extraction
// ---------------------------------------------------------------------------

/**
 * Every field the query references, with how it is used.
 */
export function collectFieldUsages(node: QueryNode): FieldUsage[] {
  const usages = new Map<string, FieldUsage>();

  const visit = (current: QueryNode, negated: boolean): void => {
    switch (current.kind) {
      case 'and':
      case 'or':
        current.children.forEach((child) => visit(child, negated));
        return;
      case 'not':
        visit(current.child, !negated);
        return;
      case 'term': {
        if (current.field === null) return;
        const pattern = usesPatternOperator(current.match);
        const existing = usages.get(current.field);
        if (existing) {
          existing.pattern ||= pattern;
          existing.negated &&= negated;
        } else {
          usages.set(current.field, { field: current.field, pattern, negated });
        }
      }
    }
  };

  visit(node, false);
  return [...usages.values()];
}

/**
 * Field usages of a raw query string; an unparseable query yields none.
 */
export function extractQueryFields(query: string): FieldUsage[] {
  try {
    return collectFieldUsages(parseQuery(query));
  } catch (error) {
    if (error instanceof MalformedQueryError) return [];
    throw error;
  }
}

function usesPatternOperator(match: TermMatch): boolean {
  if (match.type === 'regex') return true;
  // field:* is an existence check, not a pattern lookup
  return match.type === 'pattern' && !match.matchesAnything;
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/**
 * Evaluate a parsed query against a flattened document.
 *
 * Field semantics follow the provisioned type: `wildcard` and `date`
 * fields match patterns against the whole value, `keyword` fields only
 * match exact values (stricter than Elasticsearch, which also runs
 * wildcards on keyword), `text` fields match per lowercased token.
 * Fields missing from `fieldTypes` use `defaultType`.
 */
export function matchesDocument(
  node: QueryNode,
  doc: FlatDocument,
  fieldTypes: FieldTypeMap,
  defaultType: FieldType = 'keyword',
): boolean {
  switch (node.kind) {
    case 'and':
      return node.children.every((child) => matchesDocument(child, doc, fieldTypes, defaultType));
    case 'or':
      return node.children.some((child) => matchesDocument(child, doc, fieldTypes, defaultType));
    case 'not':
      return !matchesDocument(node.child, doc, fieldTypes, defaultType);
    case 'term': {
      const fields = node.field === null ? Object.keys(doc) : [node.field];
      return fields.some((field) => {
        const type = fieldTypes[field] ?? defaultType;
        return fieldValues(doc, field).some((value) => matchValue(type, node.match, value));
      });
    }
  }
}

function matchValue(type: FieldType, match: TermMatch, value: string): boolean {
  if (match.type === 'pattern' && match.matchesAnything) {
    return true;
  }

  if (type === 'text') {
    const tokens = analyze(value);
    switch (match.type) {
      case 'exact': {
        const wanted = analyze(match.value);
        return wanted.length > 0 && wanted.every((t) => tokens.includes(t));
      }
      case 'phrase':
        return containsSequence(tokens, analyze(match.value));
      case 'pattern': {
        const lowered = new RegExp(match.regex.source.toLowerCase(), match.regex.flags);
        return tokens.some((t) => lowered.test(t));
      }
      case 'regex':
        return tokens.some((t) => match.regex.test(t));
    }
  }

  switch (match.type) {
    case 'exact':
    case 'phrase':
      return value === match.value;
    case 'pattern':
    case 'regex':
      return type !== 'keyword' && match.regex.test(value);
  }
}

/**
 * Split text into lowercased tokens, keeping dotted names such as
 * "vssadmin.exe" whole.
 */
export function analyze(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}_.]+/u)
    .map((t) => t.replace(/^\.+|\.+$/g, ''))
    .filter((t) => t.length > 0);
}

function containsSequence(tokens: string[], sequence: string[]): boolean {
  if (sequence.length === 0) return false;
  for (let i = 0; i + sequence.length <= tokens.length; i++) {
    if (sequence.every((t, j) => tokens[i + j] === t)) return true;
  }
  return false;
}
