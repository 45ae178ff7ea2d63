/**
 * Node / Relationship literal grammar
 *
 * Generated text is free prose interleaved with literals of the form
 *
 *   Node(id='paralysis', type='ClinicalObservation')
 *   Relationship(subj=Node(id='a', type='X'), obj=Node(id='b', type='Y'),
 *                type='results_in', timestamp='1850')
 *
 * Keyword arguments may appear in any order, strings may use either quote,
 * integers are accepted where a string is, and extra `key=value` pairs are kept.
 * Prose between literals is never tokenized, so stray apostrophes cannot
 * swallow a following literal. A literal that fails to parse becomes a
 * diagnostic and scanning resumes where the parser gave up.
 *
 * @module services/knowledge-graph/grammar
 */

// ═══════════════════════════════════════════════════════════════════════════════
// PARSE RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type ScalarKind = 'string' | 'integer';

export interface Span {
  start: number;
  end: number;
}

export interface NodeLiteral {
  id: string;
  idKind: ScalarKind;
  type: string;
  /** Additional key=value arguments */
  extra: Record<string, string>;
  span: Span;
}

export interface RelationshipLiteral {
  subject: NodeLiteral;
  object: NodeLiteral;
  type: string;
  timestamp?: string;
  extra: Record<string, string>;
  span: Span;
}

export type LiteralKeyword = 'Node' | 'Relationship';

export interface ParseDiagnostic {
  keyword: LiteralKeyword;
  offset: number;
  message: string;
  /** Excerpt of the text at the failing literal */
  fragment: string;
}

export interface ParseResult {
  /** Standalone node literals, in text order */
  nodes: NodeLiteral[];
  relationships: RelationshipLiteral[];
  diagnostics: ParseDiagnostic[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// LEXER
// ═══════════════════════════════════════════════════════════════════════════════

type TokenKind = 'ident' | 'string' | 'integer' | '(' | ')' | ',' | '=' | 'eof' | 'invalid';

interface Token {
  kind: TokenKind;
  /** Decoded value (string contents, digits, identifier, punctuation) */
  value: string;
  start: number;
  end: number;
}

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;
const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r' };

class Lexer {
  private pos: number;
  private peeked: Token | null = null;

  constructor(
    private readonly text: string,
    start: number
  ) {
    this.pos = start;
  }

  peek(): Token {
    if (!this.peeked) this.peeked = this.read();
    return this.peeked;
  }

  next(): Token {
    const token = this.peek();
    this.peeked = null;
    return token;
  }

  private read(): Token {
    const { text } = this;
    while (this.pos < text.length && /\s/.test(text[this.pos])) this.pos++;

    const start = this.pos;
    if (start >= text.length) return { kind: 'eof', value: '', start, end: start };

    const ch = text[start];

    if (IDENT_START.test(ch)) {
      let end = start + 1;
      while (end < text.length && IDENT_PART.test(text[end])) end++;
      this.pos = end;
      return { kind: 'ident', value: text.slice(start, end), start, end };
    }

    if (DIGIT.test(ch) || (ch === '-' && DIGIT.test(text[start + 1] ?? ''))) {
      let end = start + 1;
      while (end < text.length && DIGIT.test(text[end])) end++;
      this.pos = end;
      return { kind: 'integer', value: text.slice(start, end), start, end };
    }

    if (ch === "'" || ch === '"') {
      return this.readString(ch, start);
    }

    if (ch === '(' || ch === ')' || ch === ',' || ch === '=') {
      this.pos = start + 1;
      return { kind: ch, value: ch, start, end: start + 1 };
    }

    this.pos = start + 1;
    return { kind: 'invalid', value: ch, start, end: start + 1 };
  }

  /**
   * Quoted string on a single line, backslash escapes allowed.
   * A quote closes the string only when the next non-blank character is `,`
   * or `)`; any other quote is an apostrophe inside the value, as in
   * `id='Pott's disease'`. With no such quote on the line, the first one closes.
   */
  private readString(quote: string, start: number): Token {
    const { text } = this;
    let value = '';
    let fallback: { value: string; end: number } | null = null;
    let i = start + 1;
    while (i < text.length) {
      const ch = text[i];
      if (ch === '\n') break;
      if (ch === '\\' && i + 1 < text.length) {
        const escaped = text[i + 1];
        value += ESCAPES[escaped] ?? escaped;
        i += 2;
        continue;
      }
      if (ch === quote) {
        if (this.closesArgument(i + 1)) {
          this.pos = i + 1;
          return { kind: 'string', value, start, end: i + 1 };
        }
        if (!fallback) fallback = { value, end: i + 1 };
      }
      value += ch;
      i++;
    }
    if (fallback) {
      this.pos = fallback.end;
      return { kind: 'string', value: fallback.value, start, end: fallback.end };
    }
    this.pos = i;
    return { kind: 'invalid', value: 'unterminated string', start, end: i };
  }

  private closesArgument(from: number): boolean {
    let i = from;
    while (i < this.text.length && (this.text[i] === ' ' || this.text[i] === '\t')) i++;
    const next = this.text[i];
    return next === ',' || next === ')';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PARSER
// ═══════════════════════════════════════════════════════════════════════════════

class LiteralSyntaxError extends Error {
  constructor(
    message: string,
    readonly offset: number
  ) {
    super(message);
    this.name = 'LiteralSyntaxError';
  }
}

interface Scalar {
  kind: 'scalar';
  scalarKind: ScalarKind;
  value: string;
}

interface NullValue {
  kind: 'null';
}

interface NestedNode {
  kind: 'node';
  node: NodeLiteral;
}

type ArgValue = Scalar | NullValue | NestedNode;

const NULL_IDENTS = new Set(['None', 'null', 'undefined']);

function describe(token: Token): string {
  if (token.kind === 'eof') return 'end of text';
  if (token.kind === 'invalid') return token.value === 'unterminated string' ? token.value : `'${token.value}'`;
  return `'${token.value}'`;
}

class LiteralParser {
  constructor(private readonly lexer: Lexer) {}

  parseNode(): NodeLiteral {
    const keyword = this.expect('ident', 'Node');
    const args = this.parseArguments();
    const end = args.end;

    const id = this.scalarArg(args.values, 'id', end);
    const type = this.scalarArg(args.values, 'type', end);
    if (type.scalarKind !== 'string') {
      throw new LiteralSyntaxError('Node type must be a string', end);
    }

    return {
      id: id.value,
      idKind: id.scalarKind,
      type: type.value,
      extra: this.extraArgs(args.values, ['id', 'type']),
      span: { start: keyword.start, end },
    };
  }

  parseRelationship(): RelationshipLiteral {
    const keyword = this.expect('ident', 'Relationship');
    const args = this.parseArguments();

    const subject = this.nodeArg(args.values, ['subj', 'subject'], args.end);
    const object = this.nodeArg(args.values, ['obj', 'object'], args.end);
    const type = this.scalarArg(args.values, 'type', args.end);
    if (type.scalarKind !== 'string') {
      throw new LiteralSyntaxError('Relationship type must be a string', args.end);
    }

    const relationship: RelationshipLiteral = {
      subject,
      object,
      type: type.value,
      extra: this.extraArgs(args.values, ['subj', 'subject', 'obj', 'object', 'type', 'timestamp']),
      span: { start: keyword.start, end: args.end },
    };

    const timestamp = args.values.get('timestamp');
    if (timestamp?.kind === 'scalar') {
      relationship.timestamp = timestamp.value;
    } else if (timestamp?.kind === 'node') {
      throw new LiteralSyntaxError('Relationship timestamp must be a scalar', args.end);
    }
    return relationship;
  }

  /**
   * "(" [ arg ( "," arg )* [ "," ] ] ")"
   */
  private parseArguments(): { values: Map<string, ArgValue>; end: number } {
    this.expect('(');
    const values = new Map<string, ArgValue>();

    if (this.lexer.peek().kind === ')') {
      return { values, end: this.lexer.next().end };
    }

    for (;;) {
      const key = this.expect('ident');
      this.expect('=');
      if (values.has(key.value)) {
        throw new LiteralSyntaxError(`Duplicate argument '${key.value}'`, key.start);
      }
      values.set(key.value, this.parseValue());

      const separator = this.lexer.next();
      if (separator.kind === ')') return { values, end: separator.end };
      if (separator.kind !== ',') {
        throw new LiteralSyntaxError(`Expected ',' or ')' but found ${describe(separator)}`, separator.start);
      }
      if (this.lexer.peek().kind === ')') {
        return { values, end: this.lexer.next().end };
      }
    }
  }

  private parseValue(): ArgValue {
    const token = this.lexer.peek();
    if (token.kind === 'string' || token.kind === 'integer') {
      this.lexer.next();
      return { kind: 'scalar', scalarKind: token.kind, value: token.value };
    }
    if (token.kind === 'ident' && token.value === 'Node') {
      return { kind: 'node', node: this.parseNode() };
    }
    if (token.kind === 'ident' && NULL_IDENTS.has(token.value)) {
      this.lexer.next();
      return { kind: 'null' };
    }
    throw new LiteralSyntaxError(`Expected a value but found ${describe(token)}`, token.start);
  }

  private expect(kind: TokenKind, value?: string): Token {
    const token = this.lexer.next();
    if (token.kind !== kind || (value !== undefined && token.value !== value)) {
      const wanted = value ?? (kind === 'ident' ? 'an identifier' : `'${kind}'`);
      throw new LiteralSyntaxError(`Expected ${wanted} but found ${describe(token)}`, token.start);
    }
    return token;
  }

  private scalarArg(values: Map<string, ArgValue>, name: string, offset: number): Scalar {
    const value = values.get(name);
    if (!value || value.kind === 'null') {
      throw new LiteralSyntaxError(`Missing argument '${name}'`, offset);
    }
    if (value.kind !== 'scalar') {
      throw new LiteralSyntaxError(`Argument '${name}' must be a string or integer`, offset);
    }
    return value;
  }

  private nodeArg(values: Map<string, ArgValue>, names: string[], offset: number): NodeLiteral {
    for (const name of names) {
      const value = values.get(name);
      if (value?.kind === 'node') return value.node;
      if (value) {
        throw new LiteralSyntaxError(`Argument '${name}' must be a Node literal`, offset);
      }
    }
    throw new LiteralSyntaxError(`Missing argument '${names[0]}'`, offset);
  }

  private extraArgs(values: Map<string, ArgValue>, known: string[]): Record<string, string> {
    const extra: Record<string, string> = {};
    for (const [key, value] of values) {
      if (!known.includes(key) && value.kind === 'scalar') {
        extra[key] = value.value;
      }
    }
    return extra;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCANNER
// ═══════════════════════════════════════════════════════════════════════════════

const KEYWORD_PATTERN = /\b(Node|Relationship)\s*\(/g;

function fragmentAt(text: string, offset: number): string {
  const lineEnd = text.indexOf('\n', offset);
  const end = Math.min(lineEnd === -1 ? text.length : lineEnd, offset + 120);
  return text.slice(offset, end);
}

/**
 * Scan text for top-level Node and Relationship literals.
 * Node literals nested inside a relationship are not reported as nodes.
 */
export function parseGraphLiterals(text: string): ParseResult {
  const result: ParseResult = { nodes: [], relationships: [], diagnostics: [] };

  const pattern = new RegExp(KEYWORD_PATTERN);
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    const keyword: LiteralKeyword = match[1] === 'Node' ? 'Node' : 'Relationship';
    const start = match.index;
    const parser = new LiteralParser(new Lexer(text, start));

    try {
      if (keyword === 'Node') {
        const node = parser.parseNode();
        result.nodes.push(node);
        pattern.lastIndex = node.span.end;
      } else {
        const relationship = parser.parseRelationship();
        result.relationships.push(relationship);
        pattern.lastIndex = relationship.span.end;
      }
    } catch (error) {
      if (!(error instanceof LiteralSyntaxError)) throw error;
      result.diagnostics.push({
        keyword,
        offset: start,
        message: error.message,
        fragment: fragmentAt(text, start),
      });
      // Resume past whatever was consumed so nested literals of a broken
      // relationship are not picked up as standalone nodes
      pattern.lastIndex = Math.max(start + keyword.length, error.offset);
    }
  }

  return result;
}
