export enum TokenType {
  Graph = "GRAPH",
  Node = "NODE",
  Edge = "EDGE",
  Directive = "DIRECTIVE",
  Identifier = "IDENT",
  Number = "NUMBER",
  Boolean = "BOOLEAN",
  LBrace = "LBRACE",
  RBrace = "RBRACE",
  Colon = "COLON",
  Comma = "COMMA",
  Semicolon = "SEMICOLON",
  Arrow = "ARROW",
  Line = "LINE",
  EOF = "EOF"
}

export interface Token {
  type: TokenType;
  lexeme: string;
  literal: number | boolean | null;
  line: number;
  column: number;
}

const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ["graph", TokenType.Graph],
  ["node", TokenType.Node],
  ["edge", TokenType.Edge],
  ["directive", TokenType.Directive],
  ["true", TokenType.Boolean],
  ["false", TokenType.Boolean]
]);

const PUNCTUATION: ReadonlyMap<string, TokenType> = new Map([
  ["{", TokenType.LBrace],
  ["}", TokenType.RBrace],
  [":", TokenType.Colon],
  [",", TokenType.Comma],
  [";", TokenType.Semicolon]
]);

const WORD = /[A-Za-z_][A-Za-z0-9_]*/y;
const NUMBER = /-?\d+(?:\.\d+)?/y;

export class LexerError extends Error {
  constructor(message: string, public readonly line: number, public readonly column: number) {
    super(message);
    this.name = "LexerError";
  }
}

/**
 * Tokenises graph DSL sources. Vertices are written as integers, so numbers
 * double as node references; `->` joins directed edges and `--` undirected ones.
 */
export class Lexer {
  private offset = 0;
  private line = 1;
  private lineStart = 0;

  constructor(private readonly source: string) {}

  scanTokens(): Token[] {
    const tokens: Token[] = [];
    for (let token = this.next(); ; token = this.next()) {
      tokens.push(token);
      if (token.type === TokenType.EOF) {
        return tokens;
      }
    }
  }

  private next(): Token {
    this.skipWhitespace();
    const column = this.offset - this.lineStart + 1;
    if (this.offset >= this.source.length) {
      return { type: TokenType.EOF, lexeme: "", literal: null, line: this.line, column };
    }

    const ch = this.source[this.offset];
    const punctuation = PUNCTUATION.get(ch);
    if (punctuation) {
      return this.take(punctuation, ch, null, column);
    }

    const pair = this.source.slice(this.offset, this.offset + 2);
    if (pair === "->") {
      return this.take(TokenType.Arrow, pair, null, column);
    }
    if (pair === "--") {
      return this.take(TokenType.Line, pair, null, column);
    }

    const number = this.read(NUMBER);
    if (number !== null) {
      return this.take(TokenType.Number, number, Number(number), column);
    }
    const word = this.read(WORD);
    if (word !== null) {
      const keyword = KEYWORDS.get(word) ?? TokenType.Identifier;
      return this.take(keyword, word, keyword === TokenType.Boolean ? word === "true" : null, column);
    }

    if (ch === "-") {
      throw new LexerError("Unexpected character '-' without '>' or '-'", this.line, column);
    }
    throw new LexerError(`Unexpected character '${ch}'`, this.line, column);
  }

  private skipWhitespace(): void {
    while (this.offset < this.source.length) {
      const ch = this.source[this.offset];
      if (ch === "\n") {
        this.line += 1;
        this.lineStart = this.offset + 1;
      } else if (ch !== " " && ch !== "\t" && ch !== "\r") {
        return;
      }
      this.offset += 1;
    }
  }

  private read(pattern: RegExp): string | null {
    pattern.lastIndex = this.offset;
    const match = pattern.exec(this.source);
    return match ? match[0] : null;
  }

  private take(type: TokenType, lexeme: string, literal: number | boolean | null, column: number): Token {
    this.offset += lexeme.length;
    return { type, lexeme, literal, line: this.line, column };
  }
}
