import { Lexer, Token, TokenType } from "./lexer.js";

export type ValueNode =
  | { kind: "number"; value: number; token: Token }
  | { kind: "boolean"; value: boolean; token: Token }
  | { kind: "identifier"; value: string; token: Token };

export interface AttributeNode {
  readonly key: string;
  readonly keyToken: Token;
  readonly value: ValueNode;
}

export interface DirectiveNode {
  readonly name: string;
  readonly nameToken: Token;
  readonly value: ValueNode;
}

export interface NodeDeclNode {
  readonly id: number;
  readonly idToken: Token;
}

export type EdgeConnector = "directed" | "undirected";

export interface EdgeDeclNode {
  readonly from: number;
  readonly fromToken: Token;
  readonly to: number;
  readonly toToken: Token;
  readonly connector: EdgeConnector;
  readonly attributes: AttributeNode[];
}

export interface GraphNode {
  readonly name: string;
  readonly nameToken: Token;
  readonly directives: DirectiveNode[];
  readonly nodes: NodeDeclNode[];
  readonly edges: EdgeDeclNode[];
}

export interface GraphFileNode {
  readonly graphs: GraphNode[];
}

export class ParserError extends Error {
  constructor(message: string, public readonly token: Token) {
    super(message);
    this.name = "ParserError";
  }
}

export function parse(source: string): GraphFileNode {
  const lexer = new Lexer(source);
  const parser = new Parser(lexer.scanTokens());
  return parser.parseFile();
}

class Parser {
  private current = 0;

  constructor(private readonly tokens: Token[]) {}

  parseFile(): GraphFileNode {
    const graphs: GraphNode[] = [];
    while (!this.isAtEnd()) {
      if (this.match(TokenType.Graph)) {
        graphs.push(this.graphDeclaration());
      } else {
        throw this.error(this.peek(), "Expected 'graph' declaration");
      }
    }
    return { graphs };
  }

  private graphDeclaration(): GraphNode {
    const nameToken = this.consume(TokenType.Identifier, "Graph name expected after 'graph'");
    this.consume(TokenType.LBrace, "Expected '{' to start graph block");

    const directives: DirectiveNode[] = [];
    const nodes: NodeDeclNode[] = [];
    const edges: EdgeDeclNode[] = [];

    while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
      if (this.match(TokenType.Directive)) {
        directives.push(this.directive());
      } else if (this.match(TokenType.Node)) {
        nodes.push(this.nodeDecl());
      } else if (this.match(TokenType.Edge)) {
        edges.push(this.edgeDecl());
      } else {
        throw this.error(this.peek(), "Unexpected statement inside graph block");
      }
    }

    this.consume(TokenType.RBrace, "Expected '}' to close graph block");

    return {
      name: nameToken.lexeme,
      nameToken,
      directives,
      nodes,
      edges
    };
  }

  private directive(): DirectiveNode {
    const nameToken = this.consume(TokenType.Identifier, "Directive name expected");
    const value = this.valueNode();
    this.consumeOptional(TokenType.Semicolon);
    return { name: nameToken.lexeme, nameToken, value };
  }

  private nodeDecl(): NodeDeclNode {
    const idToken = this.vertexToken("Node identifier expected");
    this.consumeOptional(TokenType.Semicolon);
    return { id: Number(idToken.literal), idToken };
  }

  private edgeDecl(): EdgeDeclNode {
    const fromToken = this.vertexToken("Edge requires a source vertex");
    let connector: EdgeConnector;
    if (this.match(TokenType.Arrow)) {
      connector = "directed";
    } else if (this.match(TokenType.Line)) {
      connector = "undirected";
    } else {
      throw this.error(this.peek(), "Expected '->' or '--' in edge declaration");
    }
    const toToken = this.vertexToken("Edge requires a destination vertex");
    const attributes = this.attributeBlockOptional();
    this.consumeOptional(TokenType.Semicolon);
    return {
      from: Number(fromToken.literal),
      fromToken,
      to: Number(toToken.literal),
      toToken,
      connector,
      attributes
    };
  }

  private vertexToken(message: string): Token {
    const token = this.consume(TokenType.Number, message);
    const value = Number(token.literal);
    if (!Number.isInteger(value) || value < 0) {
      throw this.error(token, `Vertex identifiers must be non-negative integers, got '${token.lexeme}'`);
    }
    return token;
  }

  private attributeBlockOptional(): AttributeNode[] {
    if (!this.match(TokenType.LBrace)) {
      return [];
    }
    const attributes: AttributeNode[] = [];
    if (this.check(TokenType.RBrace)) {
      this.advance();
      return attributes;
    }
    while (true) {
      const keyToken = this.consume(TokenType.Identifier, "Attribute key expected");
      this.consume(TokenType.Colon, "Expected ':' in attribute pair");
      const value = this.valueNode();
      attributes.push({ key: keyToken.lexeme, keyToken, value });
      if (this.match(TokenType.Comma)) {
        if (this.check(TokenType.RBrace)) {
          break; // tolerate trailing comma
        }
        continue;
      }
      break;
    }
    this.consume(TokenType.RBrace, "Expected '}' to close attribute block");
    return attributes;
  }

  private valueNode(): ValueNode {
    if (this.match(TokenType.Number)) {
      const token = this.previous();
      return { kind: "number", value: Number(token.literal), token };
    }
    if (this.match(TokenType.Boolean)) {
      const token = this.previous();
      return { kind: "boolean", value: Boolean(token.literal), token };
    }
    const ident = this.consume(TokenType.Identifier, "Expected value");
    return { kind: "identifier", value: ident.lexeme, token: ident };
  }

  private match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) {
      return this.advance();
    }
    throw this.error(this.peek(), message);
  }

  private consumeOptional(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) {
      return type === TokenType.EOF;
    }
    return this.peek().type === type;
  }

  private advance(): Token {
    if (!this.isAtEnd()) {
      this.current++;
    }
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }

  private error(token: Token, message: string): ParserError {
    return new ParserError(`${message} (line ${token.line}, column ${token.column})`, token);
  }
}
