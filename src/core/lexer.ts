import type { Position } from "./ast";
import { ParseError } from "./errors";

export type TokenKind = "string" | "integer" | "identifier" | "punct" | "eof";

export type Token = {
  kind: TokenKind;
  /** Decoded text: string contents without quotes, the digits, the name or the symbol. */
  value: string;
  position: Position;
};

const PUNCTUATION = new Set(["[", "]", "{", "}", "(", ")", ",", ";", "+", "=", "*"]);

const ESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  n: "\n",
  r: "\r",
  t: "\t",
};

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;

export class Lexer {
  private readonly input: string;
  private pos = 0;
  private line = 1;
  private lineStart = 0;

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      this.skipTrivia();
      if (this.pos >= this.input.length) {
        tokens.push({ kind: "eof", position: this.position(), value: "" });
        return tokens;
      }
      tokens.push(this.next());
    }
  }

  /** The full source line a position falls on, for error context. */
  lineAt(position: Position): string {
    return this.input.split("\n")[position.line - 1]?.replace(/\r$/, "") ?? "";
  }

  private next(): Token {
    const position = this.position();
    const ch = this.input.charAt(this.pos);
    const following = this.input.charAt(this.pos + 1);

    if (ch === '"') {
      return { kind: "string", position, value: this.readString(position) };
    }
    if (DIGIT.test(ch) || (ch === "-" && DIGIT.test(following))) {
      return { kind: "integer", position, value: this.readInteger() };
    }
    if (IDENT_START.test(ch)) {
      return { kind: "identifier", position, value: this.readIdentifier() };
    }
    if (ch === ".") {
      const symbol = following === "." ? ".." : ".";
      this.pos += symbol.length;
      return { kind: "punct", position, value: symbol };
    }
    if (ch === ":" && following === "=") {
      this.pos += 2;
      return { kind: "punct", position, value: ":=" };
    }
    if (PUNCTUATION.has(ch)) {
      this.pos++;
      return { kind: "punct", position, value: ch };
    }

    throw new ParseError(
      `Unexpected character '${ch}'`,
      position,
      [],
      this.lineAt(position)
    );
  }

  private skipTrivia(): void {
    while (this.pos < this.input.length) {
      const ch = this.input.charAt(this.pos);
      if (ch === "\n") {
        this.pos++;
        this.line++;
        this.lineStart = this.pos;
      } else if (ch === " " || ch === "\t" || ch === "\r") {
        this.pos++;
      } else if (ch === "/" && this.input.charAt(this.pos + 1) === "/") {
        while (this.pos < this.input.length && this.input.charAt(this.pos) !== "\n") {
          this.pos++;
        }
      } else {
        return;
      }
    }
  }

  private readString(start: Position): string {
    this.pos++; // opening quote
    let result = "";
    while (this.pos < this.input.length) {
      const ch = this.input.charAt(this.pos);
      if (ch === '"') {
        this.pos++;
        return result;
      }
      if (ch === "\\") {
        const escaped = this.input.charAt(this.pos + 1);
        const replacement = ESCAPES[escaped];
        result += replacement ?? `\\${escaped}`;
        this.pos += 2;
        continue;
      }
      if (ch === "\n") {
        this.line++;
        this.lineStart = this.pos + 1;
      }
      result += ch;
      this.pos++;
    }
    throw new ParseError(
      "Unterminated string literal",
      start,
      ['"'],
      this.lineAt(start)
    );
  }

  private readInteger(): string {
    const begin = this.pos;
    if (this.input.charAt(this.pos) === "-") {
      this.pos++;
    }
    while (DIGIT.test(this.input.charAt(this.pos))) {
      this.pos++;
    }
    return this.input.slice(begin, this.pos);
  }

  private readIdentifier(): string {
    const begin = this.pos;
    while (IDENT_PART.test(this.input.charAt(this.pos))) {
      this.pos++;
    }
    return this.input.slice(begin, this.pos);
  }

  private position(): Position {
    return {
      column: this.pos - this.lineStart + 1,
      line: this.line,
      offset: this.pos,
    };
  }
}

export function tokenize(input: string): Token[] {
  return new Lexer(input).tokenize();
}
