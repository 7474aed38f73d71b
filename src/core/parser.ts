import debug from "debug";
import type {
  Access,
  AccessStep,
  Bound,
  CommandBlock,
  ConfigUnit,
  Expression,
  FieldInit,
  OutputMap,
  Position,
  SpawnArg,
  Statement,
  StringPart,
  TemplateBlock,
} from "./ast";
import { ParseError } from "./errors";
import { Lexer, type Token } from "./lexer";

const log = debug("procbed:parser");

type SectionKind = "includes" | "output" | "globals" | "template" | "commands";

type ProgramSection = "globals" | "template" | "commands";

const SECTION_ORDER: Record<SectionKind, number> = {
  commands: 4,
  globals: 2,
  includes: 0,
  output: 1,
  template: 3,
};

const COMMAND_KEYWORDS = new Set([
  "limit",
  "sleep",
  "wait_all",
  "spawn",
  "wait_for",
  "kill",
]);

const SPAWN_OPTIONS = new Set(["dir", "stdout", "stderr"]);

type ExpressionOptions = {
  // `for v in [a] { ... }` must not read the loop body as struct fields
  allowStruct: boolean;
};

function isSectionKind(name: string): name is SectionKind {
  return Object.hasOwn(SECTION_ORDER, name);
}

function describeToken(token: Token): string {
  switch (token.kind) {
    case "eof":
      return "end of input";
    case "string":
      return `string "${token.value}"`;
    case "integer":
      return `integer ${token.value}`;
    default:
      return `'${token.value}'`;
  }
}

export class Parser {
  private readonly lexer: Lexer;
  private readonly tokens: Token[];
  private readonly file?: string;
  private index = 0;
  private section: ProgramSection = "globals";

  constructor(source: string, file?: string) {
    this.lexer = new Lexer(source);
    this.file = file;
    this.tokens = this.tokenize();
  }

  parse(): ConfigUnit {
    const unit: ConfigUnit = {
      commands: [],
      file: this.file,
      globals: [],
      includes: [],
      templates: [],
    };
    const seen = new Set<string>();
    let lastRank = -1;

    while (!this.atEnd()) {
      const header = this.peek();
      const { kind, name } = this.parseSectionHeader();
      const rank = SECTION_ORDER[kind];
      const label = name === undefined ? kind : `${kind}.${name}`;

      if (rank < lastRank) {
        throw this.errorAt(
          header,
          `Section [${label}] is out of order: sections go includes, output, globals, templates, commands`
        );
      }
      if (seen.has(label)) {
        throw this.errorAt(header, `Duplicate section [${label}]`);
      }
      seen.add(label);
      lastRank = rank;
      log(`Parsing section [${label}]`);

      switch (kind) {
        case "includes":
          while (this.peek().kind === "string") {
            unit.includes.push(this.advance().value);
          }
          break;
        case "output":
          unit.output = this.expectString();
          break;
        case "globals":
          unit.globals = this.parseProgram("globals");
          break;
        case "template":
          unit.templates.push(this.parseTemplateBlock(name ?? "", header));
          break;
        case "commands":
          unit.commands.push(this.parseCommandBlock(name, header));
          break;
        default: {
          const exhaustive: never = kind;
          throw new Error(`Unhandled section ${String(exhaustive)}`);
        }
      }
    }

    log(
      `Parsed ${unit.templates.length} template block(s), ${unit.commands.length} commands block(s)`
    );
    return unit;
  }

  private tokenize(): Token[] {
    try {
      return this.lexer.tokenize();
    } catch (error) {
      if (error instanceof ParseError) {
        error.file ??= this.file;
      }
      throw error;
    }
  }

  // ── Sections ────────────────────────────────────────────────────

  private parseSectionHeader(): { kind: SectionKind; name?: string } {
    this.expectPunct("[");
    const token = this.peek();
    if (token.kind !== "identifier" || !isSectionKind(token.value)) {
      throw this.unexpected(Object.keys(SECTION_ORDER));
    }
    this.advance();
    const kind = token.value;
    let name: string | undefined;

    if (kind === "template") {
      this.expectPunct(".");
      name = this.expectIdentifier();
    } else if (kind === "commands" && this.isPunct(".")) {
      this.advance();
      name = this.expectIdentifier();
    }

    this.expectPunct("]");
    return { kind, name };
  }

  private parseTemplateBlock(name: string, header: Token): TemplateBlock {
    return {
      body: this.parseProgram("template"),
      file: this.file,
      name,
      position: header.position,
    };
  }

  private parseCommandBlock(
    name: string | undefined,
    header: Token
  ): CommandBlock {
    return {
      body: this.parseProgram("commands"),
      file: this.file,
      name,
      position: header.position,
    };
  }

  private parseProgram(section: ProgramSection): Statement[] {
    this.section = section;
    const statements: Statement[] = [];
    while (!(this.atEnd() || this.isPunct("["))) {
      statements.push(this.parseStatement());
    }
    return statements;
  }

  private parseBlock(): Statement[] {
    this.expectPunct("{");
    const statements: Statement[] = [];
    while (!this.isPunct("}")) {
      if (this.atEnd()) {
        throw this.unexpected(["}"]);
      }
      statements.push(this.parseStatement());
    }
    this.advance();
    return statements;
  }

  // ── Statements ──────────────────────────────────────────────────

  private parseStatement(): Statement {
    const token = this.peek();
    if (token.kind !== "identifier") {
      throw this.unexpected(["statement"]);
    }

    const next = this.peek(1);
    if (next.kind === "punct" && (next.value === "=" || next.value === ":=")) {
      return this.parseAssignment();
    }

    const startsCall = next.kind === "punct" && next.value === "(";
    const usedAsVariable =
      next.kind === "punct" && (next.value === "." || next.value === "[");

    if (token.value === "print" && startsCall) {
      return this.parsePrint();
    }
    if (token.value === "if") {
      return this.parseIf();
    }
    if (token.value === "for") {
      return this.parseFor();
    }
    if (token.value === "yield" && !usedAsVariable) {
      this.requireSection("template", token);
      return this.parseYield();
    }
    if (COMMAND_KEYWORDS.has(token.value) && !usedAsVariable) {
      this.requireSection("commands", token);
      return this.parseCommand(token);
    }

    return this.parsePush();
  }

  private parseAssignment(): Statement {
    const nameToken = this.advance();
    const operator = this.advance();
    const value = this.parseExpression();
    this.expectPunct(";");
    return {
      kind: operator.value === "=" ? "declare" : "reassign",
      name: nameToken.value,
      position: nameToken.position,
      value,
    };
  }

  private parsePush(): Statement {
    const start = this.peek();
    const target = this.parseAccess();
    const last = target.steps.at(-1);

    if (last?.kind !== "field" || last.name !== "push" || !this.isPunct("(")) {
      throw this.unexpected(["=", ":=", ".push("]);
    }
    target.steps.pop();

    this.expectPunct("(");
    const value = this.parseExpression();
    this.expectPunct(")");
    this.expectPunct(";");
    return { kind: "push", position: start.position, target, value };
  }

  private parsePrint(): Statement {
    const start = this.advance();
    this.expectPunct("(");
    const value = this.parseExpression();
    this.expectPunct(")");
    this.expectPunct(";");
    return { kind: "print", position: start.position, value };
  }

  private parseIf(): Statement {
    const start = this.advance();
    const conditions: Access[] = [];
    while (this.peek().kind === "identifier") {
      conditions.push(this.parseAccess());
    }
    if (conditions.length === 0) {
      throw this.unexpected(["variable"]);
    }
    const body = this.parseBlock();
    return { body, conditions, kind: "if", position: start.position };
  }

  private parseFor(): Statement {
    const start = this.advance();
    const grouped = this.isIdentifier("group") && this.isPunctAt(1, "(");
    if (grouped) {
      this.advance();
    }

    if (!this.isPunct("(")) {
      const variable = this.expectIdentifier();
      this.expectKeyword("in");
      const iterable = this.parseExpression({ allowStruct: false });
      const body = this.parseBlock();
      return {
        body,
        iterables: [iterable],
        kind: "for",
        mode: "single",
        position: start.position,
        variables: [variable],
      };
    }

    const variables = this.parseParenthesised(() => this.expectIdentifier());
    this.expectKeyword("in");
    const iterablesStart = this.peek();
    const iterables = this.parseParenthesised(() => this.parseExpression());

    if (variables.length !== iterables.length) {
      throw this.errorAt(
        iterablesStart,
        `Loop binds ${variables.length} variable(s) but iterates ${iterables.length} value(s)`
      );
    }

    const body = this.parseBlock();
    return {
      body,
      iterables,
      kind: "for",
      mode: grouped ? "group" : "combination",
      position: start.position,
      variables,
    };
  }

  private parseParenthesised<T>(parseItem: () => T): T[] {
    this.expectPunct("(");
    const items = [parseItem()];
    while (this.isPunct(",")) {
      this.advance();
      items.push(parseItem());
    }
    this.expectPunct(")");
    return items;
  }

  private parseYield(): Statement {
    const start = this.advance();
    const value = this.parseExpression();
    this.expectPunct(";");
    return { kind: "yield", position: start.position, value };
  }

  private parseCommand(keyword: Token): Statement {
    this.advance();
    const position = keyword.position;
    let statement: Statement;

    switch (keyword.value) {
      case "limit":
        statement = { count: this.parseBound(), kind: "limit", position };
        break;
      case "sleep":
        statement = { duration: this.parseBound(), kind: "sleep", position };
        break;
      case "wait_all":
        statement = this.isPunct(";")
          ? { kind: "waitAll", position }
          : { kind: "waitAll", position, timeout: this.parseBound() };
        break;
      case "spawn":
        return this.parseSpawn(position);
      case "wait_for": {
        const id = this.expectProcessId();
        statement = this.isPunct(";")
          ? { id, kind: "waitFor", position }
          : {
              id,
              kind: "waitFor",
              position,
              timeout: { duration: this.parseBound(), polls: this.parseBound() },
            };
        break;
      }
      case "kill":
        statement = { id: this.expectProcessId(), kind: "kill", position };
        break;
      default:
        throw this.errorAt(keyword, `Unknown command '${keyword.value}'`);
    }

    this.expectPunct(";");
    return statement;
  }

  private parseSpawn(position: Position): Statement {
    const id = this.peek().kind === "integer" ? this.expectProcessId() : undefined;
    let dir: StringPart[] | undefined;
    let stdout: OutputMap = { kind: "print" };
    let stderr: OutputMap = { kind: "print" };

    while (
      this.peek().kind === "identifier" &&
      SPAWN_OPTIONS.has(this.peek().value) &&
      this.isPunctAt(1, "(")
    ) {
      const option = this.advance().value;
      this.expectPunct("(");
      if (option === "dir") {
        dir = this.parseBuilder();
      } else if (option === "stdout") {
        stdout = this.parseOutputMap();
      } else {
        stderr = this.parseOutputMap();
      }
      this.expectPunct(")");
    }

    const program = this.parseBuilder();
    const args: SpawnArg[] = [];
    while (!this.isPunct(";")) {
      if (this.isPunct("{")) {
        this.advance();
        const access = this.parseAccess();
        this.expectPunct("}");
        args.push({ access, kind: "value" });
      } else {
        args.push({ kind: "text", parts: this.parseBuilder() });
      }
    }
    this.expectPunct(";");

    return {
      args,
      dir,
      id,
      kind: "spawn",
      position,
      program,
      stderr,
      stdout,
    };
  }

  private parseOutputMap(): OutputMap {
    if (this.isIdentifier("print")) {
      this.advance();
      return { kind: "print" };
    }
    if (this.isIdentifier("append") && this.isPunctAt(1, "(")) {
      this.advance();
      this.expectPunct("(");
      const path = this.parseBuilder();
      this.expectPunct(")");
      return { kind: "append", path };
    }
    return { kind: "create", path: this.parseBuilder() };
  }

  // ── Expressions ─────────────────────────────────────────────────

  private parseExpression(
    options: ExpressionOptions = { allowStruct: true }
  ): Expression {
    const token = this.peek();
    const position = token.position;

    if (token.kind === "punct" && token.value === "*") {
      this.advance();
      return { kind: "clone", position, target: this.parseExpression(options) };
    }

    if (token.kind === "identifier") {
      const startsCall = this.isPunctAt(1, "(");
      if (token.value === "build" && startsCall) {
        this.requireSection("template", token);
        return this.parseBuild();
      }
      if (token.value === "load" && startsCall) {
        this.advance();
        this.expectPunct("(");
        const path = this.parseExpression();
        this.expectPunct(")");
        return { kind: "load", path, position };
      }
      if (token.value === "true" || token.value === "false") {
        this.advance();
        return { kind: "boolean", position, value: token.value === "true" };
      }
      const access = this.parseAccess();
      return { access, kind: "access", position };
    }

    if (token.kind === "integer") {
      this.advance();
      const value = Number.parseInt(token.value, 10);
      if (this.isPunct("..")) {
        this.advance();
        return {
          end: this.parseBound(),
          kind: "range",
          position,
          start: { kind: "literal", value },
        };
      }
      return { kind: "integer", position, value };
    }

    if (token.kind === "string") {
      const parts = this.parseBuilder();
      return this.finishStringOrStruct(parts, position, options);
    }

    if (token.kind === "punct" && token.value === "[") {
      return this.parseBracketed(options);
    }

    throw this.unexpected(["expression"]);
  }

  /**
   * `[` opens a list literal, but a lone `[access]` followed by `+`, `..` or
   * `{` is an interpolation, a range bound or a struct name instead.
   */
  private parseBracketed(options: ExpressionOptions): Expression {
    const open = this.advance();
    const position = open.position;
    const items: Expression[] = [];

    while (!this.isPunct("]")) {
      items.push(this.parseExpression());
      if (!this.isPunct(",")) {
        break;
      }
      this.advance();
    }
    this.expectPunct("]");

    const only = items.length === 1 ? items[0] : undefined;
    const single = only?.kind === "access" ? only.access : undefined;

    if (single && this.isPunct("..")) {
      this.advance();
      return {
        end: this.parseBound(),
        kind: "range",
        position,
        start: { access: single, kind: "access" },
      };
    }

    const continuesString =
      this.isPunct("+") || (options.allowStruct && this.isPunct("{"));
    if (single && continuesString) {
      const parts: StringPart[] = [{ access: single, kind: "interpolation" }];
      while (this.isPunct("+")) {
        this.advance();
        parts.push(this.parseOperand());
      }
      return this.finishStringOrStruct(parts, position, options);
    }

    return { items, kind: "list", position };
  }

  private finishStringOrStruct(
    parts: StringPart[],
    position: Position,
    options: ExpressionOptions
  ): Expression {
    if (!(options.allowStruct && this.isPunct("{"))) {
      return { kind: "string", parts, position };
    }

    this.advance();
    const fields: FieldInit[] = [];
    while (!this.isPunct("}")) {
      fields.push(this.parseFieldInit());
      if (!this.isPunct(",")) {
        break;
      }
      this.advance();
    }
    this.expectPunct("}");
    return { fields, kind: "struct", name: parts, position };
  }

  private parseFieldInit(): FieldInit {
    const name = this.expectIdentifier();
    this.expectPunct("=");
    return { name, value: this.parseExpression() };
  }

  private parseBuild(): Expression {
    const start = this.advance();
    this.expectPunct("(");
    const template = this.parseExpression();
    this.expectPunct(",");
    const output = this.parseExpression();
    const properties: FieldInit[] = [];
    while (this.isPunct(",")) {
      this.advance();
      properties.push(this.parseFieldInit());
    }
    this.expectPunct(")");
    return {
      kind: "build",
      output,
      position: start.position,
      properties,
      template,
    };
  }

  private parseBuilder(): StringPart[] {
    const parts = [this.parseOperand()];
    while (this.isPunct("+")) {
      this.advance();
      parts.push(this.parseOperand());
    }
    return parts;
  }

  private parseOperand(): StringPart {
    const token = this.peek();
    if (token.kind === "string") {
      this.advance();
      return { kind: "text", value: token.value };
    }
    if (token.kind === "punct" && token.value === "[") {
      this.advance();
      const access = this.parseAccess();
      this.expectPunct("]");
      return { access, kind: "interpolation" };
    }
    throw this.unexpected(["string", "[variable]"]);
  }

  private parseBound(): Bound {
    const token = this.peek();
    if (token.kind === "integer") {
      this.advance();
      return { kind: "literal", value: Number.parseInt(token.value, 10) };
    }
    if (token.kind === "punct" && token.value === "[") {
      this.advance();
      const access = this.parseAccess();
      this.expectPunct("]");
      return { access, kind: "access" };
    }
    throw this.unexpected(["integer", "[variable]"]);
  }

  private parseAccess(): Access {
    const rootToken = this.peek();
    const root = this.expectIdentifier();
    const steps: AccessStep[] = [];

    for (;;) {
      if (this.isPunct(".") && this.peek(1).kind === "identifier") {
        this.advance();
        steps.push({ kind: "field", name: this.advance().value });
      } else if (this.isPunct("[")) {
        this.advance();
        const indexToken = this.peek();
        if (indexToken.kind === "integer") {
          this.advance();
          steps.push({
            index: { kind: "literal", value: Number.parseInt(indexToken.value, 10) },
            kind: "index",
          });
        } else {
          steps.push({
            index: { access: this.parseAccess(), kind: "access" },
            kind: "index",
          });
        }
        this.expectPunct("]");
      } else {
        return { position: rootToken.position, root, steps };
      }
    }
  }

  // ── Token helpers ───────────────────────────────────────────────

  private peek(offset = 0): Token {
    const last = this.tokens.length - 1;
    return this.tokens[Math.min(this.index + offset, last)] ?? this.eofToken();
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== "eof") {
      this.index++;
    }
    return token;
  }

  private atEnd(): boolean {
    return this.peek().kind === "eof";
  }

  private isPunct(value: string): boolean {
    return this.isPunctAt(0, value);
  }

  private isPunctAt(offset: number, value: string): boolean {
    const token = this.peek(offset);
    return token.kind === "punct" && token.value === value;
  }

  private isIdentifier(value: string): boolean {
    const token = this.peek();
    return token.kind === "identifier" && token.value === value;
  }

  private expectPunct(value: string): void {
    if (!this.isPunct(value)) {
      throw this.unexpected([value]);
    }
    this.advance();
  }

  private expectKeyword(value: string): void {
    if (!this.isIdentifier(value)) {
      throw this.unexpected([value]);
    }
    this.advance();
  }

  private expectIdentifier(): string {
    const token = this.peek();
    if (token.kind !== "identifier") {
      throw this.unexpected(["identifier"]);
    }
    this.advance();
    return token.value;
  }

  private expectString(): string {
    const token = this.peek();
    if (token.kind !== "string") {
      throw this.unexpected(["string"]);
    }
    this.advance();
    return token.value;
  }

  private expectProcessId(): number {
    const token = this.peek();
    const id = Number.parseInt(token.value, 10);
    if (token.kind !== "integer" || id < 0) {
      throw this.unexpected(["process id"]);
    }
    this.advance();
    return id;
  }

  private requireSection(section: ProgramSection, token: Token): void {
    if (this.section !== section) {
      const where = section === "template" ? "[template.*]" : "[commands]";
      throw this.errorAt(
        token,
        `'${token.value}' is only allowed in ${where} sections`
      );
    }
  }

  private eofToken(): Token {
    return { kind: "eof", position: { column: 1, line: 1, offset: 0 }, value: "" };
  }

  private unexpected(expected: string[]): ParseError {
    const token = this.peek();
    const wanted = expected.map((item) => `'${item}'`).join(" or ");
    const error = new ParseError(
      `Expected ${wanted}, found ${describeToken(token)}`,
      token.position,
      expected,
      this.lexer.lineAt(token.position)
    );
    error.file = this.file;
    return error;
  }

  private errorAt(token: Token, message: string): ParseError {
    const error = new ParseError(
      message,
      token.position,
      [],
      this.lexer.lineAt(token.position)
    );
    error.file = this.file;
    return error;
  }
}

export function parseConfig(source: string, file?: string): ConfigUnit {
  return new Parser(source, file).parse();
}
