/** 1-based line and column of a token in its source file. */
export type Position = {
  line: number;
  column: number;
  offset: number;
};

export type Access = {
  root: string;
  steps: AccessStep[];
  position: Position;
};

export type AccessStep =
  | { kind: "field"; name: string }
  | { kind: "index"; index: IndexExpr };

export type IndexExpr =
  | { kind: "literal"; value: number }
  | { kind: "access"; access: Access };

/** One operand of a `+` chain: literal text or a `[variable]` interpolation. */
export type StringPart =
  | { kind: "text"; value: string }
  | { kind: "interpolation"; access: Access };

/** Integer literal or bracketed variable reference (range bounds, counts). */
export type Bound =
  | { kind: "literal"; value: number }
  | { kind: "access"; access: Access };

export type FieldInit = {
  name: string;
  value: Expression;
};

export type Expression =
  | { kind: "string"; parts: StringPart[]; position: Position }
  | {
      kind: "struct";
      name: StringPart[];
      fields: FieldInit[];
      position: Position;
    }
  | { kind: "list"; items: Expression[]; position: Position }
  | { kind: "range"; start: Bound; end: Bound; position: Position }
  | { kind: "integer"; value: number; position: Position }
  | { kind: "boolean"; value: boolean; position: Position }
  | { kind: "access"; access: Access; position: Position }
  | { kind: "clone"; target: Expression; position: Position }
  | {
      kind: "build";
      template: Expression;
      output: Expression;
      properties: FieldInit[];
      position: Position;
    }
  | { kind: "load"; path: Expression; position: Position };

export type OutputMap =
  | { kind: "print" }
  | { kind: "create"; path: StringPart[] }
  | { kind: "append"; path: StringPart[] };

export type SpawnArg =
  | { kind: "text"; parts: StringPart[] }
  | { kind: "value"; access: Access };

export type LoopMode = "single" | "combination" | "group";

export type Statement =
  | { kind: "declare"; name: string; value: Expression; position: Position }
  | { kind: "reassign"; name: string; value: Expression; position: Position }
  | { kind: "push"; target: Access; value: Expression; position: Position }
  | { kind: "print"; value: Expression; position: Position }
  | {
      kind: "if";
      conditions: Access[];
      body: Statement[];
      position: Position;
    }
  | {
      kind: "for";
      mode: LoopMode;
      variables: string[];
      iterables: Expression[];
      body: Statement[];
      position: Position;
    }
  | { kind: "yield"; value: Expression; position: Position }
  | { kind: "limit"; count: Bound; position: Position }
  | { kind: "sleep"; duration: Bound; position: Position }
  | { kind: "waitAll"; timeout?: Bound; position: Position }
  | {
      kind: "spawn";
      id?: number;
      dir?: StringPart[];
      stdout: OutputMap;
      stderr: OutputMap;
      program: StringPart[];
      args: SpawnArg[];
      position: Position;
    }
  | {
      kind: "waitFor";
      id: number;
      timeout?: { duration: Bound; polls: Bound };
      position: Position;
    }
  | { kind: "kill"; id: number; position: Position };

export type TemplateStatement = Extract<Statement, { kind: "yield" }>;

export type CommandStatement = Extract<
  Statement,
  { kind: "limit" | "sleep" | "waitAll" | "spawn" | "waitFor" | "kill" }
>;

export type TemplateBlock = {
  name: string;
  body: Statement[];
  position: Position;
  file?: string;
};

export type CommandBlock = {
  name?: string;
  body: Statement[];
  position: Position;
  file?: string;
};

/** One parsed `.bed` file, before its includes are resolved. */
export type ConfigUnit = {
  file?: string;
  includes: string[];
  output?: string;
  globals: Statement[];
  templates: TemplateBlock[];
  commands: CommandBlock[];
};
