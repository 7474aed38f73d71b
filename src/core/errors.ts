import type { Position } from "./ast";

export type ErrorCode =
  | "SyntaxError"
  | "IncludeError"
  | "UndefinedVariable"
  | "RedeclarationError"
  | "TypeMismatch"
  | "IndexOutOfRange"
  | "FieldNotFound"
  | "ShapeMismatch"
  | "LoadError"
  | "RenderError"
  | "SpawnError"
  | "ProcessNotFound"
  | "ProcessFailed"
  | "Aborted";

export abstract class ProcbedError extends Error {
  abstract readonly code: ErrorCode;
  position?: Position;
  file?: string;

  constructor(message: string, position?: Position) {
    super(message);
    this.name = new.target.name;
    this.position = position;
  }

  /**
   * Attach a location unless one is already known. Errors raised deep inside
   * the evaluator take the location of the statement that triggered them.
   */
  locate(position: Position, file?: string): this {
    this.position ??= position;
    this.file ??= file;
    return this;
  }

  /** `file:line:col: message`, dropping whatever location parts are unknown. */
  describe(): string {
    const location = [
      this.file,
      this.position?.line,
      this.position?.column,
    ].filter((part) => part !== undefined);
    return location.length > 0
      ? `${location.join(":")}: ${this.message}`
      : this.message;
  }
}

export class ParseError extends ProcbedError {
  readonly code = "SyntaxError";
  readonly expected: string[];
  readonly context: string;

  constructor(
    message: string,
    position: Position,
    expected: string[] = [],
    context = ""
  ) {
    super(message, position);
    this.expected = expected;
    this.context = context;
  }
}

export class IncludeError extends ProcbedError {
  readonly code = "IncludeError";
}

/** Failures raised while evaluating expressions and access chains. */
export abstract class EvaluationError extends ProcbedError {}

export class UndefinedVariableError extends EvaluationError {
  readonly code = "UndefinedVariable";
  readonly variable: string;

  constructor(variable: string, position?: Position) {
    super(`Undefined variable \`${variable}\``, position);
    this.variable = variable;
  }
}

export class RedeclarationError extends EvaluationError {
  readonly code = "RedeclarationError";
}

export class TypeMismatchError extends EvaluationError {
  readonly code = "TypeMismatch";
}

export class IndexOutOfRangeError extends EvaluationError {
  readonly code = "IndexOutOfRange";
}

export class FieldNotFoundError extends EvaluationError {
  readonly code = "FieldNotFound";
}

export class ShapeMismatchError extends EvaluationError {
  readonly code = "ShapeMismatch";
}

export class LoadError extends ProcbedError {
  readonly code = "LoadError";
}

export class RenderError extends ProcbedError {
  readonly code = "RenderError";
}

export class SpawnError extends ProcbedError {
  readonly code = "SpawnError";
}

export class ProcessNotFoundError extends ProcbedError {
  readonly code = "ProcessNotFound";
}

export class ProcessFailedError extends ProcbedError {
  readonly code = "ProcessFailed";
}

export class AbortError extends ProcbedError {
  readonly code = "Aborted";
}
