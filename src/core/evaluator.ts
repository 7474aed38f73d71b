import type {
  Access,
  AccessStep,
  Bound,
  Expression,
  FieldInit,
  IndexExpr,
  StringPart,
} from "./ast";
import type { Environment } from "./environment";
import {
  EvaluationError,
  FieldNotFoundError,
  ProcbedError,
  RedeclarationError,
  RenderError,
  TypeMismatchError,
} from "./errors";
import {
  type ArtifactValue,
  type ListValue,
  type Value,
  booleanValue,
  cloneValue,
  describeKind,
  elementAt,
  integerValue,
  listValue,
  rangeValue,
  stringValue,
  stringify,
  structValue,
  toInteger,
} from "./values";

export type BuildRequest = {
  template: string;
  output: string;
  properties: Map<string, Value>;
};

/** Side-effecting operations the evaluator delegates to the runtime. */
export type EvaluatorServices = {
  /** Present only while a template block runs. */
  build?: (request: BuildRequest, env: Environment) => Promise<ArtifactValue>;
  load: (path: string) => Promise<Value>;
};

export class Evaluator {
  private readonly services: EvaluatorServices;

  constructor(services: EvaluatorServices) {
    this.services = services;
  }

  withServices(overrides: Partial<EvaluatorServices>): Evaluator {
    return new Evaluator({ ...this.services, ...overrides });
  }

  async evaluate(expr: Expression, env: Environment): Promise<Value> {
    switch (expr.kind) {
      case "string":
        return stringValue(this.stringify(expr.parts, env));
      case "integer":
        return integerValue(expr.value);
      case "boolean":
        return booleanValue(expr.value);
      case "range":
        return rangeValue(
          this.evaluateBound(expr.start, env),
          this.evaluateBound(expr.end, env)
        );
      case "list": {
        const items: Value[] = [];
        for (const item of expr.items) {
          items.push(await this.evaluate(item, env));
        }
        return listValue(items);
      }
      case "struct":
        return structValue(
          this.stringify(expr.name, env),
          await this.evaluateFields(expr.fields, env)
        );
      case "access":
        return this.resolve(expr.access, env);
      case "clone":
        return cloneValue(await this.evaluate(expr.target, env));
      case "build":
        return this.evaluateBuild(expr, env);
      case "load": {
        const path = stringify(await this.evaluate(expr.path, env));
        return this.services.load(path);
      }
      default: {
        const exhaustive: never = expr;
        throw new Error(`Unhandled expression ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  /**
   * Resolve an access chain to the stored value. The result aliases the
   * binding: mutating a returned list mutates the variable.
   */
  resolve(access: Access, env: Environment): Value {
    try {
      let current = env.lookup(access.root);
      for (const step of access.steps) {
        current = this.step(current, step, env);
      }
      return current;
    } catch (error) {
      if (error instanceof ProcbedError) {
        error.locate(access.position);
      }
      throw error;
    }
  }

  /**
   * Resolve the list a `push` appends to. Frozen lists are refused through
   * any alias or field that reaches them.
   */
  resolveList(access: Access, env: Environment): ListValue {
    let current: Value;
    try {
      current = env.lookup(access.root);
      for (const step of access.steps) {
        if (current.kind === "artifact") {
          break;
        }
        current = this.step(current, step, env);
      }
    } catch (error) {
      if (error instanceof ProcbedError) {
        error.locate(access.position);
      }
      throw error;
    }

    if (current.kind !== "list") {
      const reason =
        current.kind === "artifact"
          ? "artifacts are immutable"
          : `expected a list, found ${describeKind(current)}`;
      throw new TypeMismatchError(
        `Cannot push to \`${describeAccess(access)}\`: ${reason}`
      ).locate(access.position);
    }
    if (current.frozen) {
      const error = new RedeclarationError(
        `\`${describeAccess(access)}\` is read-only and cannot be pushed to`
      );
      throw error.locate(access.position);
    }
    return current;
  }

  stringify(parts: StringPart[], env: Environment): string {
    let result = "";
    for (const part of parts) {
      result +=
        part.kind === "text"
          ? part.value
          : stringify(this.resolve(part.access, env));
    }
    return result;
  }

  evaluateBound(bound: Bound, env: Environment): number {
    if (bound.kind === "literal") {
      return bound.value;
    }
    try {
      return toInteger(this.resolve(bound.access, env));
    } catch (error) {
      if (error instanceof ProcbedError) {
        error.locate(bound.access.position);
      }
      throw error;
    }
  }

  /**
   * Condition semantics for `if`: unresolvable accesses, the string
   * `"false"` and boolean `false` are false; everything else is true.
   */
  isTruthy(access: Access, env: Environment): boolean {
    let value: Value;
    try {
      value = this.resolve(access, env);
    } catch (error) {
      if (error instanceof EvaluationError) {
        return false;
      }
      throw error;
    }
    if (value.kind === "boolean") {
      return value.value;
    }
    return !(value.kind === "string" && value.value === "false");
  }

  private async evaluateFields(
    fields: FieldInit[],
    env: Environment
  ): Promise<Map<string, Value>> {
    const result = new Map<string, Value>();
    for (const field of fields) {
      result.set(field.name, await this.evaluate(field.value, env));
    }
    return result;
  }

  private async evaluateBuild(
    expr: Extract<Expression, { kind: "build" }>,
    env: Environment
  ): Promise<Value> {
    const { build } = this.services;
    if (!build) {
      throw new RenderError(
        "build() is only available inside [template.*] sections",
        expr.position
      );
    }
    const template = stringify(await this.evaluate(expr.template, env));
    const output = stringify(await this.evaluate(expr.output, env));
    const properties = await this.evaluateFields(expr.properties, env);
    return build({ output, properties, template }, env);
  }

  private step(current: Value, step: AccessStep, env: Environment): Value {
    if (step.kind === "index") {
      return elementAt(current, this.evaluateIndex(step.index, env));
    }

    const { name } = step;
    if (current.kind === "struct") {
      const field = current.fields.get(name);
      if (field) {
        return field;
      }
      if (name === "name") {
        return stringValue(current.name);
      }
      throw new FieldNotFoundError(
        `Struct "${current.name}" has no field \`${name}\``
      );
    }

    if (current.kind === "artifact") {
      if (name === "sourcePath") {
        return stringValue(current.sourcePath);
      }
      if (name === "outputPath") {
        return stringValue(current.outputPath);
      }
      const property = current.properties.get(name);
      if (property) {
        return property;
      }
      throw new FieldNotFoundError(`Artifact has no property \`${name}\``);
    }

    throw new TypeMismatchError(
      `Cannot read field \`${name}\` of ${describeKind(current)}`
    );
  }

  private evaluateIndex(index: IndexExpr, env: Environment): number {
    if (index.kind === "literal") {
      return index.value;
    }
    const value = this.resolve(index.access, env);
    if (value.kind !== "integer" && value.kind !== "string") {
      throw new TypeMismatchError(
        `Index must be an integer, found ${describeKind(value)}`
      );
    }
    return toInteger(value);
  }
}

export function describeAccess(access: Access): string {
  let text = access.root;
  for (const step of access.steps) {
    if (step.kind === "field") {
      text += `.${step.name}`;
    } else if (step.index.kind === "literal") {
      text += `[${step.index.value}]`;
    } else {
      text += `[${describeAccess(step.index.access)}]`;
    }
  }
  return text;
}
