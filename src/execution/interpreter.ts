import { isAbsolute, resolve } from "node:path";
import debug from "debug";
import type { OutputMap, SpawnArg, Statement } from "../core/ast";
import type { Environment } from "../core/environment";
import { ProcbedError, ShapeMismatchError, TypeMismatchError } from "../core/errors";
import type { Evaluator } from "../core/evaluator";
import { describeValue, stringify, toSequence } from "../core/values";
import type { Logger } from "../utils/logger";
import type { LoopCursor, LoopProgress } from "./progress";
import type { OutputTarget, ProcessScheduler, SpawnRequest } from "./scheduler";
import type { TemplateDriver } from "./templates";

const log = debug("procbed:interpreter");

export type InterpreterOptions = {
  evaluator: Evaluator;
  logger: Logger;
  /** Directory relative process paths resolve against. */
  baseDir: string;
  templates?: TemplateDriver;
  scheduler?: ProcessScheduler;
  /** Loop positions, reported once per iteration. */
  progress?: LoopProgress;
};

/**
 * Executes statement lists in order. Template and command statements are
 * handed to the driver and scheduler the interpreter was built with.
 */
export class Interpreter {
  private readonly evaluator: Evaluator;
  private readonly logger: Logger;
  private readonly baseDir: string;
  private readonly templates?: TemplateDriver;
  private readonly scheduler?: ProcessScheduler;
  private readonly progress?: LoopProgress;

  constructor(options: InterpreterOptions) {
    this.evaluator = options.evaluator;
    this.logger = options.logger;
    this.baseDir = options.baseDir;
    this.templates = options.templates;
    this.scheduler = options.scheduler;
    this.progress = options.progress;
  }

  async run(
    statements: Statement[],
    env: Environment,
    file?: string
  ): Promise<void> {
    for (const statement of statements) {
      this.scheduler?.assertHealthy();
      if (this.scheduler?.aborted) {
        return;
      }
      try {
        await this.execute(statement, env, file);
      } catch (error) {
        if (error instanceof ProcbedError) {
          error.locate(statement.position, file);
        }
        throw error;
      }
    }
  }

  private async execute(
    statement: Statement,
    env: Environment,
    file?: string
  ): Promise<void> {
    switch (statement.kind) {
      case "declare":
        env.declare(
          statement.name,
          await this.evaluator.evaluate(statement.value, env)
        );
        return;
      case "reassign":
        env.assign(
          statement.name,
          await this.evaluator.evaluate(statement.value, env)
        );
        return;
      case "push": {
        const list = this.evaluator.resolveList(statement.target, env);
        list.items.push(await this.evaluator.evaluate(statement.value, env));
        return;
      }
      case "print":
        this.logger.print(
          describeValue(await this.evaluator.evaluate(statement.value, env))
        );
        return;
      case "if": {
        const holds = statement.conditions.every((condition) =>
          this.evaluator.isTruthy(condition, env)
        );
        if (holds) {
          await this.run(statement.body, env.child(), file);
        }
        return;
      }
      case "for":
        await this.executeFor(statement, env, file);
        return;
      case "yield":
        this.requireTemplates().yield(
          await this.evaluator.evaluate(statement.value, env)
        );
        return;
      case "limit":
        this.requireScheduler().setLimit(
          this.evaluator.evaluateBound(statement.count, env)
        );
        return;
      case "sleep":
        await this.requireScheduler().sleep(
          this.evaluator.evaluateBound(statement.duration, env)
        );
        return;
      case "waitAll": {
        const timeout =
          statement.timeout === undefined
            ? undefined
            : this.evaluator.evaluateBound(statement.timeout, env);
        await this.requireScheduler().waitAll(timeout);
        return;
      }
      case "spawn":
        await this.requireScheduler().spawn(this.spawnRequest(statement, env));
        return;
      case "waitFor": {
        const scheduler = this.requireScheduler();
        if (!statement.timeout) {
          await scheduler.waitFor(statement.id);
          return;
        }
        await scheduler.waitFor(statement.id, {
          durationMs: this.evaluator.evaluateBound(statement.timeout.duration, env),
          polls: this.evaluator.evaluateBound(statement.timeout.polls, env),
        });
        return;
      }
      case "kill":
        await this.requireScheduler().kill(statement.id);
        return;
      default: {
        const exhaustive: never = statement;
        throw new Error(`Unhandled statement ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  private async executeFor(
    statement: Extract<Statement, { kind: "for" }>,
    env: Environment,
    file?: string
  ): Promise<void> {
    const sequences: LoopCursor[][] = [];
    for (const iterable of statement.iterables) {
      const items = toSequence(await this.evaluator.evaluate(iterable, env));
      sequences.push(items.map((value, index) => ({ index, value })));
    }

    const rows =
      statement.mode === "group" ? zip(sequences) : crossProduct(sequences);
    log(
      `for (${statement.variables.join(", ")}): ${rows.length} iteration(s), ${statement.mode}`
    );

    this.progress?.enter(
      statement.variables,
      sequences.map((sequence) => sequence.length)
    );
    try {
      for (const row of rows) {
        if (this.scheduler?.aborted) {
          return;
        }
        this.progress?.advance(row);
        const scope = env.child();
        statement.variables.forEach((name, index) => {
          const cursor = row[index];
          if (cursor) {
            scope.declare(name, cursor.value);
          }
        });
        await this.run(statement.body, scope, file);
      }
    } finally {
      this.progress?.leave(statement.variables.length);
    }
  }

  private spawnRequest(
    statement: Extract<Statement, { kind: "spawn" }>,
    env: Environment
  ): SpawnRequest {
    const args: string[] = [];
    for (const arg of statement.args) {
      args.push(...this.spawnArg(arg, env));
    }
    const dir = statement.dir
      ? this.evaluator.stringify(statement.dir, env)
      : undefined;

    return {
      args,
      cwd: dir === undefined ? this.baseDir : this.path(dir),
      id: statement.id,
      program: this.evaluator.stringify(statement.program, env),
      stderr: this.outputTarget(statement.stderr, env),
      stdout: this.outputTarget(statement.stdout, env),
    };
  }

  /** `{var}` passes a value through: one argument per list or range element. */
  private spawnArg(arg: SpawnArg, env: Environment): string[] {
    if (arg.kind === "text") {
      return [this.evaluator.stringify(arg.parts, env)];
    }
    const value = this.evaluator.resolve(arg.access, env);
    if (value.kind === "list" || value.kind === "range") {
      return toSequence(value).map(stringify);
    }
    return [stringify(value)];
  }

  private outputTarget(map: OutputMap, env: Environment): OutputTarget {
    if (map.kind === "print") {
      return { kind: "print" };
    }
    return {
      append: map.kind === "append",
      kind: "file",
      path: this.path(this.evaluator.stringify(map.path, env)),
    };
  }

  private path(path: string): string {
    return isAbsolute(path) ? path : resolve(this.baseDir, path);
  }

  private requireTemplates(): TemplateDriver {
    if (!this.templates) {
      throw new TypeMismatchError("yield is only valid inside a template block");
    }
    return this.templates;
  }

  private requireScheduler(): ProcessScheduler {
    if (!this.scheduler) {
      throw new TypeMismatchError(
        "Process commands are only valid inside a commands block"
      );
    }
    return this.scheduler;
  }
}

/** Every combination, first sequence outermost. */
export function crossProduct<T>(sequences: T[][]): T[][] {
  let rows: T[][] = [[]];
  for (const sequence of sequences) {
    const next: T[][] = [];
    for (const row of rows) {
      for (const item of sequence) {
        next.push([...row, item]);
      }
    }
    rows = next;
  }
  return rows;
}

/** Element-wise tuples; every sequence must have the same length. */
export function zip<T>(sequences: T[][]): T[][] {
  const lengths = sequences.map((sequence) => sequence.length);
  const length = lengths[0] ?? 0;
  if (lengths.some((other) => other !== length)) {
    throw new ShapeMismatchError(
      `Grouped loop needs sequences of equal length, found ${lengths.join(", ")}`
    );
  }
  return Array.from({ length }, (_, index) =>
    sequences.map((sequence) => {
      const item = sequence[index];
      if (item === undefined) {
        throw new ShapeMismatchError(`Missing element ${index}`);
      }
      return item;
    })
  );
}
