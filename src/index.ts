export { Runner } from "./execution/runner";
export { ArgsParser, parseArgs } from "./core/args";
export { Parser, parseConfig } from "./core/parser";
export { Lexer, tokenize } from "./core/lexer";
export { ConfigLoader, loadConfig } from "./core/config-loader";
export { Environment } from "./core/environment";
export { Evaluator } from "./core/evaluator";
export { Interpreter } from "./execution/interpreter";
export { TemplateDriver } from "./execution/templates";
export { DataLoader } from "./execution/data-loader";
export { ProcessScheduler } from "./execution/scheduler";
export { LoopProgress } from "./execution/progress";
export { Logger, TaskLogger } from "./utils/logger";
export * from "./core/errors";
export * from "./core/values";

export type { Token, TokenKind } from "./core/lexer";
export type { GlobalsBlock, LoadedConfig } from "./core/config-loader";
export type { BuildRequest, EvaluatorServices } from "./core/evaluator";
export type {
  LoopCursor,
  LoopPosition,
  LoopProgressOptions,
} from "./execution/progress";
export type {
  OutputTarget,
  SchedulerOptions,
  SpawnRequest,
  WaitForTimeout,
} from "./execution/scheduler";
export type * from "./core/ast";
export type {
  Config,
  ParsedArgs,
  ProcessRecord,
  ProcessState,
  RunOptions,
  RunSummary,
  WaitOutcome,
} from "./types";
