import type { ArtifactValue } from "./core/values";

export type Config = {
  quiet?: boolean;
  bail?: boolean;
  prefix?: boolean | string;
};

export interface RunOptions extends Config {
  cwd?: string;
  env?: Record<string, string>;
  /** Overrides the `[output]` directory. */
  output?: string;
  /** Names of `[commands.<name>]` blocks to run; all blocks when omitted. */
  blocks?: string[];
  /** String globals declared before `[globals]` runs. */
  variables?: Record<string, string>;
  /** Render templates and stop before any commands block. */
  renderOnly?: boolean;
  /** File rewritten with the loop positions before every spawn. */
  progressFile?: string;
}

export type ParsedArgs = {
  file?: string;
  options: RunOptions;
  help: boolean;
};

export type ProcessState = "running" | "exited" | "killed" | "timed-out";

export type ProcessRecord = {
  /** Launch order, starting at 1. */
  serial: number;
  id?: number;
  label: string;
  command: string[];
  pid?: number;
  state: ProcessState;
  exitCode?: number;
  startedAt: Date;
  exitedAt?: Date;
};

export type WaitOutcome =
  | { kind: "completed" }
  | { kind: "timeout"; pending: number };

export type RunSummary = {
  artifacts: ReadonlyMap<string, readonly ArtifactValue[]>;
  processes: ProcessRecord[];
};
