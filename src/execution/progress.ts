import { mkdir, writeFile } from "node:fs/promises";
import { basename, dirname } from "node:path";
import debug from "debug";
import { SpawnError } from "../core/errors";
import { type Value, describeValue, stringify } from "../core/values";
import type { Logger } from "../utils/logger";

const log = debug("procbed:progress");

export type LoopPosition = {
  variable: string;
  /** 1-based; 0 until the first iteration starts. */
  position: number;
  total: number;
  /** Short label of the current element. */
  element: string;
};

/** Current element of one loop variable and its index in the sequence. */
export type LoopCursor = {
  index: number;
  value: Value;
};

export type LoopProgressOptions = {
  logger: Logger;
  /** Rewritten before every spawn when set. */
  file?: string;
};

/**
 * Tracks where every active `for` variable of a commands block is. Nested
 * loops stack their variables, outermost first.
 */
export class LoopProgress {
  private readonly logger: Logger;
  private readonly file?: string;
  private readonly entries: LoopPosition[] = [];

  constructor(options: LoopProgressOptions) {
    this.logger = options.logger;
    this.file = options.file;
  }

  enter(variables: string[], totals: number[]): void {
    variables.forEach((variable, index) => {
      this.entries.push({
        element: "",
        position: 0,
        total: totals[index] ?? 0,
        variable,
      });
    });
  }

  /** Move the innermost loop to its next row and log the new positions. */
  advance(row: LoopCursor[]): void {
    const offset = this.entries.length - row.length;
    row.forEach((cursor, index) => {
      const entry = this.entries[offset + index];
      if (entry) {
        entry.position = cursor.index + 1;
        entry.element = elementLabel(cursor.value);
      }
    });
    this.logger.progress(this.entries.map(formatPosition).join("  "));
  }

  leave(count: number): void {
    this.entries.splice(Math.max(0, this.entries.length - count), count);
  }

  snapshot(): LoopPosition[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  /** Rewrite the progress file, one line per active loop variable. */
  async save(): Promise<void> {
    if (this.file === undefined) {
      return;
    }
    const text = this.entries
      .map((entry) => `${formatPosition(entry)}\n`)
      .join("");
    log(`Writing ${this.entries.length} loop position(s) to ${this.file}`);
    try {
      await mkdir(dirname(this.file), { recursive: true });
      await writeFile(this.file, text);
    } catch (error) {
      throw new SpawnError(
        `Cannot write progress file \`${this.file}\`: ${errorMessage(error)}`
      );
    }
  }
}

export function formatPosition(entry: LoopPosition): string {
  const text = `${entry.variable} ${entry.position}/${entry.total}`;
  return entry.element ? `${text} ${entry.element}` : text;
}

function elementLabel(value: Value): string {
  switch (value.kind) {
    case "artifact":
      return basename(value.outputPath);
    case "list":
    case "range":
      return describeValue(value);
    default:
      return stringify(value);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
