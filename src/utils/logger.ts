import ansis from "ansis";
import type { Config } from "../types";

const colors = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
  ansis.red,
  ansis.gray,
  ansis.white,
] as const;

type LoggerConfig = Pick<Config, "quiet" | "prefix">;

export class Logger {
  private readonly colorMap = new Map<string, (typeof colors)[number]>();
  private colorIndex = 0;
  private maxPrefixLength = 0;
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      prefix: true,
      quiet: false,
      ...config,
    };
  }

  registerTask(taskName: string): void {
    if (!this.colorMap.has(taskName)) {
      const color = colors[this.colorIndex % colors.length];
      if (color) {
        this.colorMap.set(taskName, color);
      }
      this.colorIndex++;
      this.maxPrefixLength = Math.max(this.maxPrefixLength, taskName.length);
    }
  }

  log(taskName: string, message: string): void {
    if (this.config.quiet) {
      return;
    }

    for (const line of message.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      console.log(this.formatLine(taskName, line));
    }
  }

  error(taskName: string, message: string): void {
    for (const line of message.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      console.error(this.formatLine(taskName, ansis.red(line)));
    }
  }

  /** Output of `print` statements. */
  print(message: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(message);
  }

  info(message: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(`${ansis.blue("ℹ")} ${message}`);
  }

  success(message: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(`${ansis.green("✓")} ${message}`);
  }

  /** Loop position line, printed once per iteration of a commands loop. */
  progress(message: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(`${ansis.dim("↻")} ${ansis.dim(message)}`);
  }

  warn(message: string): void {
    console.warn(`${ansis.yellow("⚠")} ${message}`);
  }

  fail(message: string): void {
    console.error(`${ansis.red("✗")} ${message}`);
  }

  private formatLine(taskName: string, line: string): string {
    if (this.config.prefix === false) {
      return line;
    }

    const color = this.colorMap.get(taskName) ?? ansis.white;

    if (typeof this.config.prefix === "string") {
      return `${color(this.config.prefix)} ${line}`;
    }
    // pad to keep the pipes aligned across processes
    const prefix = `[${taskName}]`;
    const paddedPrefix = prefix.padEnd(this.maxPrefixLength + 2);
    return `${color(paddedPrefix)} ${ansis.gray("|")} ${line}`;
  }

  createTaskLogger(taskName: string): TaskLogger {
    this.registerTask(taskName);
    return new TaskLogger(this, taskName);
  }
}

export type OutputStream = "stdout" | "stderr";

export class TaskLogger {
  private readonly parent: Logger;
  private readonly taskName: string;
  private readonly pending: Record<OutputStream, string> = {
    stderr: "",
    stdout: "",
  };

  constructor(parent: Logger, taskName: string) {
    this.parent = parent;
    this.taskName = taskName;
  }

  get name(): string {
    return this.taskName;
  }

  log(message: string): void {
    this.parent.log(this.taskName, message);
  }

  error(message: string): void {
    this.parent.error(this.taskName, message);
  }

  /**
   * Feed raw process output. Complete lines are emitted at once; a trailing
   * partial line waits for the next chunk or {@link flush}.
   */
  write(stream: OutputStream, chunk: string): void {
    const text = this.pending[stream] + chunk;
    const end = text.lastIndexOf("\n");
    if (end === -1) {
      this.pending[stream] = text;
      return;
    }
    this.pending[stream] = text.slice(end + 1);
    this.emit(stream, text.slice(0, end));
  }

  flush(): void {
    for (const stream of ["stdout", "stderr"] as const) {
      const rest = this.pending[stream];
      this.pending[stream] = "";
      if (rest) {
        this.emit(stream, rest);
      }
    }
  }

  private emit(stream: OutputStream, text: string): void {
    if (stream === "stdout") {
      this.log(text);
    } else {
      this.error(text);
    }
  }
}
