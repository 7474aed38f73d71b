import { type FileHandle, mkdir, open } from "node:fs/promises";
import { basename, dirname } from "node:path";
import type { Readable } from "node:stream";
import { finished } from "node:stream/promises";
import debug from "debug";
import { type ExecaChildProcess, execa } from "execa";
import {
  AbortError,
  ProcessFailedError,
  ProcessNotFoundError,
  SpawnError,
  TypeMismatchError,
} from "../core/errors";
import type { ProcessRecord, WaitOutcome } from "../types";
import type { Logger, TaskLogger } from "../utils/logger";
import type { LoopProgress } from "./progress";

const log = debug("procbed:scheduler");

const SHUTDOWN_GRACE_PERIOD_MS = 1000;

export type OutputTarget =
  | { kind: "print" }
  | { kind: "file"; path: string; append: boolean };

export type SpawnRequest = {
  /** Legacy numeric handle for `wait_for` and `kill`. */
  id?: number;
  program: string;
  args: string[];
  cwd: string;
  stdout: OutputTarget;
  stderr: OutputTarget;
};

export type WaitForTimeout = {
  durationMs: number;
  polls: number;
};

export type SchedulerOptions = {
  logger: Logger;
  env?: Record<string, string>;
  /** Treat the first non-zero exit as fatal. */
  bail?: boolean;
  /** Saved before every launch. */
  progress?: LoopProgress;
};

type ManagedProcess = {
  record: ProcessRecord;
  child: ExecaChildProcess;
  logger?: TaskLogger;
  exited: Promise<void>;
};

type Stdio = "pipe" | number;

export class ProcessScheduler {
  private readonly logger: Logger;
  private readonly env?: Record<string, string>;
  private readonly bail: boolean;
  private readonly progress?: LoopProgress;
  /** Processes not yet reaped. */
  private readonly pool = new Set<ManagedProcess>();
  /** Live processes by legacy id. */
  private readonly byId = new Map<number, ManagedProcess>();
  private readonly spawnedIds = new Set<number>();
  private readonly history: ProcessRecord[] = [];
  private readonly failures: ProcessRecord[] = [];
  private limit = 0;
  private serial = 0;
  private abortRequested = false;
  private forceKillTimer?: NodeJS.Timeout;
  private readonly abortSignal: Promise<void>;
  private signalAbort: () => void = () => undefined;

  constructor(options: SchedulerOptions) {
    this.logger = options.logger;
    this.env = options.env;
    this.bail = options.bail ?? false;
    this.progress = options.progress;
    this.abortSignal = new Promise((resolve) => {
      this.signalAbort = resolve;
    });
  }

  get aborted(): boolean {
    return this.abortRequested;
  }

  /** Every process launched so far, in launch order. */
  get records(): ProcessRecord[] {
    return [...this.history];
  }

  get liveCount(): number {
    return this.pool.size;
  }

  setLimit(count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new TypeMismatchError(
        `limit must be a non-negative integer, found ${count}`
      );
    }
    log(`Concurrency limit set to ${count === 0 ? "unbounded" : count}`);
    this.limit = count;
  }

  /** Start of a commands block: the limit goes back to unbounded. */
  reset(): void {
    this.limit = 0;
  }

  async spawn(request: SpawnRequest): Promise<ProcessRecord> {
    this.ensureRunning();

    if (request.id !== undefined) {
      const existing = this.byId.get(request.id);
      if (existing) {
        throw new SpawnError(
          `Process id ${request.id} is still in use by ${existing.record.label}`
        );
      }
    }

    await this.waitForSlot();
    await this.progress?.save();

    const handles: FileHandle[] = [];
    let stdout: Stdio;
    let stderr: Stdio;
    try {
      const opened = new Map<string, FileHandle>();
      stdout = await this.openTarget(request.stdout, opened);
      stderr = await this.openTarget(request.stderr, opened);
      handles.push(...opened.values());
    } catch (error) {
      throw new SpawnError(
        `Cannot open output file for \`${request.program}\`: ${errorMessage(error)}`
      );
    }

    this.serial++;
    const label = `${basename(request.program)}#${this.serial}`;
    log(`Spawning ${label}: ${request.program} ${request.args.join(" ")}`);

    const child = execa(request.program, request.args, {
      buffer: false,
      cwd: request.cwd,
      env: { ...process.env, ...this.env },
      reject: false,
      stderr,
      stdin: "ignore",
      stdout,
    });

    if (child.pid === undefined) {
      const reason = await launchFailure(child);
      await closeAll(handles);
      throw new SpawnError(`Cannot launch \`${request.program}\`: ${reason}`);
    }

    const record: ProcessRecord = {
      command: [request.program, ...request.args],
      id: request.id,
      label,
      pid: child.pid,
      serial: this.serial,
      startedAt: new Date(),
      state: "running",
    };

    const taskLogger =
      stdout === "pipe" || stderr === "pipe"
        ? this.logger.createTaskLogger(label)
        : undefined;
    if (taskLogger) {
      child.stdout?.on("data", (data: Buffer) => {
        taskLogger.write("stdout", data.toString());
      });
      child.stderr?.on("data", (data: Buffer) => {
        taskLogger.write("stderr", data.toString());
      });
    }

    const entry: ManagedProcess = {
      child,
      exited: Promise.resolve(),
      logger: taskLogger,
      record,
    };
    this.pool.add(entry);
    this.history.push(record);
    if (request.id !== undefined) {
      this.byId.set(request.id, entry);
      this.spawnedIds.add(request.id);
    }
    entry.exited = this.supervise(entry, handles);

    this.logger.info(`Running: ${label}`);
    return record;
  }

  async sleep(durationMs: number): Promise<void> {
    log(`Sleeping ${durationMs}ms`);
    await this.delay(durationMs);
    this.ensureRunning();
  }

  /**
   * Wait until every live process has exited. With a timeout, processes
   * still running when it expires stay live and tracked.
   */
  async waitAll(timeoutMs?: number): Promise<WaitOutcome> {
    const pending = this.live();
    if (pending.length === 0) {
      return { kind: "completed" };
    }
    log(`Waiting for ${pending.length} process(es)`);

    const allExited = Promise.all(pending.map((entry) => entry.exited));
    await this.delay(timeoutMs, allExited);
    this.ensureRunning();

    const remaining = this.live().length;
    if (remaining === 0) {
      return { kind: "completed" };
    }
    this.logger.warn(
      `wait_all timed out after ${timeoutMs}ms with ${remaining} process(es) still running`
    );
    return { kind: "timeout", pending: remaining };
  }

  /**
   * Wait for one process. With a timeout the process is checked `polls`
   * times across `durationMs`; if it is still running after that it is
   * killed and marked timed-out.
   */
  async waitFor(id: number, timeout?: WaitForTimeout): Promise<WaitOutcome> {
    const entry = this.find(id);
    if (!entry) {
      return { kind: "completed" };
    }

    if (!timeout) {
      await this.delay(undefined, entry.exited);
      this.ensureRunning();
      return { kind: "completed" };
    }

    const polls = Math.max(1, timeout.polls);
    const interval = Math.ceil(timeout.durationMs / polls);
    for (let poll = 0; poll < polls && this.pool.has(entry); poll++) {
      await this.delay(interval, entry.exited);
      this.ensureRunning();
    }
    if (!this.pool.has(entry)) {
      return { kind: "completed" };
    }

    entry.record.state = "timed-out";
    this.logger.warn(
      `${entry.record.label} did not exit within ${timeout.durationMs}ms and was killed`
    );
    this.terminate(entry);
    await entry.exited;
    return { kind: "timeout", pending: 1 };
  }

  async kill(id: number): Promise<void> {
    const entry = this.find(id);
    if (!entry) {
      log(`Process ${id} already exited`);
      return;
    }
    entry.record.state = "killed";
    this.terminate(entry);
    this.logger.info(`Stopped: ${entry.record.label}`);
    await entry.exited;
  }

  /** End of a commands block. */
  async drain(): Promise<void> {
    await this.waitAll();
  }

  /** Raise for a failed process when running with bail. */
  assertHealthy(): void {
    const failed = this.failures[0];
    if (this.bail && failed) {
      throw new ProcessFailedError(
        `${failed.label} exited with code ${failed.exitCode ?? "unknown"}`
      );
    }
  }

  /**
   * Signal handling: SIGTERM every live process, SIGKILL whatever is left
   * after the grace period.
   */
  shutdown(): void {
    if (this.abortRequested) {
      return;
    }
    this.abortRequested = true;
    this.signalAbort();

    const live = this.live();
    if (live.length > 0) {
      this.logger.info("Shutting down...");
    }
    for (const entry of live) {
      entry.record.state = "killed";
      entry.child.kill("SIGTERM", { forceKillAfterTimeout: false });
      this.logger.info(`Stopped: ${entry.record.label}`);
    }

    this.forceKillTimer = setTimeout(() => {
      for (const entry of this.live()) {
        entry.child.kill("SIGKILL");
      }
    }, SHUTDOWN_GRACE_PERIOD_MS);
    this.forceKillTimer.unref();
  }

  /** Resolves once every process launched so far has exited. */
  async settled(): Promise<void> {
    await Promise.all(this.live().map((entry) => entry.exited));
    clearTimeout(this.forceKillTimer);
  }

  /** Record the exit, then drop the process from the live pool. */
  private async supervise(
    entry: ManagedProcess,
    handles: FileHandle[]
  ): Promise<void> {
    try {
      await this.reap(entry, handles);
    } finally {
      this.pool.delete(entry);
      const { id } = entry.record;
      if (id !== undefined && this.byId.get(id) === entry) {
        this.byId.delete(id);
      }
    }
  }

  private async reap(
    entry: ManagedProcess,
    handles: FileHandle[]
  ): Promise<void> {
    const { record } = entry;
    try {
      const result = await entry.child;
      record.exitCode = result.exitCode ?? undefined;
      await streamsClosed(entry.child);
    } catch (error) {
      this.logger.error(record.label, `Failed: ${errorMessage(error)}`);
    } finally {
      record.exitedAt = new Date();
      entry.logger?.flush();
      await closeAll(handles);
    }

    if (record.state !== "running") {
      log(`${record.label} ${record.state}`);
      return;
    }
    record.state = "exited";
    if (record.exitCode === 0) {
      this.logger.success(`Completed: ${record.label}`);
    } else {
      this.failures.push(record);
      this.logger.warn(
        `Failed: ${record.label} exited with code ${record.exitCode ?? "unknown"}`
      );
    }
  }

  private async openTarget(
    target: OutputTarget,
    opened: Map<string, FileHandle>
  ): Promise<Stdio> {
    if (target.kind === "print") {
      return "pipe";
    }
    const key = `${target.append ? "a" : "w"}:${target.path}`;
    const existing = opened.get(key);
    if (existing) {
      return existing.fd;
    }
    await mkdir(dirname(target.path), { recursive: true });
    const handle = await open(target.path, target.append ? "a" : "w");
    opened.set(key, handle);
    return handle.fd;
  }

  private async waitForSlot(): Promise<void> {
    while (this.limit > 0 && this.live().length >= this.limit) {
      log(`Pool full (${this.limit}), waiting for a slot`);
      await this.delay(
        undefined,
        Promise.race(this.live().map((entry) => entry.exited))
      );
      this.ensureRunning();
    }
  }

  /**
   * Resolves after `ms` (never, when undefined), when `until` settles or
   * when the run is aborted, whichever comes first.
   */
  private async delay(ms?: number, until?: Promise<unknown>): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const racers: Promise<unknown>[] = [this.abortSignal];
    if (until) {
      racers.push(until);
    }
    if (ms !== undefined) {
      racers.push(
        new Promise<void>((resolve) => {
          timer = setTimeout(resolve, ms);
        })
      );
    }
    try {
      await Promise.race(racers);
    } finally {
      clearTimeout(timer);
    }
  }

  private terminate(entry: ManagedProcess): void {
    entry.child.kill("SIGTERM", {
      forceKillAfterTimeout: SHUTDOWN_GRACE_PERIOD_MS,
    });
  }

  private live(): ManagedProcess[] {
    return Array.from(this.pool);
  }

  /** The live process holding `id`; undefined once it has been reaped. */
  private find(id: number): ManagedProcess | undefined {
    if (!this.spawnedIds.has(id)) {
      throw new ProcessNotFoundError(`No process was spawned with id ${id}`);
    }
    return this.byId.get(id);
  }

  private ensureRunning(): void {
    if (this.abortRequested) {
      throw new AbortError("Run aborted by signal");
    }
  }
}

/** Reason a child without a pid never started. */
async function launchFailure(child: ExecaChildProcess): Promise<string> {
  const reported = new Promise<string>((resolve) => {
    child.once("error", (error) => resolve(error.message));
  });
  try {
    await child;
  } catch (error) {
    return errorMessage(error);
  }
  return reported;
}

/** Piped output can still be in flight when the exit event fires. */
async function streamsClosed(child: ExecaChildProcess): Promise<void> {
  const streams = [child.stdout, child.stderr].filter(
    (stream): stream is Readable => stream !== null
  );
  await Promise.allSettled(streams.map((stream) => finished(stream)));
}

async function closeAll(handles: FileHandle[]): Promise<void> {
  const results = await Promise.allSettled(handles.map((h) => h.close()));
  for (const result of results) {
    if (result.status === "rejected") {
      log(`Failed to close output file: ${errorMessage(result.reason)}`);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
