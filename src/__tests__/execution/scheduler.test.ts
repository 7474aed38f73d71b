import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  AbortError,
  ProcessFailedError,
  ProcessNotFoundError,
  SpawnError,
  TypeMismatchError,
} from "../../core/errors";
import { stringValue } from "../../core/values";
import { LoopProgress } from "../../execution/progress";
import {
  type OutputTarget,
  ProcessScheduler,
  type SpawnRequest,
} from "../../execution/scheduler";
import { Logger } from "../../utils/logger";

const NODE = process.execPath;
const LABEL = basename(NODE);

describe("ProcessScheduler", () => {
  let dir: string;
  let scheduler: ProcessScheduler;

  function script(
    source: string,
    options: { id?: number; stdout?: OutputTarget; stderr?: OutputTarget } = {}
  ): SpawnRequest {
    return {
      args: ["-e", source],
      cwd: dir,
      id: options.id,
      program: NODE,
      stderr: options.stderr ?? { kind: "print" },
      stdout: options.stdout ?? { kind: "print" },
    };
  }

  const LONG_RUNNING = "setTimeout(() => {}, 10000)";

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {
      // silence
    });
    vi.spyOn(console, "warn").mockImplementation(() => {
      // silence
    });
    vi.spyOn(console, "error").mockImplementation(() => {
      // silence
    });
    dir = await mkdtemp(join(tmpdir(), "procbed-scheduler-"));
    scheduler = new ProcessScheduler({ logger: new Logger({ prefix: false }) });
  });

  afterEach(async () => {
    scheduler.shutdown();
    await scheduler.settled();
    await rm(dir, { force: true, recursive: true });
    vi.restoreAllMocks();
  });

  describe("spawn", () => {
    it("runs a process and records its exit", async () => {
      const record = await scheduler.spawn(script("process.exit(0)"));

      expect(record).toMatchObject({
        command: [NODE, "-e", "process.exit(0)"],
        label: `${LABEL}#1`,
        serial: 1,
        state: "running",
      });
      expect(record.pid).toEqual(expect.any(Number));

      await scheduler.drain();

      expect(record.state).toBe("exited");
      expect(record.exitCode).toBe(0);
      expect(record.exitedAt).toBeInstanceOf(Date);
      expect(scheduler.liveCount).toBe(0);
    });

    it("prints process output line by line", async () => {
      await scheduler.spawn(
        script('process.stdout.write("one\\ntwo"); console.error("oops")')
      );
      await scheduler.drain();

      await vi.waitFor(() => {
        expect(console.log).toHaveBeenCalledWith("one");
        expect(console.log).toHaveBeenCalledWith("two");
        expect(console.error).toHaveBeenCalledWith(
          expect.stringContaining("oops")
        );
      });
    });

    it("passes the environment to the process", async () => {
      const withEnv = new ProcessScheduler({
        env: { PROCBED_TEST_VALUE: "test-value" },
        logger: new Logger({ prefix: false }),
      });

      await withEnv.spawn(
        script("console.log(process.env.PROCBED_TEST_VALUE)")
      );
      await withEnv.drain();

      await vi.waitFor(() => {
        expect(console.log).toHaveBeenCalledWith("test-value");
      });
    });

    it("appends to or truncates output files", async () => {
      const appendLog = join(dir, "logs", "append.log");
      const createLog = join(dir, "create.log");
      await writeFile(createLog, "old\n");

      await scheduler.spawn(
        script('console.log("a"); console.error("b")', {
          stderr: { append: true, kind: "file", path: appendLog },
          stdout: { append: true, kind: "file", path: appendLog },
        })
      );
      await scheduler.spawn(
        script('console.log("c")', {
          stdout: { append: false, kind: "file", path: createLog },
        })
      );
      await scheduler.drain();

      expect(await readFile(appendLog, "utf8")).toBe("a\nb\n");
      expect(await readFile(createLog, "utf8")).toBe("c\n");
    });

    it("reports programs that cannot be launched", async () => {
      const failure = scheduler.spawn({
        ...script(""),
        program: join(dir, "missing-binary"),
      });

      await expect(failure).rejects.toBeInstanceOf(SpawnError);
      await expect(failure).rejects.toThrow(
        `Cannot launch \`${join(dir, "missing-binary")}\``
      );
    });

    it("saves loop progress before each launch", async () => {
      const file = join(dir, "progress", "loops.txt");
      const progress = new LoopProgress({
        file,
        logger: new Logger({ quiet: true }),
      });
      const tracked = new ProcessScheduler({
        logger: new Logger({ prefix: false }),
        progress,
      });
      progress.enter(["n"], [2]);
      progress.advance([{ index: 1, value: stringValue("beta") }]);

      await tracked.spawn(script("process.exit(0)"));
      await tracked.drain();

      expect(await readFile(file, "utf8")).toBe("n 2/2 beta\n");
    });

    it("refuses an id that a running process still holds", async () => {
      await scheduler.spawn(script(LONG_RUNNING, { id: 1 }));

      await expect(scheduler.spawn(script("", { id: 1 }))).rejects.toThrow(
        `Process id 1 is still in use by ${LABEL}#1`
      );
    });
  });

  describe("limit", () => {
    it("waits for a free slot before launching", async () => {
      scheduler.setLimit(1);

      const first = await scheduler.spawn(
        script("setTimeout(() => {}, 100)")
      );
      await scheduler.spawn(script("process.exit(0)"));

      expect(first.state).toBe("exited");
      expect(scheduler.liveCount).toBeLessThanOrEqual(1);
    });

    it("rejects negative limits", () => {
      expect(() => scheduler.setLimit(-1)).toThrow(
        new TypeMismatchError("limit must be a non-negative integer, found -1")
      );
    });

    it("goes back to unbounded on reset", async () => {
      scheduler.setLimit(1);
      scheduler.reset();

      await scheduler.spawn(script(LONG_RUNNING));
      await scheduler.spawn(script(LONG_RUNNING));

      expect(scheduler.liveCount).toBe(2);
    });
  });

  describe("waiting", () => {
    it("times out wait_all and keeps the processes tracked", async () => {
      const record = await scheduler.spawn(
        script("setTimeout(() => {}, 500)")
      );

      expect(await scheduler.waitAll(50)).toEqual({
        kind: "timeout",
        pending: 1,
      });
      expect(scheduler.liveCount).toBe(1);
      expect(console.warn).toHaveBeenCalledWith(
        expect.stringContaining(
          "wait_all timed out after 50ms with 1 process(es) still running"
        )
      );

      expect(await scheduler.waitAll()).toEqual({ kind: "completed" });
      expect(record.state).toBe("exited");
      expect(record.exitCode).toBe(0);
      expect(scheduler.liveCount).toBe(0);
    });

    it("completes wait_all once everything exits", async () => {
      await scheduler.spawn(script("process.exit(0)"));

      expect(await scheduler.waitAll(5000)).toEqual({ kind: "completed" });
    });

    it("waits for a single process", async () => {
      const record = await scheduler.spawn(script("process.exit(0)", { id: 3 }));

      expect(await scheduler.waitFor(3)).toEqual({ kind: "completed" });
      expect(record.state).toBe("exited");
    });

    it("kills a process that outlives its wait_for timeout", async () => {
      const record = await scheduler.spawn(script(LONG_RUNNING, { id: 2 }));

      expect(
        await scheduler.waitFor(2, { durationMs: 100, polls: 4 })
      ).toEqual({ kind: "timeout", pending: 1 });
      expect(record.state).toBe("timed-out");
      expect(scheduler.liveCount).toBe(0);
    });

    it("frees reaped processes and their ids but keeps the records", async () => {
      for (let id = 1; id <= 4; id++) {
        await scheduler.spawn(script("process.exit(0)", { id }));
      }
      await scheduler.drain();

      expect(scheduler.liveCount).toBe(0);
      expect(
        scheduler.records.map((record) => [record.id, record.state])
      ).toEqual([
        [1, "exited"],
        [2, "exited"],
        [3, "exited"],
        [4, "exited"],
      ]);
      expect(await scheduler.waitFor(3)).toEqual({ kind: "completed" });
      expect(
        await scheduler.waitFor(3, { durationMs: 100, polls: 2 })
      ).toEqual({ kind: "completed" });
      await expect(scheduler.kill(3)).resolves.toBeUndefined();

      const reused = await scheduler.spawn(script("process.exit(0)", { id: 3 }));
      expect(reused.serial).toBe(5);
      expect(scheduler.records).toHaveLength(5);
    });

    it("reports unknown process ids", async () => {
      await expect(scheduler.waitFor(9)).rejects.toThrow(
        new ProcessNotFoundError("No process was spawned with id 9")
      );
      await expect(scheduler.kill(9)).rejects.toThrow(ProcessNotFoundError);
    });

    it("sleeps", async () => {
      await expect(scheduler.sleep(10)).resolves.toBeUndefined();
    });
  });

  describe("kill", () => {
    it("stops a running process without counting it as failed", async () => {
      const bailing = new ProcessScheduler({
        bail: true,
        logger: new Logger({ prefix: false }),
      });
      const record = await bailing.spawn(script(LONG_RUNNING, { id: 5 }));

      await bailing.kill(5);

      expect(record.state).toBe("killed");
      expect(bailing.liveCount).toBe(0);
      expect(() => bailing.assertHealthy()).not.toThrow();
    });
  });

  describe("failures", () => {
    it("warns about non-zero exits and carries on by default", async () => {
      await scheduler.spawn(script("process.exit(3)"));
      await scheduler.drain();

      expect(scheduler.records[0]?.exitCode).toBe(3);
      expect(console.warn).toHaveBeenCalledWith(
        expect.stringContaining(`Failed: ${LABEL}#1 exited with code 3`)
      );
      expect(() => scheduler.assertHealthy()).not.toThrow();
    });

    it("raises on the first failure with bail", async () => {
      const bailing = new ProcessScheduler({
        bail: true,
        logger: new Logger({ prefix: false }),
      });
      await bailing.spawn(script("process.exit(3)"));
      await bailing.drain();

      expect(() => bailing.assertHealthy()).toThrow(
        new ProcessFailedError(`${LABEL}#1 exited with code 3`)
      );
    });
  });

  describe("shutdown", () => {
    it("stops live processes and refuses further work", async () => {
      const record = await scheduler.spawn(script(LONG_RUNNING));

      scheduler.shutdown();
      await scheduler.settled();

      expect(scheduler.aborted).toBe(true);
      expect(record.state).toBe("killed");
      await expect(scheduler.spawn(script(""))).rejects.toThrow(AbortError);
      await expect(scheduler.sleep(10)).rejects.toThrow(
        "Run aborted by signal"
      );
    });

    it("wakes a pending wait_all", async () => {
      await scheduler.spawn(script(LONG_RUNNING));

      const waiting = scheduler.waitAll();
      scheduler.shutdown();

      await expect(waiting).rejects.toThrow(AbortError);
    });
  });
});
