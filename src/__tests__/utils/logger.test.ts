import {
  type MockInstance,
  beforeEach,
  describe,
  expect,
  it,
  vi,
} from "vitest";
import { Logger } from "../../utils/logger";

const ESCAPE_CHAR_CODE = 27;
const ESC = String.fromCharCode(ESCAPE_CHAR_CODE);
const ansiRegex = new RegExp(`${ESC}\\[[0-9;]*m`, "g");

function plain(text: unknown): string {
  return String(text).replace(ansiRegex, "");
}

describe("Logger", () => {
  let logger: Logger;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;
  let consoleWarnSpy: MockInstance<typeof console.warn>;

  beforeEach(() => {
    vi.restoreAllMocks();
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {
      // silence
    });
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {
      // silence
    });
    consoleWarnSpy = vi.spyOn(console, "warn").mockImplementation(() => {
      // silence
    });
    logger = new Logger();
  });

  describe("log", () => {
    it("logs with the process label as prefix", () => {
      logger.registerTask("server#1");
      logger.log("server#1", "listening");

      expect(plain(consoleLogSpy.mock.calls[0]?.[0])).toBe(
        "[server#1] | listening"
      );
    });

    it("respects quiet mode", () => {
      logger = new Logger({ quiet: true });
      logger.log("server#1", "listening");

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it("uses a custom prefix", () => {
      logger = new Logger({ prefix: ">" });
      logger.registerTask("server#1");
      logger.log("server#1", "listening");

      expect(plain(consoleLogSpy.mock.calls[0]?.[0])).toBe("> listening");
    });

    it("prints bare lines without a prefix", () => {
      logger = new Logger({ prefix: false });
      logger.log("server#1", "listening");

      expect(consoleLogSpy).toHaveBeenCalledWith("listening");
    });

    it("splits multiline output and skips blank lines", () => {
      logger = new Logger({ prefix: false });
      logger.log("server#1", "one\n\ntwo\nthree\n");

      expect(consoleLogSpy.mock.calls.map((call) => call[0])).toEqual([
        "one",
        "two",
        "three",
      ]);
    });

    it("pads prefixes so the separators line up", () => {
      logger.registerTask("a#1");
      logger.registerTask("client#2");

      logger.log("a#1", "x");
      logger.log("client#2", "y");

      expect(plain(consoleLogSpy.mock.calls[0]?.[0])).toBe("[a#1]      | x");
      expect(plain(consoleLogSpy.mock.calls[1]?.[0])).toBe("[client#2] | y");
    });
  });

  describe("error", () => {
    it("always shows errors, even in quiet mode", () => {
      logger = new Logger({ quiet: true });
      logger.error("server#1", "crashed");

      expect(plain(consoleErrorSpy.mock.calls[0]?.[0])).toBe(
        "[server#1] | crashed"
      );
    });
  });

  describe("status messages", () => {
    it("shows info and success messages", () => {
      logger.info("Running: server#1");
      logger.success("Completed: server#1");

      expect(plain(consoleLogSpy.mock.calls[0]?.[0])).toBe(
        "ℹ Running: server#1"
      );
      expect(plain(consoleLogSpy.mock.calls[1]?.[0])).toBe(
        "✓ Completed: server#1"
      );
    });

    it("hides info and success in quiet mode but keeps warnings", () => {
      logger = new Logger({ quiet: true });
      logger.info("Running");
      logger.success("Done");
      logger.warn("Careful");

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(plain(consoleWarnSpy.mock.calls[0]?.[0])).toBe("⚠ Careful");
    });

    it("prints values without decoration", () => {
      logger.print('["a", 1]');

      expect(consoleLogSpy).toHaveBeenCalledWith('["a", 1]');
    });

    it("shows loop progress unless quiet", () => {
      logger.progress("s 2/3 b.cfg");
      new Logger({ quiet: true }).progress("s 3/3 c.cfg");

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(plain(consoleLogSpy.mock.calls[0]?.[0])).toBe("↻ s 2/3 b.cfg");
    });

    it("reports failures on stderr", () => {
      logger.fail("Run failed");

      expect(plain(consoleErrorSpy.mock.calls[0]?.[0])).toBe("✗ Run failed");
    });
  });

  describe("TaskLogger", () => {
    it("logs through the parent with the task prefix", () => {
      const task = logger.createTaskLogger("worker#3");
      task.log("ready");

      expect(task.name).toBe("worker#3");
      expect(plain(consoleLogSpy.mock.calls[0]?.[0])).toBe("[worker#3] | ready");
    });

    it("respects the parent's quiet mode", () => {
      logger = new Logger({ quiet: true });
      logger.createTaskLogger("worker#3").log("ready");

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it("holds partial lines until they are complete", () => {
      logger = new Logger({ prefix: false });
      const task = logger.createTaskLogger("worker#3");

      task.write("stdout", "first\nsec");
      expect(consoleLogSpy.mock.calls.map((call) => call[0])).toEqual([
        "first",
      ]);

      task.write("stdout", "ond\n");
      expect(consoleLogSpy.mock.calls.map((call) => call[0])).toEqual([
        "first",
        "second",
      ]);
    });

    it("flushes trailing output per stream", () => {
      logger = new Logger({ prefix: false });
      const task = logger.createTaskLogger("worker#3");

      task.write("stdout", "no newline");
      task.write("stderr", "oops");
      expect(consoleLogSpy).not.toHaveBeenCalled();

      task.flush();
      expect(consoleLogSpy).toHaveBeenCalledWith("no newline");
      expect(plain(consoleErrorSpy.mock.calls[0]?.[0])).toBe("oops");

      task.flush();
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });
  });
});
