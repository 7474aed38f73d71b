import { resolve } from "node:path";
import debug from "debug";
import type { CommandBlock } from "../core/ast";
import { type LoadedConfig, loadConfig } from "../core/config-loader";
import { Environment } from "../core/environment";
import { AbortError, ProcbedError } from "../core/errors";
import { Evaluator } from "../core/evaluator";
import { frozenList, stringValue } from "../core/values";
import type { RunOptions, RunSummary } from "../types";
import { Logger } from "../utils/logger";
import { DataLoader } from "./data-loader";
import { Interpreter } from "./interpreter";
import { LoopProgress } from "./progress";
import { ProcessScheduler } from "./scheduler";
import { TemplateDriver } from "./templates";

const log = debug("procbed:runner");

export const EXIT_FAILURE = 1;
export const EXIT_ABORTED = 130;

export class Runner {
  /**
   * Run a configuration and report failures on the console. Exits the
   * process with a non-zero status when the run fails.
   */
  async run(configPath: string, options: RunOptions = {}): Promise<void> {
    try {
      await this.execute(configPath, options);
    } catch (error) {
      const message =
        error instanceof ProcbedError
          ? error.describe()
          : error instanceof Error
            ? error.message
            : String(error);
      console.error("Error:", message);
      process.exit(error instanceof AbortError ? EXIT_ABORTED : EXIT_FAILURE);
    }
  }

  /** Run a configuration; failures are thrown. */
  async execute(configPath: string, options: RunOptions = {}): Promise<RunSummary> {
    const cwd = options.cwd ?? process.cwd();
    const config = await loadConfig(resolve(cwd, configPath));
    log(`Loaded ${config.files.length} file(s) from ${config.file}`);

    const logger = new Logger(options);
    const outputDir = resolveOutputDir(config, options, cwd);
    const loader = new DataLoader(config.baseDir);
    const evaluator = new Evaluator({ load: (path) => loader.load(path) });
    const progress = new LoopProgress({
      file:
        options.progressFile === undefined
          ? undefined
          : resolve(cwd, options.progressFile),
      logger,
    });
    const scheduler = new ProcessScheduler({
      bail: options.bail,
      env: options.env,
      logger,
      progress,
    });
    const templates = new TemplateDriver({
      outputDir,
      searchPaths: config.searchPaths,
    });

    const onSignal = () => scheduler.shutdown();
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);

    const env = new Environment();

    try {
      for (const [name, value] of Object.entries(options.variables ?? {})) {
        env.declare(name, stringValue(value));
      }

      const plain = new Interpreter({
        baseDir: config.baseDir,
        evaluator,
        logger,
      });
      for (const globals of config.globals) {
        await plain.run(globals.body, env, globals.file);
      }

      const rendering = new Interpreter({
        baseDir: config.baseDir,
        evaluator: evaluator.withServices({
          build: (request, scope) => templates.build(request, scope),
        }),
        logger,
        templates,
      });
      for (const block of config.templates) {
        templates.begin(block.name);
        await rendering.run(block.body, env, block.file);
        const yielded = templates.end();
        env.declare(block.name, frozenList([...yielded]), { readonly: true });
        logger.success(
          `Rendered [template.${block.name}]: ${yielded.length} artifact(s)`
        );
      }

      if (options.renderOnly) {
        log("Render-only run, skipping commands");
        return {
          artifacts: templates.registry(),
          processes: scheduler.records,
        };
      }

      const commanding = new Interpreter({
        baseDir: config.baseDir,
        evaluator,
        logger,
        progress,
        scheduler,
      });
      for (const block of selectBlocks(config, options.blocks)) {
        const label = block.name ? `[commands.${block.name}]` : "[commands]";
        logger.info(`Running ${label}`);
        scheduler.reset();
        await commanding.run(block.body, env, block.file);
        await scheduler.drain();
        if (scheduler.aborted) {
          throw new AbortError("Run aborted by signal");
        }
        scheduler.assertHealthy();
      }

      return {
        artifacts: templates.registry(),
        processes: scheduler.records,
      };
    } catch (error) {
      // stop whatever the failed run launched
      scheduler.shutdown();
      await scheduler.settled();
      throw error;
    } finally {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    }
  }
}

function resolveOutputDir(
  config: LoadedConfig,
  options: RunOptions,
  cwd: string
): string {
  if (options.output !== undefined) {
    return resolve(cwd, options.output);
  }
  return resolve(config.baseDir, config.output ?? ".");
}

function selectBlocks(
  config: LoadedConfig,
  names?: string[]
): CommandBlock[] {
  if (!names || names.length === 0) {
    return config.commands;
  }
  const known = new Set(config.commands.map((block) => block.name));
  const unknown = names.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new Error(`Unknown commands block(s): ${unknown.join(", ")}`);
  }
  return config.commands.filter(
    (block) => block.name !== undefined && names.includes(block.name)
  );
}
