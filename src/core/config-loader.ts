import { readFile, readdir, stat } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import debug from "debug";
import micromatch from "micromatch";
import type { CommandBlock, ConfigUnit, Statement, TemplateBlock } from "./ast";
import { IncludeError, ParseError } from "./errors";
import { parseConfig } from "./parser";

const log = debug("procbed:config");

export type GlobalsBlock = {
  file?: string;
  body: Statement[];
};

/** A root `.bed` file with every include resolved and spliced in. */
export type LoadedConfig = {
  file: string;
  baseDir: string;
  /** `[output]` of the root file, relative to `baseDir`. */
  output?: string;
  /** Include directories in order, then `baseDir`. */
  searchPaths: string[];
  globals: GlobalsBlock[];
  templates: TemplateBlock[];
  commands: CommandBlock[];
  /** Every file read, in load order. */
  files: string[];
};

type Accumulator = {
  searchPaths: string[];
  globals: GlobalsBlock[];
  templates: TemplateBlock[];
  commands: CommandBlock[];
  files: string[];
};

export class ConfigLoader {
  private readonly loading: string[] = [];
  private readonly loaded = new Set<string>();

  async load(path: string): Promise<LoadedConfig> {
    const file = resolve(path);
    const acc: Accumulator = {
      commands: [],
      files: [],
      globals: [],
      searchPaths: [],
      templates: [],
    };
    const root = await this.loadFile(file, acc);

    if (acc.commands.length === 0) {
      const error = new ParseError(
        "Configuration has no [commands] section",
        { column: 1, line: 1, offset: 0 }
      );
      error.file = file;
      throw error;
    }
    assertUniqueNames(acc.templates, "template");
    assertUniqueNames(acc.commands, "commands");

    const baseDir = dirname(file);
    return {
      ...acc,
      baseDir,
      file,
      output: root.output,
      searchPaths: [...acc.searchPaths, baseDir],
    };
  }

  private async loadFile(file: string, acc: Accumulator): Promise<ConfigUnit> {
    if (this.loading.includes(file)) {
      const chain = [...this.loading, file].join(" -> ");
      throw new IncludeError(`Include cycle: ${chain}`);
    }

    let source: string;
    try {
      source = await readFile(file, "utf8");
    } catch (error) {
      throw new IncludeError(
        `Cannot read \`${file}\`: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    log(`Loading ${file}`);
    this.loading.push(file);
    this.loaded.add(file);
    acc.files.push(file);

    const unit = parseConfig(source, file);
    const directory = dirname(file);
    for (const include of unit.includes) {
      for (const target of await this.expand(include, directory, file)) {
        if (target.kind === "directory") {
          log(`Template search path ${target.path}`);
          acc.searchPaths.push(target.path);
        } else if (this.loaded.has(target.path) && !this.loading.includes(target.path)) {
          log(`Skipping ${target.path}, already included`);
        } else {
          await this.loadFile(target.path, acc);
        }
      }
    }

    this.loading.pop();
    if (unit.globals.length > 0) {
      acc.globals.push({ body: unit.globals, file });
    }
    acc.templates.push(...unit.templates);
    acc.commands.push(...unit.commands);
    return unit;
  }

  private async expand(
    include: string,
    directory: string,
    from: string
  ): Promise<{ kind: "file" | "directory"; path: string }[]> {
    const scan = micromatch.scan(include);
    if (!scan.isGlob) {
      const path = resolve(directory, include);
      const kind = await entryKind(path);
      if (!kind) {
        throw new IncludeError(`Include \`${include}\` in \`${from}\` does not exist`);
      }
      return [{ kind, path }];
    }

    const base = resolve(directory, scan.base);
    let entries: string[];
    try {
      entries = await readdir(base, { recursive: true });
    } catch {
      log(`Glob base ${base} is not readable; \`${include}\` matches nothing`);
      return [];
    }

    const matches = micromatch(entries.map(toPosix), scan.glob).sort();
    const files: { kind: "file"; path: string }[] = [];
    for (const match of matches) {
      const path = join(base, match);
      if ((await entryKind(path)) === "file") {
        files.push({ kind: "file", path });
      }
    }
    log(`\`${include}\` matched ${files.length} file(s)`);
    return files;
  }
}

export function loadConfig(path: string): Promise<LoadedConfig> {
  return new ConfigLoader().load(path);
}

async function entryKind(path: string): Promise<"file" | "directory" | undefined> {
  try {
    const info = await stat(path);
    return info.isDirectory() ? "directory" : "file";
  } catch {
    return undefined;
  }
}

function toPosix(path: string): string {
  return path.split("\\").join("/");
}

function assertUniqueNames(
  blocks: { name?: string; file?: string }[],
  kind: "template" | "commands"
): void {
  const seen = new Map<string, string | undefined>();
  for (const block of blocks) {
    if (block.name === undefined) {
      continue;
    }
    if (seen.has(block.name)) {
      throw new IncludeError(
        `[${kind}.${block.name}] is defined in both \`${seen.get(block.name) ?? "?"}\` and \`${block.file ?? "?"}\``
      );
    }
    seen.set(block.name, block.file);
  }
}
