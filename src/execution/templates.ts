import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import debug from "debug";
import { Eta } from "eta";
import type { Environment } from "../core/environment";
import { RenderError, TypeMismatchError } from "../core/errors";
import type { BuildRequest } from "../core/evaluator";
import {
  type ArtifactValue,
  type PlainValue,
  type Value,
  artifactValue,
  cloneFields,
  describeKind,
  toPlain,
} from "../core/values";

const log = debug("procbed:templates");

export type TemplateDriverOptions = {
  /** Directories searched, in order, for relative template paths. */
  searchPaths: string[];
  /** Directory relative output paths are written under. */
  outputDir: string;
};

export class TemplateDriver {
  private readonly searchPaths: string[];
  private readonly outputDir: string;
  private readonly eta = new Eta({
    autoEscape: false,
    autoTrim: false,
    tags: ["{{", "}}"],
    useWith: true,
  });
  private readonly artifacts = new Map<string, ArtifactValue[]>();
  private current?: string;

  constructor(options: TemplateDriverOptions) {
    this.searchPaths = options.searchPaths;
    this.outputDir = options.outputDir;
    // include() partials resolve like build() templates
    this.eta.resolvePath = (template) => this.findTemplate(template);
  }

  begin(name: string): void {
    log(`Rendering template block ${name}`);
    this.current = name;
    this.artifacts.set(name, []);
  }

  yield(value: Value): void {
    if (value.kind !== "artifact") {
      throw new TypeMismatchError(
        `Only build() artifacts can be yielded, found ${describeKind(value)}`
      );
    }
    const list = this.current ? this.artifacts.get(this.current) : undefined;
    if (!list) {
      throw new TypeMismatchError("yield is only valid inside a template block");
    }
    list.push(value);
  }

  /** Finish the current block and return what it yielded, in order. */
  end(): ArtifactValue[] {
    const name = this.current;
    this.current = undefined;
    const yielded = name ? (this.artifacts.get(name) ?? []) : [];
    log(`Template block ${name ?? "?"} yielded ${yielded.length} artifact(s)`);
    return yielded;
  }

  /** Every artifact yielded so far, keyed by template block. */
  registry(): ReadonlyMap<string, readonly ArtifactValue[]> {
    return this.artifacts;
  }

  async build(request: BuildRequest, env: Environment): Promise<ArtifactValue> {
    const sourcePath = this.findTemplate(request.template);
    const outputPath = resolve(this.outputDir, request.output);
    log(`Building ${sourcePath} -> ${outputPath}`);

    let source: string;
    try {
      source = await readFile(sourcePath, "utf8");
    } catch (error) {
      throw new RenderError(
        `Cannot read template \`${sourcePath}\`: ${errorMessage(error)}`
      );
    }

    const data: Record<string, PlainValue> = {};
    for (const [name, value] of env.visibleBindings()) {
      data[name] = toPlain(value);
    }

    let rendered: string;
    try {
      rendered = this.eta.renderString(source, data);
    } catch (error) {
      throw new RenderError(
        `Template \`${request.template}\` -> \`${request.output}\` failed to render: ${errorMessage(error)}`
      );
    }

    try {
      await mkdir(dirname(outputPath), { recursive: true });
      await writeFile(outputPath, rendered);
    } catch (error) {
      throw new RenderError(
        `Template \`${request.template}\` -> \`${request.output}\` failed to save: ${errorMessage(error)}`
      );
    }

    return artifactValue(sourcePath, outputPath, cloneFields(request.properties));
  }

  private findTemplate(template: string): string {
    if (isAbsolute(template)) {
      return template;
    }
    for (const directory of this.searchPaths) {
      const candidate = resolve(directory, template);
      if (existsSync(candidate)) {
        return candidate;
      }
    }
    throw new RenderError(
      `Template \`${template}\` not found in ${this.searchPaths.join(", ")}`
    );
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
