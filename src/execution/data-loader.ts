import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import debug from "debug";
import * as yaml from "js-yaml";
import { LoadError } from "../core/errors";
import {
  type Value,
  booleanValue,
  integerValue,
  listValue,
  stringValue,
  structValue,
} from "../core/values";

const log = debug("procbed:loader");

/**
 * Reads YAML or JSON documents into language values. Relative paths resolve
 * against `baseDir`.
 */
export class DataLoader {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  async load(path: string): Promise<Value> {
    const file = resolve(this.baseDir, path);
    log(`Loading ${file}`);

    let text: string;
    try {
      text = await readFile(file, "utf8");
    } catch (error) {
      throw new LoadError(`Cannot read \`${path}\`: ${errorMessage(error)}`);
    }

    let document: unknown;
    try {
      document = yaml.load(text, { filename: file });
    } catch (error) {
      throw new LoadError(`Cannot parse \`${path}\`: ${errorMessage(error)}`);
    }

    return convert(document, path);
  }
}

export function convert(data: unknown, path: string): Value {
  if (typeof data === "string") {
    return stringValue(data);
  }
  if (typeof data === "boolean") {
    return booleanValue(data);
  }
  if (typeof data === "number") {
    return Number.isSafeInteger(data)
      ? integerValue(data)
      : stringValue(String(data));
  }
  if (Array.isArray(data)) {
    return listValue(data.map((item: unknown) => convert(item, path)));
  }
  if (data instanceof Date) {
    return stringValue(data.toISOString());
  }
  if (isRecord(data)) {
    const fields = new Map<string, Value>();
    for (const [key, value] of Object.entries(data)) {
      fields.set(key, convert(value, path));
    }
    const name = data.name;
    return structValue(typeof name === "string" ? name : "", fields);
  }
  throw new LoadError(`\`${path}\` contains an empty value`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
