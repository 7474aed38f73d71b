import { IndexOutOfRangeError, TypeMismatchError } from "./errors";

export type StringValue = { kind: "string"; value: string };
export type IntegerValue = { kind: "integer"; value: number };
export type BooleanValue = { kind: "boolean"; value: boolean };
export type ListValue = {
  kind: "list";
  items: Value[];
  /** Set on template artifact lists; no access path may push to them. */
  frozen?: true;
};
/** Half-open integer sequence: `start` included, `end` excluded, either direction. */
export type RangeValue = { kind: "range"; start: number; end: number };
export type StructValue = {
  kind: "struct";
  name: string;
  fields: Map<string, Value>;
};
export type ArtifactValue = {
  readonly kind: "artifact";
  readonly sourcePath: string;
  readonly outputPath: string;
  readonly properties: ReadonlyMap<string, Value>;
};

export type Value =
  | StringValue
  | IntegerValue
  | BooleanValue
  | ListValue
  | RangeValue
  | StructValue
  | ArtifactValue;

export type ValueKind = Value["kind"];

export function stringValue(value: string): StringValue {
  return { kind: "string", value };
}

export function integerValue(value: number): IntegerValue {
  return { kind: "integer", value };
}

export function booleanValue(value: boolean): BooleanValue {
  return { kind: "boolean", value };
}

export function listValue(items: Value[] = []): ListValue {
  return { items, kind: "list" };
}

/** A list that refuses `push` however it is reached. */
export function frozenList(items: Value[]): ListValue {
  return { frozen: true, items, kind: "list" };
}

export function rangeValue(start: number, end: number): RangeValue {
  return { end, kind: "range", start };
}

export function structValue(
  name: string,
  fields: Map<string, Value> = new Map()
): StructValue {
  return { fields, kind: "struct", name };
}

export function artifactValue(
  sourcePath: string,
  outputPath: string,
  properties: ReadonlyMap<string, Value> = new Map()
): ArtifactValue {
  return Object.freeze({
    kind: "artifact",
    outputPath,
    properties,
    sourcePath,
  });
}

// ── Ranges ────────────────────────────────────────────────────────

export function rangeLength(range: RangeValue): number {
  return Math.abs(range.end - range.start);
}

export function rangeAt(range: RangeValue, index: number): number {
  const step = range.end >= range.start ? 1 : -1;
  return range.start + index * step;
}

export function* iterateRange(range: RangeValue): Generator<number> {
  const length = rangeLength(range);
  for (let i = 0; i < length; i++) {
    yield rangeAt(range, i);
  }
}

// ── Sequences ─────────────────────────────────────────────────────

/** Number of elements a list or range yields; `undefined` for non-sequences. */
export function sequenceLength(value: Value): number | undefined {
  if (value.kind === "list") {
    return value.items.length;
  }
  if (value.kind === "range") {
    return rangeLength(value);
  }
  return undefined;
}

/**
 * Element `index` of a list (the stored value, not a copy) or range.
 */
export function elementAt(value: Value, index: number): Value {
  const length = sequenceLength(value);
  if (length === undefined) {
    throw new TypeMismatchError(`Cannot index into ${describeKind(value)}`);
  }
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new IndexOutOfRangeError(
      `Index ${index} is out of range for ${describeKind(value)} of length ${length}`
    );
  }
  if (value.kind === "range") {
    return integerValue(rangeAt(value, index));
  }
  const item = value.items[index];
  if (item === undefined) {
    throw new IndexOutOfRangeError(`Index ${index} is out of range`);
  }
  return item;
}

export function toSequence(value: Value): Value[] {
  switch (value.kind) {
    case "list":
      return value.items;
    case "range":
      return Array.from(iterateRange(value), integerValue);
    default:
      throw new TypeMismatchError(
        `Cannot iterate over ${describeKind(value)}; expected a list or range`
      );
  }
}

// ── Conversions ───────────────────────────────────────────────────

export function describeKind(value: Value): string {
  switch (value.kind) {
    case "string":
      return "a string";
    case "integer":
      return "an integer";
    case "boolean":
      return "a boolean";
    case "list":
      return "a list";
    case "range":
      return "a range";
    case "struct":
      return `struct "${value.name}"`;
    case "artifact":
      return "an artifact";
    default: {
      const exhaustive: never = value;
      return String(exhaustive);
    }
  }
}

/**
 * Text used for interpolation and process arguments. Structs stand in for
 * their name and artifacts for the file they rendered.
 */
export function stringify(value: Value): string {
  switch (value.kind) {
    case "string":
      return value.value;
    case "integer":
      return String(value.value);
    case "boolean":
      return value.value ? "true" : "false";
    case "struct":
      return value.name;
    case "artifact":
      return value.outputPath;
    case "list":
    case "range":
      throw new TypeMismatchError(
        `Cannot use ${describeKind(value)} as text`
      );
    default: {
      const exhaustive: never = value;
      return String(exhaustive);
    }
  }
}

/** Integer literal semantics for counts, bounds and indices: integers or integer strings. */
export function toInteger(value: Value): number {
  if (value.kind === "integer") {
    return value.value;
  }
  if (value.kind === "string" && /^-?\d+$/.test(value.value.trim())) {
    return Number.parseInt(value.value, 10);
  }
  throw new TypeMismatchError(
    `Expected an integer, found ${describeKind(value)}`
  );
}

/**
 * Deep copy. The copy shares no list, struct or map with the original, and
 * copies of frozen lists can be pushed to.
 */
export function cloneValue(value: Value): Value {
  switch (value.kind) {
    case "string":
    case "integer":
    case "boolean":
    case "range":
      return { ...value };
    case "list":
      return listValue(value.items.map(cloneValue));
    case "struct":
      return structValue(value.name, cloneFields(value.fields));
    case "artifact":
      return artifactValue(
        value.sourcePath,
        value.outputPath,
        cloneFields(value.properties)
      );
    default: {
      const exhaustive: never = value;
      return exhaustive;
    }
  }
}

export function cloneFields(
  fields: ReadonlyMap<string, Value>
): Map<string, Value> {
  return new Map(
    Array.from(fields, ([name, field]) => [name, cloneValue(field)])
  );
}

function describeFields(fields: ReadonlyMap<string, Value>): string {
  if (fields.size === 0) {
    return "{}";
  }
  const entries = Array.from(
    fields,
    ([name, field]) => `${name} = ${describeValue(field)}`
  );
  return `{ ${entries.join(", ")} }`;
}

/** Human-readable rendering used by `print`. */
export function describeValue(value: Value): string {
  switch (value.kind) {
    case "string":
      return JSON.stringify(value.value);
    case "integer":
    case "boolean":
      return String(value.value);
    case "list":
      return `[${value.items.map(describeValue).join(", ")}]`;
    case "range":
      return `${value.start}..${value.end}`;
    case "struct":
      return `${JSON.stringify(value.name)} ${describeFields(value.fields)}`;
    case "artifact":
      return `build(${JSON.stringify(value.sourcePath)} -> ${JSON.stringify(
        value.outputPath
      )}) ${describeFields(value.properties)}`;
    default: {
      const exhaustive: never = value;
      return String(exhaustive);
    }
  }
}

export type PlainValue =
  | string
  | number
  | boolean
  | PlainValue[]
  | { [key: string]: PlainValue };

/**
 * Plain data handed to the template renderer. Structs and artifacts become
 * objects whose `toString()` yields the same text as {@link stringify}.
 */
export function toPlain(value: Value): PlainValue {
  switch (value.kind) {
    case "string":
    case "integer":
    case "boolean":
      return value.value;
    case "list":
      return value.items.map(toPlain);
    case "range":
      return Array.from(iterateRange(value));
    case "struct":
      return withText(
        { name: value.name, ...plainFields(value.fields) },
        value.name
      );
    case "artifact":
      return withText(
        {
          ...plainFields(value.properties),
          outputPath: value.outputPath,
          sourcePath: value.sourcePath,
        },
        value.outputPath
      );
    default: {
      const exhaustive: never = value;
      return String(exhaustive);
    }
  }
}

function plainFields(
  fields: ReadonlyMap<string, Value>
): Record<string, PlainValue> {
  const result: Record<string, PlainValue> = {};
  for (const [name, field] of fields) {
    result[name] = toPlain(field);
  }
  return result;
}

function withText(
  object: Record<string, PlainValue>,
  text: string
): Record<string, PlainValue> {
  Object.defineProperty(object, "toString", {
    enumerable: false,
    value: () => text,
  });
  return object;
}
