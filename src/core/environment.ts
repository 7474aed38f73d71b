import { RedeclarationError, UndefinedVariableError } from "./errors";
import type { Value } from "./values";

type Binding = {
  value: Value;
  readonly: boolean;
};

export type DeclareOptions = {
  readonly?: boolean;
};

/**
 * Lexical scope chain. Each scope owns its bindings; lookups and
 * reassignments walk outwards to the nearest owner.
 */
export class Environment {
  private readonly bindings = new Map<string, Binding>();
  private readonly parent?: Environment;

  constructor(parent?: Environment) {
    this.parent = parent;
  }

  child(): Environment {
    return new Environment(this);
  }

  has(name: string): boolean {
    return this.find(name) !== undefined;
  }

  lookup(name: string): Value {
    const binding = this.find(name);
    if (!binding) {
      throw new UndefinedVariableError(name);
    }
    return binding.value;
  }

  declare(name: string, value: Value, options: DeclareOptions = {}): void {
    if (this.bindings.has(name)) {
      throw new RedeclarationError(
        `\`${name}\` is already declared in this scope; use \`:=\` to reassign it`
      );
    }
    this.bindings.set(name, { readonly: options.readonly ?? false, value });
  }

  assign(name: string, value: Value): void {
    const binding = this.find(name);
    if (!binding) {
      throw new UndefinedVariableError(name);
    }
    if (binding.readonly) {
      throw new RedeclarationError(`\`${name}\` is read-only`);
    }
    binding.value = value;
  }

  /** Every binding visible from this scope; inner scopes shadow outer ones. */
  visibleBindings(): Map<string, Value> {
    const inherited = this.parent?.visibleBindings() ?? new Map<string, Value>();
    for (const [name, binding] of this.bindings) {
      inherited.set(name, binding.value);
    }
    return inherited;
  }

  private find(name: string): Binding | undefined {
    return this.bindings.get(name) ?? this.parent?.find(name);
  }
}
