import type { ParsedArgs } from "../types";

/**
 * Command-line parser for `procbed <file.bed> [flags]`. Unknown flags are
 * reported and ignored.
 */
export class ArgsParser {
  parse(args: string[]): ParsedArgs {
    const result: ParsedArgs = { help: false, options: {} };

    for (const arg of args) {
      this.processArg(arg, result);
    }

    return result;
  }

  private processArg(arg: string, result: ParsedArgs): void {
    if (arg.startsWith("--")) {
      this.processLongFlag(arg.substring(2), result);
    } else if (arg.startsWith("-") && arg.length > 1) {
      this.processShortFlags(arg.substring(1), result);
    } else if (result.file === undefined) {
      result.file = arg;
    } else {
      console.warn(`Ignoring extra argument: ${arg}`);
    }
  }

  private processLongFlag(flag: string, result: ParsedArgs): void {
    const { options } = result;
    const separator = flag.indexOf("=");
    const name = separator === -1 ? flag : flag.substring(0, separator);
    const value = separator === -1 ? undefined : flag.substring(separator + 1);

    switch (name) {
      case "quiet":
        options.quiet = true;
        break;
      case "bail":
        options.bail = true;
        break;
      case "no-prefix":
        options.prefix = false;
        break;
      case "render-only":
        options.renderOnly = true;
        break;
      case "help":
        result.help = true;
        break;
      case "prefix":
        options.prefix = value ?? true;
        break;
      case "output":
        options.output = this.requireValue(name, value);
        break;
      case "progress":
        options.progressFile = this.requireValue(name, value);
        break;
      case "commands":
        options.blocks = [
          ...(options.blocks ?? []),
          ...this.requireValue(name, value)
            .split(",")
            .map((block) => block.trim())
            .filter(Boolean),
        ];
        break;
      case "set":
        this.processVariable(this.requireValue(name, value), result);
        break;
      default:
        console.warn(`Unknown flag: --${flag}`);
    }
  }

  private processShortFlags(flags: string, result: ParsedArgs): void {
    for (const flag of flags) {
      if (flag === "q") {
        result.options.quiet = true;
      } else if (flag === "b") {
        result.options.bail = true;
      } else if (flag === "h") {
        result.help = true;
      } else {
        console.warn(`Unknown flag: -${flag}`);
      }
    }
  }

  private processVariable(assignment: string, result: ParsedArgs): void {
    const separator = assignment.indexOf("=");
    if (separator <= 0) {
      throw new Error(`--set expects <name>=<value>, got "${assignment}"`);
    }
    const name = assignment.substring(0, separator);
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
      throw new Error(`--set: "${name}" is not a valid variable name`);
    }
    result.options.variables = {
      ...result.options.variables,
      [name]: assignment.substring(separator + 1),
    };
  }

  private requireValue(flag: string, value: string | undefined): string {
    if (value === undefined || value === "") {
      throw new Error(`--${flag} requires a value (--${flag}=<value>)`);
    }
    return value;
  }
}

export function parseArgs(args: string[]): ParsedArgs {
  return new ArgsParser().parse(args);
}
