export type ArgumentType = "string" | "int" | "boolean";
export type ArgumentValue = string | number | boolean;
export type ParsedArgs = Record<string, ArgumentValue | undefined>;

export interface ArgumentOptions {
  dest: string;
  /** Environment variable consulted when the flag is not on the command line. */
  envVar?: string;
  defaultValue?: ArgumentValue;
  type?: ArgumentType;
  help?: string;
}

export interface ArgumentSpec extends ArgumentOptions {
  flags: string[];
}

export interface ParseOutcome {
  values: ParsedArgs;
  rest: string[];
}

export class ArgumentError extends Error {
  constructor(readonly dest: string, message: string) {
    super(message);
    this.name = "ArgumentError";
  }
}

const TRUE_VALUES = new Set(["true", "1", "yes", "y", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "n", "off"]);

function coerce(spec: ArgumentSpec, raw: string, source: string): ArgumentValue {
  switch (spec.type ?? "string") {
    case "int": {
      const trimmed = raw.trim();
      if (!/^[-+]?\d+$/.test(trimmed)) {
        throw new ArgumentError(
          spec.dest,
          `${source} expects an integer for "${spec.dest}", got "${raw}".`
        );
      }
      return Number.parseInt(trimmed, 10);
    }
    case "boolean": {
      const lowered = raw.trim().toLowerCase();
      if (TRUE_VALUES.has(lowered)) return true;
      if (FALSE_VALUES.has(lowered)) return false;
      throw new ArgumentError(
        spec.dest,
        `${source} expects true/false for "${spec.dest}", got "${raw}".`
      );
    }
    default:
      return raw;
  }
}

// "--flag=value" carries its value inline; any other token is a bare word.
function splitToken(token: string): { flag: string; inlineValue?: string } {
  const eq = token.startsWith("--") ? token.indexOf("=") : -1;
  if (eq <= 0) return { flag: token };
  return { flag: token.slice(0, eq), inlineValue: token.slice(eq + 1) };
}

/**
 * Named set of command-line arguments, each optionally bound to an
 * environment variable. Precedence: command line, environment, default.
 */
export class ArgumentGroup {
  private readonly specs: ArgumentSpec[] = [];
  private readonly specsByFlag = new Map<string, ArgumentSpec>();

  constructor(readonly title: string) {}

  addArgument(flags: string[], options: ArgumentOptions): this {
    if (!flags.length) {
      throw new ArgumentError(options.dest, `Argument "${options.dest}" needs at least one flag.`);
    }
    const spec: ArgumentSpec = { ...options, flags };
    for (const flag of flags) {
      if (this.specsByFlag.has(flag)) {
        throw new ArgumentError(options.dest, `Flag ${flag} is already defined in ${this.title}.`);
      }
      this.specsByFlag.set(flag, spec);
    }
    this.specs.push(spec);
    return this;
  }

  list(): ArgumentSpec[] {
    return [...this.specs];
  }

  parse(argv: string[], env: NodeJS.ProcessEnv = {}): ParseOutcome {
    const fromCli = new Map<string, string>();
    const rest: string[] = [];

    for (let i = 0; i < argv.length; i++) {
      const token = argv[i];
      const { flag, inlineValue } = splitToken(token);
      const spec = this.specsByFlag.get(flag);
      if (!spec) {
        rest.push(token);
        continue;
      }

      if (inlineValue !== undefined) {
        fromCli.set(spec.dest, inlineValue);
        continue;
      }

      const next = argv[i + 1];
      if (next === undefined || this.specsByFlag.has(splitToken(next).flag)) {
        throw new ArgumentError(spec.dest, `Flag ${flag} expects a value.`);
      }
      fromCli.set(spec.dest, next);
      i++;
    }

    const values: ParsedArgs = {};
    for (const spec of this.specs) {
      const cli = fromCli.get(spec.dest);
      if (cli !== undefined) {
        values[spec.dest] = coerce(spec, cli, spec.flags[spec.flags.length - 1]);
        continue;
      }

      const envValue = spec.envVar ? env[spec.envVar] : undefined;
      if (spec.envVar && envValue !== undefined) {
        values[spec.dest] = coerce(spec, envValue, `$${spec.envVar}`);
        continue;
      }

      values[spec.dest] = spec.defaultValue;
    }

    return { values, rest };
  }

  helpText(): string {
    const lines = [`${this.title}:`];
    for (const spec of this.specs) {
      const details: string[] = [];
      if (spec.envVar) details.push(`env: ${spec.envVar}`);
      if (spec.defaultValue !== undefined) details.push(`default: ${JSON.stringify(spec.defaultValue)}`);
      const suffix = details.length ? ` (${details.join(", ")})` : "";
      const help = spec.help ? `  ${spec.help}` : "";
      lines.push(`  ${spec.flags.join(", ")}${help}${suffix}`);
    }
    return lines.join("\n");
  }
}
