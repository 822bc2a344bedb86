// src/cli/args.ts
// Minimal argv flag parsing shared by the operator scripts.

export type FlagType = "boolean" | "string";

export interface FlagDef {
  type: FlagType;
  alias?: string;
}

export type FlagSpec = Record<string, FlagDef>;

export interface ParsedFlags {
  /** True when the boolean flag was given */
  bool(name: string): boolean;
  /** Value of a string flag, undefined when absent */
  str(name: string): string | undefined;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Parse `--name`, `--name value`, `--name=value` and `-a` aliases.
 * Unknown flags and positional arguments are usage errors.
 */
export function parseFlags(argv: readonly string[], spec: FlagSpec): ParsedFlags {
  const values: Record<string, boolean | string | undefined> = {};
  const byName = new Map<string, [string, FlagDef]>();
  for (const [name, def] of Object.entries(spec)) {
    values[name] = def.type === "boolean" ? false : undefined;
    byName.set(`--${name}`, [name, def]);
    if (def.alias) byName.set(`-${def.alias}`, [name, def]);
  }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const key = eq === -1 ? arg : arg.slice(0, eq);
    const entry = byName.get(key);
    if (!entry) throw new UsageError(`Unknown argument: ${arg}`);
    const [name, def] = entry;

    if (def.type === "boolean") {
      if (eq !== -1) throw new UsageError(`Flag ${key} takes no value`);
      values[name] = true;
      continue;
    }
    const value = eq !== -1 ? arg.slice(eq + 1) : argv[++i];
    if (value === undefined || (eq === -1 && value.startsWith("-") && byName.has(value))) {
      throw new UsageError(`Flag ${key} requires a value`);
    }
    values[name] = value;
  }

  return {
    bool: (name) => values[name] === true,
    str: (name) => {
      const v = values[name];
      return typeof v === "string" ? v : undefined;
    },
  };
}

/** Positive integer flag value, or the fallback when absent. */
export function intFlag(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new UsageError(`--${name} must be a positive integer`);
  return n;
}
