export interface ParsedArgs {
  flags: Record<string, string | boolean>;
  positionals: string[];
}

/** `--key value` pairs, bare `--switch` flags, and everything else as positionals in order. */
export function parseArgs(argv: string[], booleanFlags: string[] = []): ParsedArgs {
  const switches = new Set(booleanFlags);
  const flags: Record<string, string | boolean> = {};
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }

    const body = token.slice(2);
    const equalsAt = body.indexOf("=");
    if (equalsAt > 0) {
      flags[body.slice(0, equalsAt)] = body.slice(equalsAt + 1);
      continue;
    }

    const next = argv[i + 1];
    if (switches.has(body) || next === undefined || next.startsWith("--")) {
      flags[body] = true;
      continue;
    }

    flags[body] = next;
    i += 1;
  }

  return { flags, positionals };
}

export function requireArg(flags: Record<string, string | boolean>, key: string): string {
  const value = flags[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new Error(`Missing required argument --${key}`);
  }
  return value;
}

export function optionalArg(flags: Record<string, string | boolean>, key: string): string | null {
  const value = flags[key];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

export function parsePositiveInt(value: string | boolean | undefined, key: string, fallback: number): number {
  if (typeof value !== "string") {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid --${key} value. Use a positive integer.`);
  }
  return parsed;
}
