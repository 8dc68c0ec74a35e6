export type ParsedArgs = {
  command: string;
  positional: string[];
  flags: Record<string, string | boolean>;
};

const ALIASES: Record<string, string> = {
  o: "output",
  a: "aspect",
  m: "model",
  p: "profile",
  c: "concurrent",
  h: "help"
};

const BOOLEAN_FLAGS = new Set(["help", "no-skip"]);

export function parseArgs(args: readonly string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    let key: string;

    if (arg.startsWith("--")) {
      const body = arg.slice(2);
      const eq = body.indexOf("=");
      if (eq >= 0) {
        flags[body.slice(0, eq)] = body.slice(eq + 1);
        continue;
      }
      key = body;
    } else if (arg.length > 1 && arg.startsWith("-")) {
      const short = arg.slice(1);
      key = ALIASES[short] ?? short;
    } else {
      positional.push(arg);
      continue;
    }

    if (BOOLEAN_FLAGS.has(key)) {
      flags[key] = true;
      continue;
    }
    const next = args[i + 1];
    if (next !== undefined && !next.startsWith("-")) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = true;
    }
  }

  return {
    command: positional[0] ?? "",
    positional: positional.slice(1),
    flags
  };
}
