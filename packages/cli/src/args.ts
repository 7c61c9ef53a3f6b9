export type Flags = Record<string, string | boolean>;

const SHORT_FLAGS: Record<string, string> = {
  "-f": "file",
  "-o": "output",
  "-d": "directory",
  "-od": "output-directory",
  "-t": "text",
  "-c": "config",
  "-p": "port"
};

const SHORT_SWITCHES: Record<string, string> = {
  "-h": "help",
  "-q": "quiet",
  "-v": "verbose"
};

// Long switches that never take a value.
const BOOLEAN_FLAGS = new Set(["json", "quiet", "verbose", "help"]);

export function parseArgs(argv: string[]): { flags: Flags; positional: string[] } {
  const flags: Flags = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const trimmed = arg.slice(2);
      const eq = trimmed.indexOf("=");
      if (eq !== -1) {
        flags[trimmed.slice(0, eq)] = trimmed.slice(eq + 1);
        continue;
      }

      const next = argv[i + 1];
      if (!BOOLEAN_FLAGS.has(trimmed) && next !== undefined && !next.startsWith("-")) {
        flags[trimmed] = next;
        i += 1;
      } else {
        flags[trimmed] = true;
      }
      continue;
    }

    if (arg.startsWith("-") && arg.length > 1) {
      const switchName = SHORT_SWITCHES[arg];
      if (switchName) {
        flags[switchName] = true;
        continue;
      }
      const name = SHORT_FLAGS[arg];
      if (!name) continue;
      // Short value flags always consume the next argument, so `-t` can carry any source text.
      const next = argv[i + 1];
      if (next !== undefined) {
        flags[name] = next;
        i += 1;
      } else {
        flags[name] = true;
      }
      continue;
    }

    positional.push(arg);
  }

  return { flags, positional };
}

export function getFlag(flags: Flags, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = flags[name];
    if (typeof value === "string") return value;
  }
  return undefined;
}

export function parseNumber(value?: string): number | undefined {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function isHelp(command: string | undefined, flags: Flags): boolean {
  if (!command) return true;
  if (command === "help" || command === "--help" || command === "-h") return true;
  return flags.help === true;
}
