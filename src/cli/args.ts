export interface ParsedArgs {
  command: string | undefined;
  rest: string[];
  flags: Map<string, string>;
}

/**
 * Split argv into a command, its positional operands and `--name value`
 * flags. A flag with no value (end of argv or another flag next) is stored
 * as "true".
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      flags.set(arg.slice(2), next);
      i++;
    } else {
      flags.set(arg.slice(2), "true");
    }
  }

  const [command, ...rest] = positional;
  return { command, rest, flags };
}
