export interface CliOptions {
  /** --config, else EFFECT_GATE_CONFIG; null means "look in cwd". */
  configPath: string | null;
  /** --server, else EFFECT_GATE_SERVER; null means "the only server in the file". */
  serverName: string | null;
  verbose: boolean;
  /** Validate the policy and exit without launching the backend. */
  check: boolean;
  help: boolean;
}

export type CliArgsResult =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

export const CLI_USAGE = `Usage: effect-gate --config <policy.yaml> --server <name> [--verbose] [--check]

MCP firewall relay: launches the backend MCP server named in the policy and serves it
over stdio, exposing and allowing only tools whose effects the policy permits.

Options:
  --config <path>   Policy file (.yaml, .yml or .json). Default: $EFFECT_GATE_CONFIG,
                    then effect-gate.yaml / effect-gate.yml / effect-gate.json in cwd
  --server <name>   Server entry to activate. Default: $EFFECT_GATE_SERVER, or the
                    only server in the policy file
  --verbose, -v     Debug logging (stderr)
  --check           Validate the policy, print the effective allowed effects, exit
  --help, -h        Show this help
`;

const VALUE_FLAGS = ["--config", "--server"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(flag: string): flag is ValueFlag {
  return VALUE_FLAGS.some((f) => f === flag);
}

/**
 * Parse argv (without node and script path). Flags accept `--flag value` and
 * `--flag=value`.
 */
export function parseCliArgs(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): CliArgsResult {
  const values: Partial<Record<ValueFlag, string>> = {};
  let verbose = false;
  let check = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;

    if (isValueFlag(flag)) {
      const value = flag === arg ? argv[++i] : arg.slice(eq + 1);
      if (value === undefined || value === "" || (flag === arg && value.startsWith("--"))) {
        return { ok: false, error: `${flag} requires a value` };
      }
      values[flag] = value;
    } else if (arg === "--verbose" || arg === "-v") {
      verbose = true;
    } else if (arg === "--check") {
      check = true;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    } else {
      return { ok: false, error: `Unknown argument: ${arg}` };
    }
  }

  return {
    ok: true,
    options: {
      configPath: values["--config"] ?? (env.EFFECT_GATE_CONFIG || null),
      serverName: values["--server"] ?? (env.EFFECT_GATE_SERVER || null),
      verbose,
      check,
      help,
    },
  };
}
