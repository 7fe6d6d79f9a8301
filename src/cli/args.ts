import { ConfigurationError } from "../core/errors.js";
import { parsePollInterval, type ConfigLayer } from "../config/config.js";

const BOOLEAN_FLAGS = new Set(["help", "version", "log-json"]);
const VALUE_FLAGS = new Set(["config", "base-url", "token", "username", "password", "log-level", "poll-interval"]);

export interface CliArgs {
  help: boolean;
  version: boolean;
  config: ConfigLayer;
}

export function usage(): string {
  return [
    "usage:",
    "  platform-mcp [options]",
    "",
    "options:",
    "  --config <file>         YAML config file (default: ~/.platform-mcp.yaml)",
    "  --base-url <url>        platform API base URL",
    "  --token <token>         pre-issued bearer token",
    "  --username <name>       username for password login",
    "  --password <password>   password for password login",
    "  --log-level <level>     debug, info, warn or error (default: info)",
    "  --log-json              write logs as JSON lines",
    "  --poll-interval <secs>  analysis status poll interval (default: 5)",
    "  --version               print the version and exit",
    "  --help                  print this message and exit",
    ""
  ].join("\n");
}

export function parseArgs(argv: string[]): CliArgs {
  const values: Record<string, string> = {};
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new ConfigurationError(`unexpected arg: ${a}`);

    let key = a.slice(2);
    let inline: string | undefined;
    const eq = key.indexOf("=");
    if (eq !== -1) {
      inline = key.slice(eq + 1);
      key = key.slice(0, eq);
    }

    if (BOOLEAN_FLAGS.has(key)) {
      if (inline !== undefined) throw new ConfigurationError(`--${key} does not take a value`);
      flags.add(key);
      continue;
    }
    if (!VALUE_FLAGS.has(key)) throw new ConfigurationError(`unknown option: --${key}`);

    if (inline !== undefined) {
      values[key] = inline;
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) throw new ConfigurationError(`missing value for --${key}`);
    values[key] = next;
    i++;
  }

  return {
    help: flags.has("help"),
    version: flags.has("version"),
    config: {
      configFile: values["config"],
      baseUrl: values["base-url"],
      token: values["token"],
      username: values["username"],
      password: values["password"],
      logLevel: values["log-level"],
      logJson: flags.has("log-json") ? true : undefined,
      pollIntervalSeconds: parsePollInterval(values["poll-interval"], "--poll-interval")
    }
  };
}
