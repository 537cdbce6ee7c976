import { LOG_LEVELS, isLogLevel, type LogLevel } from "../lib/logger.js";

export const PROGRAM_NAME = "policy-enforcer";

export type CliArgs = {
  policyFile: string;
  dataFile: string;
  logLevel: LogLevel;
};

export type ParsedArgs =
  | { kind: "run"; args: CliArgs }
  | { kind: "help" }
  | { kind: "usage-error"; message: string };

const LEVEL_CHOICES = `{${LOG_LEVELS.join(",")}}`;

export const USAGE = `usage: ${PROGRAM_NAME} [-h] [--log_level ${LEVEL_CHOICES}] policy_file data_file`;

export const HELP = [
  USAGE,
  "",
  "Security Policy Enforcer. Validates system configurations against a defined policy.",
  "",
  "positional arguments:",
  "  policy_file           Path to the YAML/JSON policy file.",
  "  data_file             Path to the YAML/JSON data file containing system configuration,",
  "                        user settings, or application behavior.",
  "",
  "options:",
  "  -h, --help            show this help message and exit",
  `  --log_level ${LEVEL_CHOICES}`,
  `                        Set the logging level (${LOG_LEVELS.join(", ")}).`,
].join("\n");

/** Parses the arguments after the node and script paths. */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  let logLevel: LogLevel = "INFO";
  let optionsEnded = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (optionsEnded || !arg.startsWith("-") || arg === "-") {
      positionals.push(arg);
      continue;
    }
    if (arg === "--") {
      optionsEnded = true;
      continue;
    }
    if (arg === "-h" || arg === "--help") return { kind: "help" };

    if (arg === "--log_level" || arg.startsWith("--log_level=")) {
      const inline = arg.includes("=") ? arg.slice(arg.indexOf("=") + 1) : undefined;
      const value = inline ?? argv[i + 1];
      if (inline === undefined) i += 1;
      if (value === undefined || (inline === undefined && value.startsWith("-"))) {
        return { kind: "usage-error", message: "argument --log_level: expected one argument" };
      }
      if (!isLogLevel(value)) {
        return {
          kind: "usage-error",
          message: `argument --log_level: invalid choice: '${value}' (choose from ${LOG_LEVELS.map((l) => `'${l}'`).join(", ")})`,
        };
      }
      logLevel = value;
      continue;
    }
    return { kind: "usage-error", message: `unrecognized arguments: ${arg}` };
  }

  const [policyFile, dataFile, ...extra] = positionals;
  if (policyFile === undefined || dataFile === undefined) {
    const missing = policyFile === undefined ? "policy_file, data_file" : "data_file";
    return { kind: "usage-error", message: `the following arguments are required: ${missing}` };
  }
  if (extra.length > 0) return { kind: "usage-error", message: `unrecognized arguments: ${extra.join(" ")}` };
  return { kind: "run", args: { policyFile, dataFile, logLevel } };
}
