import { enforcePolicy } from "../enforcer.js";
import { createConsoleLogger } from "../lib/logger.js";
import { PolicyShapeError } from "../policy/index.js";
import { HELP, PROGRAM_NAME, USAGE, parseArgs } from "./args.js";

export const VALID_MESSAGE = "Data is valid according to the policy.";
export const INVALID_MESSAGE = "Data does not conform to the defined policy.";

export type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  now?: () => Date;
};

const processIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

/** Runs one enforcement and resolves to the process exit code. */
export async function main(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  const parsed = parseArgs(argv);
  if (parsed.kind === "help") {
    io.stdout(HELP);
    return 0;
  }
  if (parsed.kind === "usage-error") {
    io.stderr(USAGE);
    io.stderr(`${PROGRAM_NAME}: error: ${parsed.message}`);
    return 2;
  }

  const { policyFile, dataFile, logLevel } = parsed.args;
  const logger = createConsoleLogger({ level: logLevel, write: io.stderr, now: io.now });

  try {
    const { conforms } = await enforcePolicy({ policyPath: policyFile, dataPath: dataFile, logger });
    if (conforms) {
      logger.info(VALID_MESSAGE);
      io.stdout(VALID_MESSAGE);
    } else {
      logger.warning(INVALID_MESSAGE);
      io.stdout(INVALID_MESSAGE);
    }
    return 0;
  } catch (err) {
    if (err instanceof PolicyShapeError) {
      logger.error(err.message);
      return 1;
    }
    logger.critical(`An unexpected error occurred: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
