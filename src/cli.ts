import { parseArgs } from "node:util";
import { scenarios } from "./scenarios/index.js";

/** Output streams of a CLI run. */
export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

const USAGE = "Usage: run-scenario <name> [--time-limit <seconds>] [--solution-limit <n>]";

/**
 * Runs a built-in scenario by name and writes its report to `io.out`.
 * Returns the process exit code.
 */
export async function runCli(args: string[], io: CliIo): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      "time-limit": { type: "string" },
      "solution-limit": { type: "string" },
    },
  });

  const [name] = positionals;
  const scenario = name === undefined ? undefined : scenarios[name];
  if (!scenario) {
    io.err(name === undefined ? USAGE : `Unknown scenario "${name}"`);
    io.err(`Available scenarios: ${Object.keys(scenarios).join(", ")}`);
    return 1;
  }

  const timeLimitSeconds = parsePositive(values["time-limit"]);
  const solutionLimit = parsePositive(values["solution-limit"], true);
  if (timeLimitSeconds === null || solutionLimit === null) {
    io.err(USAGE);
    return 1;
  }

  const report = await scenario.run({}, { timeLimitSeconds, solutionLimit });
  for (const line of report.lines) io.out(line);
  return 0;
}

/** `undefined` when absent, `null` when not a positive number. */
function parsePositive(value: string | undefined, integer = false): number | undefined | null {
  if (value === undefined) return undefined;
  const n = Number(value);
  const valid = integer ? Number.isInteger(n) : Number.isFinite(n);
  return valid && n > 0 ? n : null;
}
