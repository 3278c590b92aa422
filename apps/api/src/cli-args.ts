import { parseArgs } from "node:util";

import type { RunOverrides } from "@ore-miner/shared";
import { RunOverridesSchema } from "@ore-miner/shared";

export const USAGE = `Usage: ore-miner [--dry-run | --live] [--rounds N] [--sleep SECONDS] [--amount SOL]

  --dry-run        log deployments without sending transactions
  --live           send deployments to the network
  --rounds N       stop after N rounds (0 runs until interrupted)
  --sleep SECONDS  pause between rounds
  --amount SOL     SOL deployed per tile
  --help           show this message`;

export type CliCommand = { kind: "help" } | { kind: "run"; overrides: RunOverrides };

function toNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new Error(`--${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

/**
 * Flags override config.json and the environment. Unset flags leave them alone.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      "dry-run": { type: "boolean" },
      live: { type: "boolean" },
      rounds: { type: "string" },
      sleep: { type: "string" },
      amount: { type: "string" },
      help: { type: "boolean", short: "h" }
    }
  });

  if (values.help) {
    return { kind: "help" };
  }
  if (values["dry-run"] && values.live) {
    throw new Error("--dry-run and --live cannot be combined");
  }

  const dryRun = values["dry-run"] ? true : values.live ? false : undefined;
  const parsed = RunOverridesSchema.safeParse({
    dryRun,
    rounds: toNumber("rounds", values.rounds),
    sleepSeconds: toNumber("sleep", values.sleep),
    unitAmountSol: toNumber("amount", values.amount)
  });
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "));
  }

  const overrides: RunOverrides = {};
  if (parsed.data.dryRun !== undefined) overrides.dryRun = parsed.data.dryRun;
  if (parsed.data.rounds !== undefined) overrides.rounds = parsed.data.rounds;
  if (parsed.data.sleepSeconds !== undefined) overrides.sleepSeconds = parsed.data.sleepSeconds;
  if (parsed.data.unitAmountSol !== undefined) overrides.unitAmountSol = parsed.data.unitAmountSol;
  return { kind: "run", overrides };
}
