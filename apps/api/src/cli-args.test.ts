import { describe, expect, it } from "vitest";

import { parseCliArgs } from "./cli-args";

describe("parseCliArgs", () => {
  it("returns no overrides when no flags are given", () => {
    expect(parseCliArgs([])).toEqual({ kind: "run", overrides: {} });
  });

  it("maps every flag onto run overrides", () => {
    expect(parseCliArgs(["--live", "--rounds", "3", "--sleep", "0.5", "--amount", "0.02"])).toEqual({
      kind: "run",
      overrides: { dryRun: false, rounds: 3, sleepSeconds: 0.5, unitAmountSol: 0.02 }
    });
    expect(parseCliArgs(["--dry-run"])).toEqual({ kind: "run", overrides: { dryRun: true } });
  });

  it("shows help", () => {
    expect(parseCliArgs(["-h"])).toEqual({ kind: "help" });
  });

  it("rejects bad values", () => {
    expect(() => parseCliArgs(["--rounds", "many"])).toThrow('--rounds expects a number, got "many"');
    expect(() => parseCliArgs(["--rounds", "1.5"])).toThrow("rounds:");
    expect(() => parseCliArgs(["--dry-run", "--live"])).toThrow("--dry-run and --live cannot be combined");
    expect(() => parseCliArgs(["--turbo"])).toThrow();
  });
});
