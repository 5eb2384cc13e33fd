import { describe, expect, it } from "vitest";
import { getHelpText, parseCliArgs } from "../src/cli";

describe("parseCliArgs", () => {
  it("parses a command with its options", () => {
    expect(parseCliArgs(["extract", "--dry-run", "--config", "config.json"])).toEqual({
      command: "extract",
      dryRun: true,
      ignoreHttpsErrors: false,
      configPath: "config.json",
      calendarPath: undefined,
    });
  });

  it("reads the calendar path for seed", () => {
    const parsed = parseCliArgs(["seed", "--calendar", "calendar.csv", "--ignore-https-errors"]);
    expect(parsed).toMatchObject({ command: "seed", calendarPath: "calendar.csv", ignoreHttpsErrors: true });
  });

  it("falls back to help", () => {
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["crawl"])).toBe("help");
    expect(parseCliArgs(["merge", "--help"])).toBe("help");
    expect(parseCliArgs(["seed"])).toBe("help");
  });

  it("accepts --dry-run only for extract", () => {
    expect(parseCliArgs(["run", "--dry-run"])).toBe("help");
    expect(parseCliArgs(["merge", "--dry-run"])).toBe("help");
    expect(parseCliArgs(["extract", "--dry-run"])).toMatchObject({ command: "extract", dryRun: true });
  });

  it("lists every command in the help text", () => {
    const help = getHelpText();
    for (const command of ["extract", "merge", "run", "status", "seed"]) {
      expect(help).toMatch(new RegExp(`^  ${command} `, "m"));
    }
  });
});
