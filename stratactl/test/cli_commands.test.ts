import { Command, CommanderError, Option } from "commander";
import { afterEach, describe, expect, it, vi } from "vitest";
import { cliExitCode, EXIT, exitCodeFor } from "../src/commands/exit-codes.js";
import { bootstrapFailure, CollectingReporter, createReporter, diag } from "../src/core/diagnostics.js";
import { BootstrapError, errnoCode, isBootstrapError, toInstallIOError } from "../src/core/errors.js";

describe("exit-codes", () => {
  it("defines all required exit codes", () => {
    expect(EXIT.SUCCESS).toBe(0);
    expect(EXIT.INVALID_ARGS).toBe(64);
    expect(EXIT.LOCK_MISMATCH).toBe(65);
    expect(EXIT.LAUNCH_ERROR).toBe(69);
    expect(EXIT.UNEXPECTED).toBe(70);
    expect(EXIT.INSTALL_IO_ERROR).toBe(74);
    expect(EXIT.INTEGRITY_ERROR).toBe(76);
    expect(EXIT.CONFIG_MISSING).toBe(78);
  });

  it("gives every bootstrap error its own code", () => {
    const codes = (["CONFIG_MISSING", "LOCK_MISMATCH", "INTEGRITY_ERROR", "INSTALL_IO_ERROR", "LAUNCH_ERROR"] as const).map(exitCodeFor);
    expect(new Set(codes).size).toBe(5);
    expect(codes).not.toContain(0);
  });
});

describe("cli exit codes", () => {
  function parser(): Command {
    return new Command()
      .exitOverride()
      .configureOutput({ writeOut: () => {}, writeErr: () => {} })
      .version("0.1.0")
      .addOption(new Option("--link-mode <mode>").choices(["copy", "hardlink"]));
  }

  function parseError(argv: string[]): unknown {
    try {
      parser().parse(argv, { from: "user" });
    } catch (e) {
      return e;
    }
    return null;
  }

  it("maps an invalid option choice to INVALID_ARGS", () => {
    const err = parseError(["--link-mode", "symlink"]);
    expect(err).toBeInstanceOf(CommanderError);
    expect(cliExitCode(err)).toBe(64);
  });

  it("maps an unknown option to INVALID_ARGS", () => {
    expect(cliExitCode(parseError(["--frozen-ish"]))).toBe(EXIT.INVALID_ARGS);
  });

  it("lets version output exit cleanly", () => {
    expect(cliExitCode(parseError(["--version"]))).toBe(EXIT.SUCCESS);
  });

  it("treats anything else as UNEXPECTED", () => {
    expect(cliExitCode(new Error("boom"))).toBe(EXIT.UNEXPECTED);
  });
});

describe("errors", () => {
  it("passes bootstrap errors through the IO wrapper", () => {
    const original = new BootstrapError("INTEGRITY_ERROR", "digest differs");
    expect(toInstallIOError(original, "Install failed")).toBe(original);
  });

  it("wraps filesystem failures with their errno", () => {
    const eacces = Object.assign(new Error("permission denied"), { code: "EACCES" });
    const wrapped = toInstallIOError(eacces, "Cannot write env");

    expect(isBootstrapError(wrapped)).toBe(true);
    expect(wrapped.code).toBe("INSTALL_IO_ERROR");
    expect(wrapped.message).toBe("Cannot write env: permission denied");
    expect(wrapped.details).toEqual({ errno: "EACCES" });
    expect(wrapped.cause).toBe(eacces);
  });

  it("reads errno codes only when they are strings", () => {
    expect(errnoCode({ code: "ENOENT" })).toBe("ENOENT");
    expect(errnoCode({ code: 2 })).toBeUndefined();
    expect(errnoCode(null)).toBeUndefined();
  });
});

describe("diagnostics", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("tags bootstrap failures with their phase", () => {
    const d = bootstrapFailure(new BootstrapError("LOCK_MISMATCH", "stale lockfile", { details: { count: 2 } }));
    expect(d).toEqual({
      level: "error",
      code: "LOCK_MISMATCH",
      message: "stale lockfile",
      details: { phase: "bootstrap", count: 2 },
    });
  });

  it("writes one JSON object per line in jsonl mode", () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    createReporter("jsonl").report(diag("info", "LAYER_OK", "dependencies ok"));
    expect(write).toHaveBeenCalledWith('{"level":"info","code":"LAYER_OK","message":"dependencies ok"}\n');
  });

  it("writes human lines to stderr with a level prefix", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const reporter = createReporter("human");
    reporter.report(diag("warn", "BIN_CONFLICT", "Command x replaced"));
    reporter.report(diag("info", "LAUNCH_OK", "launch OK"));
    expect(write.mock.calls.map((c) => c[0])).toEqual(["warn: Command x replaced\n", "launch OK\n"]);
  });

  it("collects diagnostics in memory", () => {
    const reporter = new CollectingReporter();
    reporter.report(diag("warn", "CACHE_FETCH_FAILED", "miss"));
    expect(reporter.codes()).toEqual(["CACHE_FETCH_FAILED"]);
  });
});
