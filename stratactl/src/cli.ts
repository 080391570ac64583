#!/usr/bin/env node

import { Command, Option } from "commander";
import { validateAll } from "./commands/validate.js";
import { run } from "./commands/run.js";
import { sync } from "./commands/sync.js";
import { cliExitCode, EXIT } from "./commands/exit-codes.js";
import type { OutputFormat } from "./core/diagnostics.js";
import type { ConfigOverrides, LinkMode } from "./types/config.js";

type BuildFlags = {
  project?: string;
  config?: string;
  env?: string;
  frozen?: boolean;
  dev: boolean;
  compileBytecode?: boolean;
  linkMode?: LinkMode;
  format: OutputFormat;
};

function overridesFrom(flags: BuildFlags, extra: Partial<ConfigOverrides> = {}): ConfigOverrides {
  return {
    frozen: flags.frozen,
    no_dev: flags.dev === false ? true : undefined,
    compile_bytecode: flags.compileBytecode,
    link_mode: flags.linkMode,
    ...extra,
  };
}

function withBuildOptions(cmd: Command): Command {
  return cmd
    .option("--project <dir>", "Project root (default: current directory)")
    .option("--config <dir>", "Config directory (default: bundled config)")
    .option("--env <name>", "Config layer loaded over base.yaml, e.g. container")
    .option("--frozen", "Require the lockfile to satisfy the manifest exactly")
    .option("--no-frozen", "Replay the lockfile even if it is out of date")
    .option("--no-dev", "Exclude development-only dependencies")
    .option("--compile-bytecode", "Precompile installed modules after install")
    .addOption(new Option("--link-mode <mode>", "How artifacts enter the environment").choices(["copy", "hardlink"]))
    .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"));
}

/** Exit code for the first validation error. */
function validateExitCode(code: string | undefined): number {
  switch (code) {
    case "LOCK_MISMATCH":
      return EXIT.LOCK_MISMATCH;
    case "INTEGRITY_ERROR":
      return EXIT.INTEGRITY_ERROR;
    case "SOURCE_MISSING":
    case "SOURCE_READ_FAILED":
      return EXIT.INSTALL_IO_ERROR;
    default:
      return EXIT.CONFIG_MISSING;
  }
}

const program = new Command();

program
  .name("stratactl")
  .description("Build an isolated environment from a frozen lockfile and launch an application in it")
  .version("0.1.0")
  .enablePositionalOptions()
  .exitOverride();

withBuildOptions(
  program
    .command("run")
    .description("Sync the environment, then run the entrypoint inside it")
    .argument("<entrypoint>", "Script (.js/.mjs/.cjs) or command on the environment PATH")
    .argument("[args...]", "Arguments passed to the entrypoint")
    .passThroughOptions(),
)
  .option("--no-sync", "Launch without checking or installing anything")
  .action(async (entrypoint: string, args: string[], opts: BuildFlags & { sync: boolean }) => {
    const res = await run({
      entrypoint,
      args,
      project: opts.project,
      configDir: opts.config,
      envName: opts.env,
      format: opts.format,
      overrides: overridesFrom(opts, { no_sync: opts.sync === false ? true : undefined }),
      forwardSignals: ["SIGINT", "SIGTERM", "SIGHUP"],
    });
    process.exit(res.exitCode);
  });

withBuildOptions(
  program
    .command("sync")
    .description("Build the environment without launching anything"),
)
  .option("--no-install-project", "Install dependencies only, leaving the project itself out")
  .action(async (opts: BuildFlags & { installProject: boolean }) => {
    const res = await sync({
      project: opts.project,
      configDir: opts.config,
      envName: opts.env,
      format: opts.format,
      overrides: overridesFrom(opts),
      installProject: opts.installProject,
    });
    process.exit(res.exitCode);
  });

program
  .command("validate")
  .description("Validate config, manifest, lockfile and package sources without writing")
  .option("--project <dir>", "Project root (default: current directory)")
  .option("--config <dir>", "Config directory (default: bundled config)")
  .option("--env <name>", "Config layer loaded over base.yaml")
  .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"))
  .action(async (opts: { project?: string; config?: string; env?: string; format: OutputFormat }) => {
    const res = await validateAll({ project: opts.project, configDir: opts.config, envName: opts.env });

    const all = res.ok ? res.warnings : [...res.errors, ...res.warnings];
    for (const d of all) {
      if (opts.format === "jsonl") process.stdout.write(JSON.stringify(d) + "\n");
      else console.error(`${d.level}: ${d.message}`);
    }

    if (!res.ok) process.exit(validateExitCode(res.errors[0]?.code));

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const code = cliExitCode(err);
  // commander has already printed usage errors, help and version
  if (code === EXIT.UNEXPECTED) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(JSON.stringify({ level: "error", code: "UNEXPECTED", message }) + "\n");
  }
  process.exit(code);
});
