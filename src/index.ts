#!/usr/bin/env node

import { Command } from "commander";
import { ConfigError } from "./lib/config.js";
import { isPipelineError } from "./types/errors.js";
import { printPipelineError, type StageCommandOptions } from "./commands/context.js";

const program = new Command();

// Global config option
let globalConfigPath: string | undefined;

interface StageFlags {
  arch?: string;
  format?: string;
}

function stageOptions(flags: StageFlags): StageCommandOptions {
  return { config: globalConfigPath, arch: flags.arch, format: flags.format };
}

function handleCommandError(error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
    process.exit(1);
  }
  if (isPipelineError(error)) {
    printPipelineError(error);
    process.exit(1);
  }
  throw error;
}

program
  .name("bundlesmith")
  .description("Release packaging: per-architecture builds, universal merge, icons and distributable images")
  .version("0.4.0")
  .option("-c, --config <path>", "Path to bundlesmith.json")
  .hook("preAction", (thisCommand) => {
    globalConfigPath = thisCommand.opts().config;
  });

program
  .command("all", { isDefault: true })
  .description("Run every stage: prerequisites, build, merge, icon, package, verify")
  .option("-a, --arch <selector>", "native, universal, or a comma-separated list")
  .option("-f, --format <format>", "dmg, appimage or archive")
  .option("--report <path>", "Write the run report as JSON")
  .option("--json", "Print the run report as JSON")
  .action(async (options) => {
    try {
      const { allCommand } = await import("./commands/all.js");
      const code = await allCommand({ ...stageOptions(options), report: options.report, json: options.json });
      process.exitCode = code;
    } catch (error) {
      handleCommandError(error);
    }
  });

program
  .command("doctor")
  .description("Check the tools and inputs the pipeline needs")
  .option("-a, --arch <selector>", "native, universal, or a comma-separated list")
  .option("-f, --format <format>", "dmg, appimage or archive")
  .option("--json", "Output in JSON format")
  .action(async (options) => {
    try {
      const { doctorCommand } = await import("./commands/doctor.js");
      process.exitCode = await doctorCommand({ ...stageOptions(options), json: options.json });
    } catch (error) {
      handleCommandError(error);
    }
  });

program
  .command("build")
  .description("Clean the workspace and build every selected architecture")
  .option("-a, --arch <selector>", "native, universal, or a comma-separated list")
  .action(async (options) => {
    try {
      const { buildCommand } = await import("./commands/build.js");
      await buildCommand(stageOptions(options));
    } catch (error) {
      handleCommandError(error);
    }
  });

program
  .command("merge")
  .description("Merge the per-architecture builds into a universal bundle")
  .option("-a, --arch <selector>", "native, universal, or a comma-separated list")
  .action(async (options) => {
    try {
      const { mergeCommand } = await import("./commands/merge.js");
      await mergeCommand(stageOptions(options));
    } catch (error) {
      handleCommandError(error);
    }
  });

program
  .command("icon")
  .description("Render the master icon into an icon set")
  .action(async (options) => {
    try {
      const { iconCommand } = await import("./commands/icon.js");
      await iconCommand(stageOptions(options));
    } catch (error) {
      handleCommandError(error);
    }
  });

program
  .command("package")
  .description("Assemble the distributable from the built bundle")
  .option("-a, --arch <selector>", "native, universal, or a comma-separated list")
  .option("-f, --format <format>", "dmg, appimage or archive")
  .action(async (options) => {
    try {
      const { packageCommand } = await import("./commands/package.js");
      await packageCommand(stageOptions(options));
    } catch (error) {
      handleCommandError(error);
    }
  });

program
  .command("verify [path]")
  .description("Inspect an installed or built bundle")
  .option("--json", "Output in JSON format")
  .action(async (path: string | undefined, options) => {
    try {
      const { verifyCommand } = await import("./commands/verify.js");
      process.exitCode = await verifyCommand(path, { ...stageOptions(options), json: options.json });
    } catch (error) {
      handleCommandError(error);
    }
  });

program
  .command("debug [path]")
  .description("Inspect a bundle and relaunch it interactively")
  .action(async (path: string | undefined, options) => {
    try {
      const { debugCommand } = await import("./commands/debug.js");
      await debugCommand(path, stageOptions(options));
    } catch (error) {
      handleCommandError(error);
    }
  });

export async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
