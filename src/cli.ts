// src/cli.ts
import { Command, InvalidArgumentError, Option } from "commander";
import packageJson from "../package.json";
import { costCommand } from "./commands/cost";
import { inspectCommand } from "./commands/inspect";
import { renameCommand } from "./commands/rename";
import type { CostOptions, RenameOptions } from "./types";

export function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new InvalidArgumentError("Must be a positive integer.");
	}
	return parsed;
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("screenshot-scribe")
		.version(packageJson.version)
		.description(
			"Describe screenshots with AI, embed the description in the PNG and rename the file after it.",
		);

	program
		.command("rename")
		.description("Describe, tag and rename every screenshot in a folder")
		.argument("<folder>", "Folder containing the screenshots")
		.addOption(
			new Option("--provider <name>", "API provider").choices(["openai", "ollama"]),
		)
		.addOption(
			new Option("--detail <value>", "What image resolution to use for inference").choices([
				"low",
				"high",
				"auto",
			]),
		)
		.option("--resize", "Send images at half width and height")
		.option("--no-resize", "Send images at full size")
		.option("--concurrency <n>", "Screenshots processed in parallel", parsePositiveInt)
		.option("--retries <n>", "Attempts per API call", parsePositiveInt)
		.option("--log-dir <dir>", "Where to write the audit log (default: the folder)")
		.option("--sort", "Process files in name order")
		.option("--watch", "Keep watching the folder for new screenshots")
		.option("--config <path>", "Path to a user config file")
		.action(async (folder: string, opts: RenameOptions) => {
			process.exitCode = await renameCommand(folder, opts);
		});

	program
		.command("cost")
		.description("Estimate, offline, what describing the screenshots would cost")
		.argument("<folder>", "Folder containing the screenshots")
		.option("-r, --recursive", "Include subfolders")
		.option("-o, --output <file>", "Path of the CSV report")
		.option("--config <path>", "Path to a user config file")
		.action(async (folder: string, opts: CostOptions) => {
			process.exitCode = await costCommand(folder, opts);
		});

	program
		.command("inspect")
		.description("Print the description stored in each PNG of a folder")
		.argument("<folder>", "Folder to inspect")
		.action(async (folder: string) => {
			process.exitCode = await inspectCommand(folder);
		});

	return program;
}
