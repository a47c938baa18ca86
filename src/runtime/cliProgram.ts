import { Command, InvalidArgumentError } from "commander";
import type { PuzzleRunnerOptions } from "./types.js";

type CliFlags = {
	day?: number;
	part2: boolean;
	file?: string;
	quiet: boolean;
	list: boolean;
	inputDir?: string;
};

export function parseDayOption(value: string): number {
	const trimmed = value.trim();
	const day = Number(trimmed);
	if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(day) || day < 1) {
		throw new InvalidArgumentError("Day must be a positive integer.");
	}
	return day;
}

export function createProgram(version: string): Command {
	return new Command()
		.name("advent-runner")
		.description(
			"Run daily puzzle solutions. Without arguments, browse the discovered days interactively.",
		)
		.version(version)
		.option("-d, --day <number>", "day to run", parseDayOption)
		.option("-2, --part2", "run part 2 of the puzzle", false)
		.option("-f, --file <path>", "input file (defaults to day<N>.txt, then stdin)")
		.option("-q, --quiet", "print only the result", false)
		.option("-l, --list", "list the discovered days and exit", false)
		.option("--input-dir <dir>", "directory holding the day<N>.txt input files");
}

/** Parses user arguments (without the node and script entries). */
export function parseCliArguments(program: Command, args: readonly string[]): PuzzleRunnerOptions {
	program.parse([...args], { from: "user" });
	const flags = program.opts<CliFlags>();
	return {
		day: flags.day,
		part2: flags.part2,
		file: flags.file,
		quiet: flags.quiet,
		list: flags.list,
		inputDir: flags.inputDir,
	};
}
