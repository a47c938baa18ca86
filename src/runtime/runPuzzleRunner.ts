import { intro, log, note, outro } from "@clack/prompts";
import chalk from "chalk";
import process from "node:process";
import { solvers } from "../solutions/index.js";
import { resolveRunnerConfig, type RunnerConfig } from "./config.js";
import { scanDays } from "./dayScanner.js";
import { dispatch, isRegisteredDay } from "./dispatcher.js";
import { isPuzzleRunnerError, toError, UnregisteredDayError } from "./errors.js";
import { resolveInput } from "./inputResolver.js";
import { runNavigationSession, type RunSolution } from "./navigationSession.js";
import { createTerminalNavigator } from "./terminalNavigator.js";
import type {
	DayDescriptor,
	InputStream,
	PuzzleRunnerOptions,
	PuzzleRunnerResult,
	SolverRegistry,
} from "./types.js";

export function createSolutionRunner(options: {
	registry: SolverRegistry;
	inputDir: string;
	stdin?: InputStream;
	explicitPath?: string;
}): RunSolution {
	return async (day, part2) => {
		if (!isRegisteredDay(options.registry, day)) {
			throw new UnregisteredDayError(day);
		}
		const input = await resolveInput({
			day,
			explicitPath: options.explicitPath,
			inputDir: options.inputDir,
			stdin: options.stdin,
		});
		return dispatch(options.registry, { day, part2, input });
	};
}

export async function runPuzzleRunner(
	options: PuzzleRunnerOptions = {},
): Promise<PuzzleRunnerResult> {
	const stdin = options.stdin ?? process.stdin;
	const stdout = options.stdout ?? process.stdout;
	const stderr = options.stderr ?? process.stderr;
	const registry = options.registry ?? solvers;
	const quiet = options.quiet ?? false;

	try {
		const config = resolveRunnerConfig(options, options.env);

		if (options.list) {
			const days = await scanDays({
				...config,
				onWarning: quiet ? undefined : (message) => log.warn(message),
			});
			printDayList(days, registry, { quiet, stdout });
			return { exitCode: 0 };
		}

		if (options.day === undefined) {
			if (options.part2 || options.file || options.quiet) {
				stderr.write("A day is required: pass --day <number> or run without arguments.\n");
				return { exitCode: 1 };
			}
			if (!(stdin.isTTY && stdout.isTTY)) {
				stderr.write("Interactive mode needs a terminal: pass --day <number> to run directly.\n");
				return { exitCode: 1 };
			}
			return await runInteractive(config, registry, { stdin, stdout });
		}

		const runSolution = createSolutionRunner({
			registry,
			inputDir: config.inputDir,
			stdin,
			explicitPath: options.file,
		});
		const part2 = options.part2 ?? false;

		try {
			const result = await runSolution(options.day, part2);
			if (quiet) {
				stdout.write(`${result}\n`);
			} else {
				await printDecoratedResult(config, options.day, part2, result);
			}
			return { exitCode: 0 };
		} catch (error) {
			if (isPuzzleRunnerError(error)) {
				stderr.write(`${error.message}\n`);
				return { exitCode: 1 };
			}
			throw error;
		}
	} catch (error) {
		handleFatalError(toError(error), "Puzzle runner failed");
		return { exitCode: 1 };
	}
}

async function runInteractive(
	config: RunnerConfig,
	registry: SolverRegistry,
	streams: { stdin: NodeJS.ReadStream; stdout: NodeJS.WriteStream },
): Promise<PuzzleRunnerResult> {
	const days = await scanDays({
		...config,
		onWarning: (message) => log.warn(message),
	});
	await runNavigationSession({
		days,
		terminal: createTerminalNavigator(streams),
		runSolution: createSolutionRunner({
			registry,
			inputDir: config.inputDir,
			stdin: streams.stdin,
		}),
	});
	outro(chalk.dim("Bye."));
	return { exitCode: 0 };
}

async function printDecoratedResult(
	config: RunnerConfig,
	day: number,
	part2: boolean,
	result: string,
): Promise<void> {
	const days = await scanDays({ ...config, onWarning: (message) => log.warn(message) });
	const descriptor = days.find((entry) => entry.day === day);
	const heading = descriptor ? `Day ${day}: ${descriptor.title}` : `Day ${day}`;

	intro(chalk.cyan("Advent Runner"));
	note(result, `${heading} (part ${part2 ? 2 : 1})`);
	outro(chalk.green("Done."));
}

function printDayList(
	days: readonly DayDescriptor[],
	registry: SolverRegistry,
	{ quiet, stdout }: { quiet: boolean; stdout: NodeJS.WritableStream },
): void {
	if (quiet) {
		for (const day of days) {
			stdout.write(`${day.day}\t${day.title}\t${day.hasDefaultInput ? "input" : "-"}\n`);
		}
		return;
	}

	intro(chalk.cyan("Advent Runner"));
	if (days.length === 0) {
		log.warn("No day modules were found.");
	} else {
		const lines = days.map((day) => {
			const flags = [
				day.hasDefaultInput ? chalk.green(`day${day.day}.txt`) : chalk.dim("no input file"),
				isRegisteredDay(registry, day.day) ? undefined : chalk.yellow("not registered"),
			].filter((flag): flag is string => flag !== undefined);
			return `${chalk.bold(String(day.day).padStart(2))}  ${day.title}  ${flags.join(", ")}`;
		});
		note(lines.join("\n"), "Discovered days");
	}
	outro(`${days.length} day${days.length === 1 ? "" : "s"} found.`);
}

function handleFatalError(error: Error, message: string) {
	log.error(`${message}: ${error.message}`);
	outro(chalk.red("Runner exited with errors."));
}
