import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";

export const INPUT_DIR_ENV = "ADVENT_RUNNER_INPUT_DIR";
export const SOLUTIONS_DIR_ENV = "ADVENT_RUNNER_SOLUTIONS_DIR";

/** Earlier entries win when a day exists under more than one extension. */
export const MODULE_EXTENSIONS = [".ts", ".js"] as const;

export interface RunnerConfig {
	solutionsDir: string;
	inputDir: string;
	moduleExtensions: readonly string[];
}

export function defaultSolutionsDir(): string {
	return fileURLToPath(new URL("../solutions", import.meta.url));
}

export function resolveRunnerConfig(
	options: { inputDir?: string; solutionsDir?: string; cwd?: string } = {},
	env: NodeJS.ProcessEnv = process.env,
): RunnerConfig {
	const cwd = options.cwd ?? process.cwd();
	const solutionsDir =
		options.solutionsDir ?? nonEmpty(env[SOLUTIONS_DIR_ENV]) ?? defaultSolutionsDir();
	const inputDir = options.inputDir ?? nonEmpty(env[INPUT_DIR_ENV]) ?? cwd;

	return {
		solutionsDir: path.resolve(cwd, solutionsDir),
		inputDir: path.resolve(cwd, inputDir),
		moduleExtensions: MODULE_EXTENSIONS,
	};
}

function nonEmpty(value: string | undefined): string | undefined {
	const trimmed = value?.trim();
	return trimmed ? trimmed : undefined;
}
