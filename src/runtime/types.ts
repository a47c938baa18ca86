export const MIN_DAY = 1;
export const MAX_DAY = 25;

export interface DayDescriptor {
	readonly day: number;
	readonly title: string;
	readonly hasDefaultInput: boolean;
	readonly modulePath: string;
}

export interface Solver {
	solve(input: string, part2: boolean): string;
}

export type SolverRegistry = ReadonlyMap<number, Solver>;

export interface SolveRequest {
	day: number;
	part2: boolean;
	input: string;
}

/** Minimal view of the stream the resolver falls back to when nothing else is available. */
export type InputStream = NodeJS.ReadableStream & { isTTY?: boolean };

export interface PuzzleRunnerOptions {
	day?: number;
	part2?: boolean;
	file?: string;
	quiet?: boolean;
	list?: boolean;
	inputDir?: string;
	solutionsDir?: string;
	cwd?: string;
	env?: NodeJS.ProcessEnv;
	registry?: SolverRegistry;
	stdin?: NodeJS.ReadStream;
	stdout?: NodeJS.WriteStream;
	stderr?: NodeJS.WritableStream;
}

export interface PuzzleRunnerResult {
	exitCode: number;
}
