export type PuzzleRunnerErrorCode =
	| "INPUT_NOT_FOUND"
	| "UNREGISTERED_DAY"
	| "SOLVE_FAILED";

export class PuzzleRunnerError extends Error {
	readonly code: PuzzleRunnerErrorCode;
	readonly day: number;

	constructor(
		code: PuzzleRunnerErrorCode,
		day: number,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
		this.day = day;
	}
}

export class InputNotFoundError extends PuzzleRunnerError {
	readonly path?: string;

	constructor(day: number, path?: string, options?: { cause?: unknown }) {
		super(
			"INPUT_NOT_FOUND",
			day,
			path
				? `Input file ${path} for day ${day} could not be read`
				: `No input for day ${day}: pass --file, add day${day}.txt or pipe it on stdin`,
			options,
		);
		this.path = path;
	}
}

export class UnregisteredDayError extends PuzzleRunnerError {
	constructor(day: number) {
		super("UNREGISTERED_DAY", day, `Day ${day} not implemented yet`);
	}
}

export class SolveFailedError extends PuzzleRunnerError {
	constructor(day: number, part2: boolean, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(
			"SOLVE_FAILED",
			day,
			`Day ${day} part ${part2 ? 2 : 1} failed: ${reason}`,
			{ cause },
		);
	}
}

export function isPuzzleRunnerError(error: unknown): error is PuzzleRunnerError {
	return error instanceof PuzzleRunnerError;
}

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
