export { createProgram, parseCliArguments, parseDayOption } from "./runtime/cliProgram.js";
export {
	INPUT_DIR_ENV,
	MODULE_EXTENSIONS,
	SOLUTIONS_DIR_ENV,
	defaultSolutionsDir,
	resolveRunnerConfig,
	type RunnerConfig,
} from "./runtime/config.js";
export { parseDayModuleName, scanDays, type ScanDaysOptions } from "./runtime/dayScanner.js";
export { dispatch, isRegisteredDay } from "./runtime/dispatcher.js";
export {
	InputNotFoundError,
	PuzzleRunnerError,
	SolveFailedError,
	UnregisteredDayError,
	isPuzzleRunnerError,
	type PuzzleRunnerErrorCode,
} from "./runtime/errors.js";
export {
	defaultInputPath,
	resolveInput,
	trimTrailingNewline,
	type ResolveInputOptions,
} from "./runtime/inputResolver.js";
export {
	applyRunOutcome,
	createNavigationState,
	reduceNavigation,
	type NavigationEffect,
	type NavigationEvent,
	type NavigationOutput,
	type NavigationState,
	type NavigationTransition,
} from "./runtime/navigation.js";
export { runNavigationSession, type RunSolution } from "./runtime/navigationSession.js";
export {
	buildNavigationView,
	renderNavigationView,
	type NavigationView,
} from "./runtime/navigationView.js";
export { createSolutionRunner, runPuzzleRunner } from "./runtime/runPuzzleRunner.js";
export {
	createTerminalNavigator,
	decodeKey,
	decodeKeys,
	splitKeys,
	type NavigationTerminal,
} from "./runtime/terminalNavigator.js";
export { extractTitle, formatFallbackTitle } from "./runtime/titleExtractor.js";
export type {
	DayDescriptor,
	PuzzleRunnerOptions,
	PuzzleRunnerResult,
	SolveRequest,
	Solver,
	SolverRegistry,
} from "./runtime/types.js";
export { solvers } from "./solutions/index.js";
