import { toError } from "./errors.js";
import {
	applyRunOutcome,
	createNavigationState,
	reduceNavigation,
	type NavigationOutput,
	type NavigationState,
} from "./navigation.js";
import { buildNavigationView } from "./navigationView.js";
import type { NavigationTerminal } from "./terminalNavigator.js";
import type { DayDescriptor } from "./types.js";

export type RunSolution = (day: number, part2: boolean) => Promise<string>;

export interface NavigationSessionOptions {
	days: readonly DayDescriptor[];
	terminal: NavigationTerminal;
	runSolution: RunSolution;
}

/**
 * Drives the day/part screens until a quit event. Each key is reduced and any
 * run it triggers finishes before the next key is read.
 */
export async function runNavigationSession({
	days,
	terminal,
	runSolution,
}: NavigationSessionOptions): Promise<NavigationState> {
	let state: NavigationState = createNavigationState(days);

	try {
		while (true) {
			const event = await terminal.read(buildNavigationView(state));
			const transition = reduceNavigation(state, event);
			state = transition.state;

			if (transition.effect?.type === "quit") {
				return state;
			}
			if (transition.effect?.type === "run") {
				const output = await runEffect(
					runSolution,
					transition.effect.day,
					transition.effect.part2,
				);
				state = applyRunOutcome(state, output);
			}
		}
	} finally {
		terminal.close();
	}
}

async function runEffect(
	runSolution: RunSolution,
	day: number,
	part2: boolean,
): Promise<NavigationOutput> {
	try {
		return { kind: "result", text: await runSolution(day, part2) };
	} catch (error) {
		return { kind: "error", text: toError(error).message };
	}
}
