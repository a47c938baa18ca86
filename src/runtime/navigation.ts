import type { DayDescriptor } from "./types.js";

export type NavigationEvent = "move-up" | "move-down" | "select" | "back" | "quit";

export type PuzzlePart = 1 | 2;

export interface NavigationOutput {
	kind: "result" | "error";
	text: string;
}

interface NavigationBase {
	readonly days: readonly DayDescriptor[];
	readonly dayCursor: number;
}

export interface DayListState extends NavigationBase {
	readonly screen: "day-list";
}

export interface PartSelectState extends NavigationBase {
	readonly screen: "part-select";
	readonly selectedDay: DayDescriptor;
	readonly partCursor: PuzzlePart;
	readonly output?: NavigationOutput;
}

export type NavigationState = DayListState | PartSelectState;

export type NavigationEffect =
	| { type: "run"; day: number; part2: boolean }
	| { type: "quit" };

export interface NavigationTransition {
	state: NavigationState;
	effect?: NavigationEffect;
}

export function createNavigationState(days: readonly DayDescriptor[]): DayListState {
	return { screen: "day-list", days, dayCursor: 0 };
}

export function reduceNavigation(
	state: NavigationState,
	event: NavigationEvent,
): NavigationTransition {
	if (event === "quit") {
		return { state, effect: { type: "quit" } };
	}

	if (state.screen === "day-list") {
		return { state: reduceDayList(state, event) };
	}

	switch (event) {
		case "move-up":
		case "move-down":
			return {
				state: {
					screen: "part-select",
					days: state.days,
					dayCursor: state.dayCursor,
					selectedDay: state.selectedDay,
					partCursor: state.partCursor === 1 ? 2 : 1,
				},
			};
		case "select":
			return {
				state,
				effect: {
					type: "run",
					day: state.selectedDay.day,
					part2: state.partCursor === 2,
				},
			};
		case "back":
			return {
				state: { screen: "day-list", days: state.days, dayCursor: state.dayCursor },
			};
	}
}

function reduceDayList(
	state: DayListState,
	event: Exclude<NavigationEvent, "quit">,
): NavigationState {
	const lastIndex = state.days.length - 1;
	switch (event) {
		case "move-up":
			return lastIndex < 0 ? state : { ...state, dayCursor: Math.max(state.dayCursor - 1, 0) };
		case "move-down":
			return lastIndex < 0
				? state
				: { ...state, dayCursor: Math.min(state.dayCursor + 1, lastIndex) };
		case "select": {
			const selectedDay = state.days[state.dayCursor];
			if (!selectedDay) {
				return state;
			}
			return {
				screen: "part-select",
				days: state.days,
				dayCursor: state.dayCursor,
				selectedDay,
				partCursor: 1,
			};
		}
		case "back":
			return state;
	}
}

export function applyRunOutcome(
	state: NavigationState,
	output: NavigationOutput,
): NavigationState {
	if (state.screen !== "part-select") {
		return state;
	}
	return { ...state, output };
}
