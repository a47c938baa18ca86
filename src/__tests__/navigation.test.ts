import { describe, expect, it } from "vitest";
import {
	applyRunOutcome,
	createNavigationState,
	reduceNavigation,
	type NavigationEvent,
	type NavigationState,
} from "../runtime/navigation.js";
import type { DayDescriptor } from "../runtime/types.js";

function descriptor(day: number, title: string): DayDescriptor {
	return { day, title, hasDefaultInput: false, modulePath: `/solutions/day${day}.ts` };
}

const days = [
	descriptor(1, "COMBINATION LOCK"),
	descriptor(2, "INVALID ID DETECTION"),
	descriptor(3, "LOBBY BATTERIES"),
];

function replay(state: NavigationState, events: NavigationEvent[]): NavigationState {
	return events.reduce((current, event) => reduceNavigation(current, event).state, state);
}

describe("day list", () => {
	it("starts on the first day", () => {
		expect(createNavigationState(days)).toEqual({ screen: "day-list", days, dayCursor: 0 });
	});

	it("clamps the cursor at the top", () => {
		const state = replay(createNavigationState(days), ["move-up", "move-up", "move-up"]);
		expect(state.dayCursor).toBe(0);
	});

	it("clamps the cursor at the bottom", () => {
		const state = replay(createNavigationState(days), [
			"move-down",
			"move-down",
			"move-down",
			"move-down",
		]);
		expect(state.dayCursor).toBe(2);
	});

	it("ignores movement and selection when there are no days", () => {
		const empty = createNavigationState([]);
		expect(reduceNavigation(empty, "move-down").state).toBe(empty);
		expect(reduceNavigation(empty, "move-up").state).toBe(empty);
		expect(reduceNavigation(empty, "select")).toEqual({ state: empty });
	});

	it("treats back as a no-op", () => {
		const state = replay(createNavigationState(days), ["move-down"]);
		expect(reduceNavigation(state, "back")).toEqual({ state });
	});

	it("opens the part screen for the highlighted day", () => {
		const state = replay(createNavigationState(days), ["move-down", "select"]);
		expect(state).toEqual({
			screen: "part-select",
			days,
			dayCursor: 1,
			selectedDay: days[1],
			partCursor: 1,
		});
	});
});

describe("part select", () => {
	const partSelect = replay(createNavigationState(days), ["move-down", "move-down", "select"]);

	it("toggles between the two parts", () => {
		const once = reduceNavigation(partSelect, "move-down").state;
		expect(once).toMatchObject({ screen: "part-select", partCursor: 2 });
		expect(reduceNavigation(once, "move-down").state).toMatchObject({ partCursor: 1 });
		expect(reduceNavigation(partSelect, "move-up").state).toMatchObject({ partCursor: 2 });
	});

	it("requests a run of the selected day and part", () => {
		const onPart2 = reduceNavigation(partSelect, "move-down").state;
		expect(reduceNavigation(partSelect, "select")).toEqual({
			state: partSelect,
			effect: { type: "run", day: 3, part2: false },
		});
		expect(reduceNavigation(onPart2, "select").effect).toEqual({
			type: "run",
			day: 3,
			part2: true,
		});
	});

	it("returns to the day list keeping the cursor", () => {
		const state = reduceNavigation(partSelect, "back").state;
		expect(state).toEqual({ screen: "day-list", days, dayCursor: 2 });
		expect("selectedDay" in state).toBe(false);
	});

	it("stores run output and clears it on the next navigation key", () => {
		const withOutput = applyRunOutcome(partSelect, { kind: "result", text: "Password: 3" });
		expect(withOutput).toMatchObject({
			screen: "part-select",
			output: { kind: "result", text: "Password: 3" },
		});
		const moved = reduceNavigation(withOutput, "move-down").state;
		expect(moved).toMatchObject({ partCursor: 2 });
		expect("output" in moved).toBe(false);
	});

	it("keeps the output when the same part runs again", () => {
		const withError = applyRunOutcome(partSelect, {
			kind: "error",
			text: "Day 3 not implemented yet",
		});
		expect(reduceNavigation(withError, "select").state).toBe(withError);
	});
});

describe("quit", () => {
	it("quits from either screen", () => {
		const dayList = createNavigationState(days);
		const partSelect = reduceNavigation(dayList, "select").state;
		expect(reduceNavigation(dayList, "quit")).toEqual({
			state: dayList,
			effect: { type: "quit" },
		});
		expect(reduceNavigation(partSelect, "quit").effect).toEqual({ type: "quit" });
	});
});

describe("applyRunOutcome", () => {
	it("ignores outcomes on the day list", () => {
		const dayList = createNavigationState(days);
		expect(applyRunOutcome(dayList, { kind: "result", text: "1" })).toBe(dayList);
	});
});
