// DAY 5: CAFETERIA
//
// The input lists fresh id ranges (`start-end`), a blank line, then the ids of
// available ingredients. Part 1 counts the available ids that are fresh;
// part 2 counts every id covered by the ranges.

import type { Solver } from "../runtime/types.js";

type FreshRange = readonly [start: number, end: number];

export interface Inventory {
	ranges: FreshRange[];
	ids: number[];
}

export function parseInventory(input: string): Inventory {
	const lines = input.split("\n").map((line) => line.trim());
	const blank = lines.indexOf("");
	if (blank === -1) {
		throw new Error("No blank line found in input");
	}

	const ranges: FreshRange[] = [];
	for (const line of lines.slice(0, blank)) {
		const match = /^(\d+)-(\d+)$/.exec(line);
		if (match?.[1] && match[2]) {
			ranges.push([Number(match[1]), Number(match[2])]);
		}
	}

	const ids = lines
		.slice(blank + 1)
		.filter((line) => /^\d+$/.test(line))
		.map(Number);

	return { ranges, ids };
}

export function mergeFreshRanges(ranges: readonly FreshRange[]): FreshRange[] {
	const sorted = [...ranges].sort((a, b) => a[0] - b[0]);
	const merged: Array<[number, number]> = [];
	for (const [start, end] of sorted) {
		const last = merged[merged.length - 1];
		if (last && start <= last[1] + 1) {
			last[1] = Math.max(last[1], end);
		} else {
			merged.push([start, end]);
		}
	}
	return merged;
}

export function countFreshIds({ ranges, ids }: Inventory): number {
	return ids.filter((id) => ranges.some(([start, end]) => id >= start && id <= end)).length;
}

export function countFreshRange({ ranges }: Inventory): number {
	return mergeFreshRanges(ranges).reduce((total, [start, end]) => total + end - start + 1, 0);
}

export const day5: Solver = {
	solve(input, part2) {
		const inventory = parseInventory(input);
		return String(part2 ? countFreshRange(inventory) : countFreshIds(inventory));
	},
};
