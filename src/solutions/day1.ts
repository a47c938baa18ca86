// DAY 1: COMBINATION LOCK
//
// A dial numbered 0-99 starts at 50 and turns by `L<n>` / `R<n>` rotations.
// Part 1 counts rotations that stop on 0, part 2 counts every click onto 0.

import type { Solver } from "../runtime/types.js";

const DIAL_SIZE = 100;
const START_POSITION = 50;

type Rotation = { direction: -1 | 1; distance: number };

function parseRotation(line: string): Rotation {
	const direction = line[0];
	const distance = Number(line.slice(1));
	if ((direction !== "L" && direction !== "R") || !Number.isInteger(distance) || distance < 0) {
		throw new Error(`Invalid rotation "${line}"`);
	}
	return { direction: direction === "L" ? -1 : 1, distance };
}

function wrap(position: number): number {
	return ((position % DIAL_SIZE) + DIAL_SIZE) % DIAL_SIZE;
}

export function countZeroHits(input: string, everyClick: boolean): number {
	let position = START_POSITION;
	let hits = 0;

	for (const rawLine of input.split("\n")) {
		const line = rawLine.trim();
		if (line.length === 0) {
			continue;
		}
		const { direction, distance } = parseRotation(line);

		if (everyClick) {
			for (let step = 0; step < distance; step += 1) {
				position = wrap(position + direction);
				if (position === 0) {
					hits += 1;
				}
			}
			continue;
		}

		position = wrap(position + direction * distance);
		if (position === 0) {
			hits += 1;
		}
	}

	return hits;
}

export const day1: Solver = {
	solve(input, part2) {
		return `Password: ${countZeroHits(input, part2)}`;
	},
};
