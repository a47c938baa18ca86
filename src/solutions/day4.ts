// DAY 4: PRINTING DEPARTMENT
//
// A grid of paper rolls (`@`). A roll is reachable by a forklift when fewer
// than four of its eight neighbours are rolls. Part 1 counts reachable rolls;
// part 2 keeps removing reachable rolls until none are left and counts them all.

import type { Solver } from "../runtime/types.js";

const ROLL = "@";
const EMPTY = ".";
const MAX_NEIGHBOURS = 4;

const NEIGHBOURS = [
	[-1, -1], [-1, 0], [-1, 1],
	[0, -1], [0, 1],
	[1, -1], [1, 0], [1, 1],
] as const;

type Grid = string[][];

export function parseGrid(input: string): Grid {
	return input
		.split("\n")
		.map((line) => line.trimEnd())
		.filter((line) => line.trim().length > 0)
		.map((line) => [...line]);
}

function countNeighbourRolls(grid: Grid, row: number, col: number): number {
	let count = 0;
	for (const [dr, dc] of NEIGHBOURS) {
		if (grid[row + dr]?.[col + dc] === ROLL) {
			count += 1;
		}
	}
	return count;
}

function findAccessible(grid: Grid): Array<[number, number]> {
	const accessible: Array<[number, number]> = [];
	grid.forEach((cells, row) => {
		cells.forEach((cell, col) => {
			if (cell === ROLL && countNeighbourRolls(grid, row, col) < MAX_NEIGHBOURS) {
				accessible.push([row, col]);
			}
		});
	});
	return accessible;
}

export function countAccessibleRolls(input: string): number {
	return findAccessible(parseGrid(input)).length;
}

export function countRemovableRolls(input: string): number {
	const grid = parseGrid(input);
	let removed = 0;
	while (true) {
		const accessible = findAccessible(grid);
		if (accessible.length === 0) {
			return removed;
		}
		for (const [row, col] of accessible) {
			const cells = grid[row];
			if (cells) {
				cells[col] = EMPTY;
			}
		}
		removed += accessible.length;
	}
}

export const day4: Solver = {
	solve(input, part2) {
		return part2
			? `Total removable rolls: ${countRemovableRolls(input)}`
			: `Accessible rolls: ${countAccessibleRolls(input)}`;
	},
};
