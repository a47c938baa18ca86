// DAY 2: INVALID ID DETECTION
//
// Input is a comma separated list of inclusive `start-end` id ranges.
// An id is invalid when its digits are one block repeated: exactly twice for
// part 1, two or more times for part 2. The answer is the sum of invalid ids.

import type { Solver } from "../runtime/types.js";

export interface IdRange {
	start: number;
	end: number;
}

export function parseRanges(input: string): IdRange[] {
	const ranges: IdRange[] = [];
	for (const part of input.replace(/\s+/g, "").split(",")) {
		if (part.length === 0) {
			continue;
		}
		const match = /^(\d+)-(\d+)$/.exec(part);
		if (!match?.[1] || !match[2]) {
			continue;
		}
		ranges.push({ start: Number(match[1]), end: Number(match[2]) });
	}
	return ranges;
}

/** Sorts and joins overlapping or touching ranges. */
export function mergeRanges(ranges: readonly IdRange[]): IdRange[] {
	const sorted = [...ranges].sort((a, b) => a.start - b.start || a.end - b.end);
	const merged: IdRange[] = [];
	for (const range of sorted) {
		const last = merged[merged.length - 1];
		if (last && range.start <= last.end + 1) {
			last.end = Math.max(last.end, range.end);
		} else {
			merged.push({ ...range });
		}
	}
	return merged;
}

function inMergedRanges(value: number, merged: readonly IdRange[]): boolean {
	let lo = 0;
	let hi = merged.length;
	while (lo < hi) {
		const mid = Math.floor((lo + hi) / 2);
		const range = merged[mid];
		if (!range) {
			return false;
		}
		if (value < range.start) {
			hi = mid;
		} else if (value > range.end) {
			lo = mid + 1;
		} else {
			return true;
		}
	}
	return false;
}

export function isRepeatedBlock(value: number): boolean {
	const digits = String(value);
	for (let size = 1; size <= digits.length / 2; size += 1) {
		if (digits.length % size !== 0) {
			continue;
		}
		if (digits.slice(0, size).repeat(digits.length / size) === digits) {
			return true;
		}
	}
	return false;
}

/** Builds every doubled number (`t` followed by `t`) up to the largest range end. */
export function sumDoubledIds(ranges: readonly IdRange[]): number {
	const merged = mergeRanges(ranges);
	const upper = merged.reduce((max, range) => Math.max(max, range.end), 0);
	const maxDigits = String(upper).length;
	let sum = 0;

	for (let half = 1; half * 2 <= maxDigits; half += 1) {
		const first = 10 ** (half - 1);
		const last = 10 ** half;
		for (let block = first; block < last; block += 1) {
			const doubled = Number(`${block}${block}`);
			if (doubled > upper) {
				break;
			}
			if (inMergedRanges(doubled, merged)) {
				sum += doubled;
			}
		}
	}

	return sum;
}

export function sumRepeatedIds(ranges: readonly IdRange[]): number {
	let sum = 0;
	for (const range of mergeRanges(ranges)) {
		for (let value = range.start; value <= range.end; value += 1) {
			if (isRepeatedBlock(value)) {
				sum += value;
			}
		}
	}
	return sum;
}

export const day2: Solver = {
	solve(input, part2) {
		const ranges = parseRanges(input);
		const sum = part2 ? sumRepeatedIds(ranges) : sumDoubledIds(ranges);
		return `Sum of invalid IDs: ${sum}`;
	},
};
