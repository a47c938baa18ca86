// DAY 3: LOBBY BATTERIES
//
// Each line is a bank of single-digit batteries. Switching on k of them, in
// order, produces the k-digit number they spell. Sum the best number per
// bank for k = 2 (part 1) and k = 12 (part 2).

import type { Solver } from "../runtime/types.js";

/**
 * Largest k-digit number formed by a subsequence of `digits`, picked greedily
 * left to right while leaving enough digits for the remaining places.
 * Returns 0 when there are fewer than k digits.
 */
export function maxJoltage(digits: readonly number[], k: number): number {
	if (k <= 0 || digits.length < k) {
		return 0;
	}

	let result = 0;
	let start = 0;
	for (let place = 0; place < k; place += 1) {
		const end = digits.length - (k - place - 1);
		let best = -1;
		let bestIndex = start;
		for (let index = start; index < end; index += 1) {
			const digit = digits[index] ?? -1;
			if (digit > best) {
				best = digit;
				bestIndex = index;
			}
		}
		result = result * 10 + best;
		start = bestIndex + 1;
	}
	return result;
}

export function parseBank(line: string): number[] {
	return [...line].filter((char) => char >= "0" && char <= "9").map(Number);
}

export const day3: Solver = {
	solve(input, part2) {
		const batteries = part2 ? 12 : 2;
		let total = 0;
		for (const line of input.split("\n")) {
			const digits = parseBank(line.trim());
			if (digits.length === 0) {
				continue;
			}
			total += maxJoltage(digits, batteries);
		}
		return `Total output joltage: ${total}`;
	},
};
