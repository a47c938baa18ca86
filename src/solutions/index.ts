import type { SolverRegistry } from "../runtime/types.js";
import { day1 } from "./day1.js";
import { day2 } from "./day2.js";
import { day3 } from "./day3.js";
import { day4 } from "./day4.js";
import { day5 } from "./day5.js";

/** Days that can be dispatched. Add an entry here next to each new `day<N>.ts`. */
export const solvers: SolverRegistry = new Map([
	[1, day1],
	[2, day2],
	[3, day3],
	[4, day4],
	[5, day5],
]);
