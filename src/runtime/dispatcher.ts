import { SolveFailedError, UnregisteredDayError } from "./errors.js";
import type { SolveRequest, SolverRegistry } from "./types.js";

export function isRegisteredDay(registry: SolverRegistry, day: number): boolean {
	return registry.has(day);
}

export function dispatch(registry: SolverRegistry, request: SolveRequest): string {
	const solver = registry.get(request.day);
	if (!solver) {
		throw new UnregisteredDayError(request.day);
	}

	try {
		return solver.solve(request.input, request.part2);
	} catch (error) {
		throw new SolveFailedError(request.day, request.part2, error);
	}
}
