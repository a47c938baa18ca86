import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import {
	INPUT_DIR_ENV,
	MODULE_EXTENSIONS,
	SOLUTIONS_DIR_ENV,
	defaultSolutionsDir,
	resolveRunnerConfig,
} from "../runtime/config.js";

describe("resolveRunnerConfig", () => {
	it("defaults to the bundled solutions and the working directory", () => {
		expect(resolveRunnerConfig({ cwd: "/work" }, {})).toEqual({
			solutionsDir: defaultSolutionsDir(),
			inputDir: path.resolve("/work"),
			moduleExtensions: MODULE_EXTENSIONS,
		});
	});

	it("reads directory overrides from the environment", () => {
		const config = resolveRunnerConfig(
			{ cwd: "/work" },
			{ [INPUT_DIR_ENV]: "inputs", [SOLUTIONS_DIR_ENV]: "/elsewhere/solutions" },
		);

		expect(config.inputDir).toBe(path.resolve("/work", "inputs"));
		expect(config.solutionsDir).toBe(path.resolve("/elsewhere/solutions"));
	});

	it("prefers explicit options over the environment", () => {
		const config = resolveRunnerConfig(
			{ cwd: "/work", inputDir: "/data" },
			{ [INPUT_DIR_ENV]: "inputs" },
		);

		expect(config.inputDir).toBe(path.resolve("/data"));
	});

	it("ignores blank environment values", () => {
		expect(resolveRunnerConfig({ cwd: "/work" }, { [INPUT_DIR_ENV]: "  " }).inputDir).toBe(
			path.resolve("/work"),
		);
	});
});

describe("defaultSolutionsDir", () => {
	it("points at the solutions directory next to the runtime", () => {
		const here = path.dirname(fileURLToPath(import.meta.url));
		expect(path.resolve(defaultSolutionsDir())).toBe(path.resolve(here, "..", "solutions"));
	});
});
