import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InputNotFoundError } from "../runtime/errors.js";
import {
	defaultInputPath,
	isFile,
	resolveInput,
	trimTrailingNewline,
} from "../runtime/inputResolver.js";
import type { InputStream } from "../runtime/types.js";

let inputDir = "";

function pipedStdin(text: string): InputStream {
	return Object.assign(Readable.from([text]), { isTTY: false });
}

function terminalStdin(): InputStream {
	return Object.assign(Readable.from([]), { isTTY: true });
}

beforeEach(async () => {
	inputDir = await fs.mkdtemp(path.join(os.tmpdir(), "advent-runner-input-"));
});

afterEach(async () => {
	await fs.rm(inputDir, { recursive: true, force: true });
});

describe("resolveInput", () => {
	it("prefers an explicit file over the default input", async () => {
		const explicitPath = path.join(inputDir, "custom.txt");
		await fs.writeFile(explicitPath, "X", "utf8");
		await fs.writeFile(defaultInputPath(inputDir, 1), "Y", "utf8");

		await expect(
			resolveInput({ day: 1, explicitPath, inputDir, stdin: pipedStdin("Z") }),
		).resolves.toBe("X");
	});

	it("fails when the explicit file is missing even if a default exists", async () => {
		await fs.writeFile(defaultInputPath(inputDir, 1), "Y", "utf8");
		const explicitPath = path.join(inputDir, "missing.txt");

		const attempt = resolveInput({ day: 1, explicitPath, inputDir });

		await expect(attempt).rejects.toBeInstanceOf(InputNotFoundError);
		await expect(attempt).rejects.toMatchObject({
			code: "INPUT_NOT_FOUND",
			day: 1,
			path: explicitPath,
		});
	});

	it("reads the default day file when no path is given", async () => {
		await fs.writeFile(defaultInputPath(inputDir, 4), "..@@\n@@@.\n", "utf8");

		await expect(
			resolveInput({ day: 4, inputDir, stdin: pipedStdin("ignored") }),
		).resolves.toBe("..@@\n@@@.");
	});

	it("falls back to piped stdin", async () => {
		await expect(
			resolveInput({ day: 2, inputDir, stdin: pipedStdin("11-22,95-115\n") }),
		).resolves.toBe("11-22,95-115");
	});

	it("decodes a character split across stdin chunks", async () => {
		const stdin = Object.assign(
			Readable.from([Buffer.from([0xc3]), Buffer.from([0xa9, 0x0a])]),
			{ isTTY: false },
		);

		await expect(resolveInput({ day: 7, inputDir, stdin })).resolves.toBe("é");
	});

	it("does not read stdin attached to a terminal", async () => {
		await expect(
			resolveInput({ day: 3, inputDir, stdin: terminalStdin() }),
		).rejects.toMatchObject({
			code: "INPUT_NOT_FOUND",
			message: "No input for day 3: pass --file, add day3.txt or pipe it on stdin",
		});
	});

	it("fails without any source", async () => {
		await expect(resolveInput({ day: 9, inputDir })).rejects.toBeInstanceOf(
			InputNotFoundError,
		);
	});
});

describe("isFile", () => {
	it("is true only for regular files", async () => {
		const file = defaultInputPath(inputDir, 1);
		await fs.writeFile(file, "R5\n", "utf8");
		await fs.mkdir(defaultInputPath(inputDir, 2));

		await expect(isFile(file)).resolves.toBe(true);
		await expect(isFile(defaultInputPath(inputDir, 2))).resolves.toBe(false);
		await expect(isFile(defaultInputPath(inputDir, 3))).resolves.toBe(false);
	});
});

describe("trimTrailingNewline", () => {
	it("removes exactly one trailing newline", () => {
		expect(trimTrailingNewline("L68\nR30\n")).toBe("L68\nR30");
		expect(trimTrailingNewline("L68\nR30\n\n")).toBe("L68\nR30\n");
		expect(trimTrailingNewline("a\r\n")).toBe("a");
	});

	it("keeps other whitespace", () => {
		expect(trimTrailingNewline("  a\n\tb  ")).toBe("  a\n\tb  ");
	});
});
