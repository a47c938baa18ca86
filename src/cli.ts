#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import process from "node:process";
import { createProgram, parseCliArguments } from "./runtime/cliProgram.js";
import { runPuzzleRunner } from "./runtime/runPuzzleRunner.js";

async function readVersion(): Promise<string> {
	const raw = await readFile(new URL("../package.json", import.meta.url), "utf8");
	const manifest: unknown = JSON.parse(raw);
	if (
		typeof manifest === "object" &&
		manifest !== null &&
		"version" in manifest &&
		typeof manifest.version === "string"
	) {
		return manifest.version;
	}
	return "0.0.0";
}

const program = createProgram(await readVersion());
const options = parseCliArguments(program, process.argv.slice(2));
const result = await runPuzzleRunner(options);
process.exitCode = result.exitCode;
