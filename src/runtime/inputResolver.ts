import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { InputNotFoundError } from "./errors.js";
import type { InputStream } from "./types.js";

export interface ResolveInputOptions {
	day: number;
	explicitPath?: string;
	inputDir: string;
	stdin?: InputStream;
}

export function defaultInputPath(inputDir: string, day: number): string {
	return path.join(inputDir, `day${day}.txt`);
}

/** Drops one trailing line break. Anything before it is kept byte for byte. */
export function trimTrailingNewline(text: string): string {
	if (text.endsWith("\r\n")) {
		return text.slice(0, -2);
	}
	if (text.endsWith("\n")) {
		return text.slice(0, -1);
	}
	return text;
}

/**
 * Looks for the day's input in order: the explicit path, `day<N>.txt` in the
 * input directory, then piped stdin. An explicit path that cannot be read
 * fails the request instead of falling through.
 */
export async function resolveInput(options: ResolveInputOptions): Promise<string> {
	const { day, explicitPath, inputDir, stdin } = options;

	if (explicitPath) {
		try {
			return trimTrailingNewline(await readFile(explicitPath, "utf8"));
		} catch (error) {
			throw new InputNotFoundError(day, explicitPath, { cause: error });
		}
	}

	const defaultPath = defaultInputPath(inputDir, day);
	if (await isFile(defaultPath)) {
		try {
			return trimTrailingNewline(await readFile(defaultPath, "utf8"));
		} catch (error) {
			throw new InputNotFoundError(day, defaultPath, { cause: error });
		}
	}

	if (stdin && !stdin.isTTY) {
		return trimTrailingNewline(await readStream(stdin));
	}

	throw new InputNotFoundError(day);
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of stream) {
		chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
	}
	// Decoded once so a character split across chunks stays intact.
	return Buffer.concat(chunks).toString("utf8");
}

export async function isFile(filePath: string): Promise<boolean> {
	try {
		return (await stat(filePath)).isFile();
	} catch {
		return false;
	}
}
