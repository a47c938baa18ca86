import type { Dirent } from "node:fs";
import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { MODULE_EXTENSIONS } from "./config.js";
import { defaultInputPath, isFile } from "./inputResolver.js";
import { extractTitle, formatFallbackTitle } from "./titleExtractor.js";
import { MAX_DAY, MIN_DAY, type DayDescriptor } from "./types.js";

export interface ScanDaysOptions {
	solutionsDir: string;
	inputDir: string;
	moduleExtensions?: readonly string[];
	onWarning?: (message: string) => void;
}

interface DayModuleCandidate {
	day: number;
	modulePath: string;
	rank: number;
}

const DAY_MODULE_PATTERN = /^day(\d+)(\.[A-Za-z0-9]+)$/;

export async function scanDays(options: ScanDaysOptions): Promise<readonly DayDescriptor[]> {
	const extensions = options.moduleExtensions ?? MODULE_EXTENSIONS;
	const entries = await readDirents(options.solutionsDir);
	const candidates = new Map<number, DayModuleCandidate>();

	for (const entry of entries) {
		if (!entry.isFile()) {
			continue;
		}
		const candidate = parseDayModuleName(entry.name, extensions);
		if (!candidate) {
			continue;
		}
		const existing = candidates.get(candidate.day);
		if (existing && existing.rank <= candidate.rank) {
			continue;
		}
		candidates.set(candidate.day, {
			...candidate,
			modulePath: path.join(options.solutionsDir, entry.name),
		});
	}

	const ordered = [...candidates.values()].sort((a, b) => a.day - b.day);
	const descriptors: DayDescriptor[] = [];
	for (const candidate of ordered) {
		descriptors.push(await describeDay(candidate, options));
	}
	return Object.freeze(descriptors);
}

export function parseDayModuleName(
	fileName: string,
	extensions: readonly string[] = MODULE_EXTENSIONS,
): { day: number; rank: number } | undefined {
	const match = DAY_MODULE_PATTERN.exec(fileName);
	if (!match?.[1] || !match[2]) {
		return undefined;
	}
	const rank = extensions.indexOf(match[2]);
	if (rank === -1) {
		return undefined;
	}
	const day = Number.parseInt(match[1], 10);
	if (day < MIN_DAY || day > MAX_DAY) {
		return undefined;
	}
	return { day, rank };
}

async function describeDay(
	candidate: DayModuleCandidate,
	options: ScanDaysOptions,
): Promise<DayDescriptor> {
	let source: string;
	try {
		source = await readFile(candidate.modulePath, "utf8");
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		options.onWarning?.(`Could not read ${candidate.modulePath}: ${reason}`);
		return {
			day: candidate.day,
			title: formatFallbackTitle(candidate.day),
			hasDefaultInput: false,
			modulePath: candidate.modulePath,
		};
	}

	return {
		day: candidate.day,
		title: extractTitle(source, candidate.day),
		hasDefaultInput: await isFile(defaultInputPath(options.inputDir, candidate.day)),
		modulePath: candidate.modulePath,
	};
}

async function readDirents(dir: string): Promise<Dirent[]> {
	try {
		return await readdir(dir, { withFileTypes: true });
	} catch (error) {
		if (isMissingPathError(error)) {
			return [];
		}
		throw error;
	}
}

function isMissingPathError(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		(error.code === "ENOENT" || error.code === "ENOTDIR")
	);
}
