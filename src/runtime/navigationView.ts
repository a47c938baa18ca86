import process from "node:process";
import pc from "picocolors";
import type { NavigationOutput, NavigationState } from "./navigation.js";

export type Colors = Pick<
	typeof pc,
	"cyan" | "dim" | "gray" | "green" | "red" | "yellow" | "bold"
>;

export interface NavigationViewRow {
	label: string;
	hint?: string;
	active: boolean;
}

export interface NavigationView {
	title: string;
	rows: NavigationViewRow[];
	emptyMessage?: string;
	footer: string;
	output?: NavigationOutput;
}

const unicodeSupported = detectUnicodeSupport();
const pickUnicode = (unicode: string, fallback: string) =>
	unicodeSupported ? unicode : fallback;

const ICON_PRIMARY = pickUnicode("◆", "*");
const ICON_SUCCESS = pickUnicode("◇", "o");
const ICON_ERROR = pickUnicode("▲", "x");
const FRAME_SIDE = pickUnicode("│", "|");
const FRAME_BOTTOM = pickUnicode("└", "-");
const OPTION_ACTIVE = pickUnicode("●", ">");
const OPTION_INACTIVE = pickUnicode("○", " ");
const ARROWS = pickUnicode("↑/↓", "up/down");

function detectUnicodeSupport(): boolean {
	if (process.platform !== "win32") {
		return process.env.TERM !== "linux";
	}
	return Boolean(process.env.CI) ||
		Boolean(process.env.WT_SESSION) ||
		process.env.TERM_PROGRAM === "vscode" ||
		process.env.TERM === "xterm-256color" ||
		process.env.TERM === "alacritty" ||
		process.env.TERMINAL_EMULATOR === "JetBrains-JediTerm";
}

export function buildNavigationView(state: NavigationState): NavigationView {
	if (state.screen === "day-list") {
		return {
			title: "Select a day",
			rows: state.days.map((day, index) => ({
				label: `Day ${day.day}: ${day.title}`,
				hint: day.hasDefaultInput ? `day${day.day}.txt` : "no input file",
				active: index === state.dayCursor,
			})),
			emptyMessage: state.days.length === 0 ? "No day modules were found." : undefined,
			footer: `${ARROWS} or j/k move, enter select, q quit`,
		};
	}

	const { selectedDay } = state;
	return {
		title: `Day ${selectedDay.day}: ${selectedDay.title}`,
		rows: [
			{ label: "Part 1", active: state.partCursor === 1 },
			{ label: "Part 2", active: state.partCursor === 2 },
		],
		footer: `${ARROWS} or j/k switch part, enter run, esc back, q quit`,
		output: state.output,
	};
}

function formatRow(row: NavigationViewRow, colors: Colors): string {
	const hint = row.hint ? ` ${colors.dim(`(${row.hint})`)}` : "";
	if (row.active) {
		return `${colors.green(OPTION_ACTIVE)} ${row.label}${hint}`;
	}
	return `${colors.dim(OPTION_INACTIVE)} ${colors.dim(row.label)}${hint}`;
}

function formatOutput(output: NavigationOutput, colors: Colors): string[] {
	const side = colors.gray(FRAME_SIDE);
	const header =
		output.kind === "error"
			? `${colors.yellow(ICON_ERROR)}  ${colors.yellow("Error")}`
			: `${colors.green(ICON_SUCCESS)}  ${colors.bold("Result")}`;
	const body = output.text.split("\n").map((line) =>
		output.kind === "error" ? `${side}  ${colors.red(line)}` : `${side}  ${line}`,
	);
	return [side, header, ...body];
}

export function renderNavigationView(view: NavigationView, colors: Colors = pc): string {
	const side = colors.cyan(FRAME_SIDE);
	const lines = [colors.gray(FRAME_SIDE), `${colors.cyan(ICON_PRIMARY)}  ${view.title}`];

	if (view.rows.length === 0 && view.emptyMessage) {
		lines.push(`${side}  ${colors.yellow(view.emptyMessage)}`);
	}
	for (const row of view.rows) {
		lines.push(`${side}  ${formatRow(row, colors)}`);
	}
	if (view.output) {
		lines.push(...formatOutput(view.output, colors));
	}
	lines.push(`${colors.cyan(FRAME_BOTTOM)}  ${colors.dim(view.footer)}`);

	return `${lines.join("\n")}\n`;
}
