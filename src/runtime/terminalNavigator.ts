import type { NavigationEvent } from "./navigation.js";
import { renderNavigationView, type Colors, type NavigationView } from "./navigationView.js";

/** Paints views and hands back one key event at a time. */
export interface NavigationTerminal {
	read(view: NavigationView): Promise<NavigationEvent>;
	close(): void;
}

const KEY_EVENTS = new Map<string, NavigationEvent>([
	["\u001b[A", "move-up"],
	["\u001bOA", "move-up"],
	["k", "move-up"],
	["w", "move-up"],
	["\u001b[B", "move-down"],
	["\u001bOB", "move-down"],
	["j", "move-down"],
	["s", "move-down"],
	["\r", "select"],
	["\r\n", "select"],
	["\n", "select"],
	[" ", "select"],
	["\u001b[C", "select"],
	["\u001bOC", "select"],
	["l", "select"],
	["\u001b", "back"],
	["\u007f", "back"],
	["\b", "back"],
	["\u001b[D", "back"],
	["\u001bOD", "back"],
	["h", "back"],
	["q", "quit"],
	["\u0003", "quit"],
]);

export function decodeKey(input: string): NavigationEvent | undefined {
	return KEY_EVENTS.get(input) ?? KEY_EVENTS.get(input.toLowerCase());
}

/**
 * Splits one data chunk into keys. A chunk can carry several presses when
 * keys repeat quickly or text is pasted.
 */
export function splitKeys(chunk: string): string[] {
	const keys: string[] = [];
	let index = 0;
	while (index < chunk.length) {
		const length = keyLength(chunk, index);
		keys.push(chunk.slice(index, index + length));
		index += length;
	}
	return keys;
}

export function decodeKeys(chunk: string): NavigationEvent[] {
	const events: NavigationEvent[] = [];
	for (const key of splitKeys(chunk)) {
		const event = decodeKey(key);
		if (event) {
			events.push(event);
		}
	}
	return events;
}

function keyLength(chunk: string, index: number): number {
	const current = chunk[index];
	const next = chunk[index + 1];
	if (current === "\r" && next === "\n") {
		return 2;
	}
	if (current !== "\u001b" || next === undefined) {
		return 1;
	}
	if (next === "O") {
		return Math.min(3, chunk.length - index);
	}
	if (next !== "[") {
		return 1;
	}
	// CSI: parameter bytes until a final byte in @..~
	let end = index + 2;
	while (end < chunk.length) {
		const code = chunk.charCodeAt(end);
		end += 1;
		if (code >= 0x40 && code <= 0x7e) {
			break;
		}
	}
	return end - index;
}

export function createTerminalNavigator({
	stdin,
	stdout,
	colors,
}: {
	stdin: NodeJS.ReadStream;
	stdout: NodeJS.WritableStream;
	colors?: Colors;
}): NavigationTerminal {
	const wasPaused = stdin.isPaused();
	const previousRaw = stdin.isRaw ?? false;
	const canSetRaw = Boolean(stdin.isTTY) && typeof stdin.setRawMode === "function";
	const pending: NavigationEvent[] = [];
	let waiting: ((event: NavigationEvent) => void) | undefined;

	const onData = (chunk: Buffer | string) => {
		const text = typeof chunk === "string" ? chunk : chunk.toString("utf8");
		for (const event of decodeKeys(text)) {
			if (waiting) {
				const resolve = waiting;
				waiting = undefined;
				resolve(event);
			} else {
				pending.push(event);
			}
		}
	};

	if (canSetRaw) {
		stdin.setRawMode(true);
	}
	stdin.on("data", onData);
	stdin.resume();

	return {
		read(view) {
			clearScreen(stdout);
			stdout.write(renderNavigationView(view, colors));
			const next = pending.shift();
			if (next) {
				return Promise.resolve(next);
			}
			return new Promise<NavigationEvent>((resolve) => {
				waiting = resolve;
			});
		},
		close() {
			stdin.removeListener("data", onData);
			if (canSetRaw) {
				stdin.setRawMode(previousRaw);
			}
			if (wasPaused) {
				stdin.pause();
			}
		},
	};
}

function clearScreen(stream: NodeJS.WritableStream) {
	stream.write("\u001b[2J\u001b[H");
}
