/**
 * Matches a header line such as `// DAY 5: CAFETERIA`.
 * `DAY` is matched case sensitively.
 */
const TITLE_PATTERN = /^[ \t]*(?:\/\/+|#+|--|\/\*+|\*)[ \t]*DAY[ \t]+\d+: ([^\r\n]*)\r?$/m;

export function formatFallbackTitle(day: number): string {
	return `Day ${day}`;
}

export function extractTitle(source: string, day: number): string {
	const match = TITLE_PATTERN.exec(source);
	const title = match?.[1]?.trim();
	if (!title) {
		return formatFallbackTitle(day);
	}
	return title;
}
