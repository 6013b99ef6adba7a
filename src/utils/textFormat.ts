/**
 * Upper-cases the first letter of every word and lower-cases the rest.
 * Any non-letter starts a new word: "o'neil pump" -> "O'Neil Pump".
 */
export const toTitleCase = (value: string): string =>
	value
		.trim()
		.toLowerCase()
		.replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) =>
			boundary + letter.toUpperCase()
		);

/** Trimmed title case, or null for blank input */
export const toOptionalTitleCase = (value: string | null | undefined): string | null =>
	value && value.trim() ? toTitleCase(value) : null;
