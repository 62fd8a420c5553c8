/**
 * Split input into tokens. Parentheses always stand alone; everything else is
 * separated by whitespace.
 */
export function tokenize(text: string): string[] {
	return text
		.replace(/[()]/g, ' $& ')
		.split(/\s+/)
		.filter((token) => token.length > 0)
}
