const LINE_NUMBER_PREFIX = /^\d{1,5}\|\s/;

/**
 * Removes synthetic `N| ` prefixes that leak into fragments when the model was
 * shown a numbered listing. Only strips when more than half of the non-empty
 * lines carry the prefix, so code that legitimately starts a line with `12| `
 * is left alone.
 */
export function stripLineNumbers(text: string): string {
    if (text.trim().length === 0) {
        return text;
    }

    const lines = text.split("\n");
    const nonEmpty = lines.filter(line => line.length > 0);
    const prefixed = nonEmpty.filter(line => LINE_NUMBER_PREFIX.test(line)).length;

    if (prefixed * 2 <= nonEmpty.length) {
        return text;
    }
    return lines.map(line => line.replace(LINE_NUMBER_PREFIX, "")).join("\n");
}

/** Trims trailing whitespace on every line; indentation and blank lines stay. */
export function trimTrailingWhitespace(text: string): string {
    return text
        .split("\n")
        .map(line => line.replace(/\s+$/, ""))
        .join("\n");
}

export function isBlank(text: string): boolean {
    return text.trim().length === 0;
}
