export const UNNAMED_STEP = "UnnamedStep";

/** Prefix for candidates that would otherwise start with a digit or a combining mark. */
const DIGIT_PREFIX = "Step";

const WORD_BOUNDARY = /[^\p{L}\p{M}\p{Nd}]+/u;
const VALID_IDENTIFIER = /^[\p{L}_][\p{L}\p{M}\p{Nd}_]*$/u;

/**
 * Derives a PascalCase method identifier from free text: the text is split on
 * non-alphanumeric boundaries and each token is capitalized, e.g.
 * `the user's "basket" is empty` -> `TheUserSBasketIsEmpty`.
 * Letters and digits of any script count as alphanumeric.
 *
 * Pure: the same text always yields the same identifier.
 */
export function deriveIdentifier(text: string): string {
    const tokens = text.split(WORD_BOUNDARY).filter((token) => token.length > 0);
    if (tokens.length === 0) {
        return UNNAMED_STEP;
    }

    const candidate = tokens.map((token) => token.replace(/^./u, (first) => first.toUpperCase())).join("");
    return /^\p{L}/u.test(candidate) ? candidate : `${DIGIT_PREFIX}${candidate}`;
}

export function isValidIdentifier(value: string): boolean {
    return VALID_IDENTIFIER.test(value);
}
