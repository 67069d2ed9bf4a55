/**
 * Escapes regular-expression metacharacters so that step text matches only
 * itself, e.g. `I pay $5 (cash)` -> `I pay \$5 \(cash\)`.
 */
export function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Body of a C# verbatim string literal (`@"..."`): quotes are doubled. */
export function toVerbatimString(value: string): string {
    return value.replace(/"/g, '""');
}

/** Body of a JavaScript regular-expression literal (`/.../`). */
export function toRegExpLiteralBody(pattern: string): string {
    return pattern.replace(/\//g, "\\/");
}
