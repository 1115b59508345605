/**
 * Splits rendered markup into lines so tests can assert them one by one.
 */
export function lines(text: string): readonly string[] {
  return text.split("\n");
}

/** Joins lines the way the renderer does. */
export function joinLines(...parts: readonly string[]): string {
  return parts.join("\n");
}
