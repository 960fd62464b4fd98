/** Lower-cased word tokens of a text. */
export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z']+/).filter((t) => t.length > 0);
}

/** Count tokens of `text` that belong to `markers`. */
export function countMarkers(text: string, markers: ReadonlySet<string>): number {
  return tokenize(text).filter((t) => markers.has(t)).length;
}
