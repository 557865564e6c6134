// Length and slicing by code point, so a cut never splits a surrogate pair.

export function codePoints(text: string): string[] {
  return Array.from(text);
}

export function codePointLength(text: string): number {
  return codePoints(text).length;
}

/** First `limit` code points of `text`, or `text` itself when it is shorter. */
export function truncateCodePoints(text: string, limit: number): string {
  const points = codePoints(text);
  return points.length > limit ? points.slice(0, limit).join("") : text;
}
