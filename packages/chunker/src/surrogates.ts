function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Pulls a window end back one code unit when it would cut a surrogate pair
 * in half, unless that would put the end before `minEnd`.
 */
export function snapEnd(content: string, end: number, minEnd: number): number {
  if (end >= content.length || end - 1 < minEnd) return end;
  return isHighSurrogate(content.charCodeAt(end - 1)) ? end - 1 : end;
}

/** Moves a window start off the second half of a surrogate pair. */
export function snapStart(content: string, start: number): number {
  return isLowSurrogate(content.charCodeAt(start)) ? start + 1 : start;
}
