/**
 * Length and slicing in Unicode code points. `String#length` and `slice`
 * count UTF-16 units, so an emoji would count twice and could be split.
 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

export function sliceCodePoints(text: string, end: number): string {
  return Array.from(text).slice(0, end).join("");
}
