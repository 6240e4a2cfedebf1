/** Non-overlapping occurrences of `needle` in `text`. */
export function countOccurrences(text: string, needle: string): number {
  if (needle.length === 0) return 0;

  let count = 0;
  let index = text.indexOf(needle);
  while (index !== -1) {
    count++;
    index = text.indexOf(needle, index + needle.length);
  }
  return count;
}

/** Cut to `max` code points, so astral characters are never split. */
export function truncate(text: string, max: number, marker = '...'): string {
  const chars = [...text];
  return chars.length > max ? chars.slice(0, max).join('') + marker : text;
}
