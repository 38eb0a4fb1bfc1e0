/**
 * Split file contents into lines on `\n`, `\r\n` or `\r`.
 * A trailing line break does not produce an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}
