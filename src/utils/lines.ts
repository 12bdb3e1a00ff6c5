/**
 * Split text into lines on `\n` or `\r\n`. A single trailing newline does not
 * produce an extra empty line, so `"a\nb\n"` and `"a\nb"` both give two lines.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
