export type MeasureText = (text: string) => number;

/**
 * Break text into display lines: hard breaks on "\n", then greedy word wrap
 * to maxWidth. A single word wider than maxWidth gets its own line.
 */
export function wrapText(text: string, maxWidth: number, measure: MeasureText, wrap = true): string[] {
  const paragraphs = text.split("\n");
  if (!wrap) return paragraphs;

  const lines: string[] = [];
  for (const paragraph of paragraphs) {
    const words = paragraph.split(" ").filter((w) => w.length > 0);
    if (words.length === 0) {
      lines.push("");
      continue;
    }
    let line = "";
    for (const word of words) {
      const candidate = line ? `${line} ${word}` : word;
      if (!line || measure(candidate) <= maxWidth) {
        line = candidate;
      } else {
        lines.push(line);
        line = word;
      }
    }
    lines.push(line);
  }
  return lines;
}

export const LINE_HEIGHT_RATIO = 1.2;

export function lineHeight(fontSize: number): number {
  return Math.round(fontSize * LINE_HEIGHT_RATIO);
}
