/**
 * Ordered narration of an audit run. One instance is created per run and
 * returned with the outcome so the presentation layer can show it as tooltip
 * text; the classification never reads it back.
 */
export class DiagnosticLog {
  private readonly lines: string[] = [];

  /** Optional listener mirroring each line, e.g. into the structured logger. */
  constructor(private readonly onLine?: (line: string) => void) {}

  add(line: string): void {
    this.lines.push(line);
    this.onLine?.(line);
  }

  entries(): readonly string[] {
    return [...this.lines];
  }

  /** Lines joined with newlines, surrounding whitespace removed. */
  toText(): string {
    return this.lines.join("\n").trim();
  }
}
