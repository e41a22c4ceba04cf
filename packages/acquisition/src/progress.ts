/**
 * Progress Parsing
 * 
 * Reads the extractor's `--newline` output. Download percentages are capped
 * just below the merge phase, which is pinned at 95; only completion reaches
 * 100. Reported values never go down, even when a second stream (audio after
 * video) or a later rung starts again from zero.
 */

export const MERGE_PROGRESS = 95;
export const DOWNLOAD_PROGRESS_CEILING = 94.9;
export const COMPLETE_PROGRESS = 100;

export type ProgressEvent =
  | { phase: 'download'; percent: number }
  | { phase: 'merge'; percent: number };

const DOWNLOAD_LINE = /^\[download\]\s+(\d{1,3}(?:\.\d+)?)%/;
const MERGE_LINE = /^\[Merger\]|Merging formats into/;

export function parseProgressLine(line: string): ProgressEvent | null {
  const trimmed = line.trim();

  if (MERGE_LINE.test(trimmed)) {
    return { phase: 'merge', percent: MERGE_PROGRESS };
  }

  const match = DOWNLOAD_LINE.exec(trimmed);
  if (match?.[1]) {
    const percent = Math.min(Number.parseFloat(match[1]), DOWNLOAD_PROGRESS_CEILING);
    return { phase: 'download', percent: Math.round(percent * 10) / 10 };
  }

  return null;
}

/**
 * Feeds lines through the parser and reports every increase
 */
export class ProgressTracker {
  private current: number;
  private readonly onChange: (percent: number) => void;

  constructor(onChange: (percent: number) => void, initial = 0) {
    this.onChange = onChange;
    this.current = initial;
  }

  get value(): number {
    return this.current;
  }

  feed(line: string): void {
    const event = parseProgressLine(line);
    if (event) {
      this.raise(event.percent);
    }
  }

  private raise(percent: number): void {
    if (percent <= this.current) return;
    this.current = percent;
    this.onChange(percent);
  }
}
