/**
 * Process-wide verse map for one extraction pass. A verse number that is
 * flushed again (next page, or a repeated number) has its text appended.
 */
export class VerseAccumulator {
  private readonly texts = new Map<number, string>();
  private readonly reopened = new Set<number>();

  /** Returns true when the verse already had text and was extended. */
  append(verseNumber: number, text: string): boolean {
    const trimmed = text.trim();
    if (trimmed.length === 0) return false;

    const previous = this.texts.get(verseNumber);
    if (previous === undefined) {
      this.texts.set(verseNumber, trimmed);
      return false;
    }

    this.texts.set(verseNumber, `${previous} ${trimmed}`.trim());
    this.reopened.add(verseNumber);
    return true;
  }

  get(verseNumber: number): string | undefined {
    return this.texts.get(verseNumber);
  }

  has(verseNumber: number): boolean {
    return this.texts.has(verseNumber);
  }

  get size(): number {
    return this.texts.size;
  }

  /** Verse numbers that received text more than once, ascending */
  get reopenedVerses(): number[] {
    return [...this.reopened].sort((a, b) => a - b);
  }

  /** Snapshot ordered by ascending verse number */
  toMap(): Map<number, string> {
    const numbers = [...this.texts.keys()].sort((a, b) => a - b);
    return new Map(numbers.map((n) => [n, this.texts.get(n) ?? '']));
  }
}
