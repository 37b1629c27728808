// Raw element access handed over by a markup parser. Titles are kept verbatim.
export interface MarkupWord {
  readonly title: string;
  readonly text: string;
}

export interface MarkupLine {
  readonly title: string;
  readonly words: readonly MarkupWord[];
}

export interface MarkupPage {
  readonly title: string;
  readonly lines: readonly MarkupLine[];
}

export interface MarkupDocument {
  readonly pages: readonly MarkupPage[];
}
