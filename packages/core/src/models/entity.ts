export interface TextEntity {
  readonly id: number;
  /** "151" for a single verse, "58–59" for a composite pair */
  readonly label: string;
  readonly body: string;
}

export interface VerseMapping {
  readonly entityId: number;
  readonly verseNumber: number;
}

export interface CompositePair {
  readonly first: number;
  readonly second: number;
}

export interface EntityAssembly {
  readonly entities: readonly TextEntity[];
  readonly mappings: readonly VerseMapping[];
}
