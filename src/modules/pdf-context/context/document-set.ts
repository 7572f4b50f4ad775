import type { PdfDocument } from '../document/pdf-document';

export type DocumentEntry = {
  readonly document: PdfDocument;
  readonly displayName: string;
};

/**
 * Append-only, immutable list of documents in the order they were added.
 * Adding a document returns a new set; the same document may appear more than once,
 * and repeated names get an occurrence suffix (`report.pdf (2)`).
 */
export class DocumentSet {
  static readonly empty = new DocumentSet([]);

  private constructor(readonly entries: readonly DocumentEntry[]) {
    Object.freeze(this.entries);
  }

  static of(...documents: PdfDocument[]): DocumentSet {
    return documents.reduce((set, document) => set.add(document), DocumentSet.empty);
  }

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  add(document: PdfDocument): DocumentSet {
    const occurrence = this.entries.filter((entry) => entry.document.name === document.name).length + 1;
    const displayName = occurrence === 1 ? document.name : `${document.name} (${occurrence})`;
    return new DocumentSet([...this.entries, Object.freeze({ document, displayName })]);
  }
}
