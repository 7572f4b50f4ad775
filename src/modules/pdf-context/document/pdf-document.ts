import { basename } from 'node:path';

import { PageRangeError } from '../pdf-context.errors';
import type { ImageFormat, PageContent } from '../pdf-context.types';

export class PdfDocument {
  readonly sourceId: string;
  readonly name: string;
  readonly dpi: number;
  readonly imageFormat: ImageFormat;
  readonly pages: readonly PageContent[];

  constructor(params: { sourceId: string; dpi: number; imageFormat: ImageFormat; pages: PageContent[] }) {
    this.sourceId = params.sourceId;
    this.name = basename(params.sourceId) || params.sourceId;
    this.dpi = params.dpi;
    this.imageFormat = params.imageFormat;
    this.pages = Object.freeze(params.pages.map((page) => Object.freeze({ ...page })));
    Object.freeze(this);
  }

  get pageCount(): number {
    return this.pages.length;
  }

  getPage(pageNumber: number): PageContent {
    const page = Number.isInteger(pageNumber) ? this.pages[pageNumber - 1] : undefined;
    if (!page) {
      throw new PageRangeError(pageNumber, this.pageCount);
    }
    return page;
  }
}
