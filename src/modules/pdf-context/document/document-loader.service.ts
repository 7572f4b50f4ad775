import { Inject, Injectable, Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { PDFDocument as PdfLibDocument } from 'pdf-lib';

import { loaderConfigSchema, parseConfig, type LoaderConfigInput } from '../../../config/pdf-context.config';
import { RenderError, SourceError } from '../pdf-context.errors';
import type { PageContent } from '../pdf-context.types';
import { PdfDocument } from './pdf-document';
import { PDF_RASTERIZER, type PdfRasterizer, type RasterizedPdf, type RenderedPage } from './pdf-rasterizer.types';

export type PdfSource = string | { name: string; data: Uint8Array };

/** Pages whose trimmed text is this short or shorter (a bare page number, a stray glyph) count as image-only. */
export const MIN_TEXT_CHARS = 3;

export const classifyHasText = (text: string) => text.trim().length > MIN_TEXT_CHARS;

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error ?? 'unknown error'));

@Injectable()
export class DocumentLoader {
  private readonly log = new Logger(DocumentLoader.name);

  constructor(@Inject(PDF_RASTERIZER) private readonly rasterizer: PdfRasterizer) {}

  async load(source: PdfSource, options: LoaderConfigInput = {}): Promise<PdfDocument> {
    const { dpi, imageFormat } = parseConfig('document loader', loaderConfigSchema, options);
    const sourceId = typeof source === 'string' ? source : source.name;
    const data = await this.readSource(source);

    const expectedPages = await this.countPages(sourceId, data);
    const opened = await this.open(sourceId, data);

    try {
      if (opened.pageCount !== expectedPages) {
        this.log.warn(`${sourceId}: rasterizer sees ${opened.pageCount} pages, structure has ${expectedPages}`);
      }

      const pages: PageContent[] = [];
      for (let pageNumber = 1; pageNumber <= opened.pageCount; pageNumber += 1) {
        pages.push(await this.loadPage(sourceId, opened, pageNumber, dpi, imageFormat));
      }

      if (!pages.length) {
        this.log.warn(`${sourceId} has no pages`);
      }
      this.log.debug(`loaded ${sourceId} pages=${pages.length} dpi=${dpi} format=${imageFormat}`);

      return new PdfDocument({ sourceId, dpi, imageFormat, pages });
    } finally {
      await opened.close();
    }
  }

  private async readSource(source: PdfSource): Promise<Uint8Array> {
    if (typeof source !== 'string') {
      return source.data;
    }
    try {
      return await readFile(source);
    } catch (error) {
      throw new SourceError({ sourceId: source, message: `cannot read file (${errorMessage(error)})`, cause: error });
    }
  }

  private async countPages(sourceId: string, data: Uint8Array): Promise<number> {
    try {
      const parsed = await PdfLibDocument.load(data, { ignoreEncryption: true, updateMetadata: false });
      return parsed.getPageCount();
    } catch (error) {
      throw new SourceError({ sourceId, message: `not a valid PDF (${errorMessage(error)})`, cause: error });
    }
  }

  private async open(sourceId: string, data: Uint8Array): Promise<RasterizedPdf> {
    try {
      return await this.rasterizer.open(data);
    } catch (error) {
      throw new SourceError({ sourceId, message: `cannot open PDF (${errorMessage(error)})`, cause: error });
    }
  }

  private async loadPage(
    sourceId: string,
    opened: RasterizedPdf,
    pageNumber: number,
    dpi: number,
    imageFormat: PdfDocument['imageFormat']
  ): Promise<PageContent> {
    let text: string;
    try {
      text = await opened.extractText(pageNumber);
    } catch (error) {
      throw new SourceError({
        sourceId,
        message: `text extraction failed on page ${pageNumber} (${errorMessage(error)})`,
        cause: error
      });
    }

    let rendered: RenderedPage;
    try {
      rendered = await opened.renderPage(pageNumber, dpi, imageFormat);
    } catch (error) {
      throw new RenderError({ sourceId, pageNumber, message: errorMessage(error), cause: error });
    }
    if (!rendered.data.length) {
      throw new RenderError({ sourceId, pageNumber, message: 'rasterizer returned an empty image' });
    }

    return {
      pageNumber,
      text,
      hasText: classifyHasText(text),
      image: rendered.data,
      width: rendered.width,
      height: rendered.height
    };
  }
}
