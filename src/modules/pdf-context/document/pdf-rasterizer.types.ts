import type { ImageFormat } from '../pdf-context.types';

export const PDF_RASTERIZER = Symbol('PDF_RASTERIZER');

export type RenderedPage = {
  data: Buffer;
  width: number;
  height: number;
};

/** An opened PDF. Page numbers are 1-based. */
export interface RasterizedPdf {
  readonly pageCount: number;
  extractText(pageNumber: number): Promise<string>;
  renderPage(pageNumber: number, dpi: number, format: ImageFormat): Promise<RenderedPage>;
  close(): Promise<void>;
}

export interface PdfRasterizer {
  open(data: Uint8Array): Promise<RasterizedPdf>;
}
