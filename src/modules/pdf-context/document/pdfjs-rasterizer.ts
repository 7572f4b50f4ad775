import { Injectable, Logger } from '@nestjs/common';
import { createCanvas, DOMMatrix, ImageData, Path2D, type Canvas, type SKRSContext2D } from '@napi-rs/canvas';
import { dirname, join, sep } from 'node:path';
import type { PDFDocumentProxy, PDFPageProxy } from 'pdfjs-dist';

import type { ImageFormat } from '../pdf-context.types';
import type { PdfRasterizer, RasterizedPdf, RenderedPage } from './pdf-rasterizer.types';

type PdfJs = typeof import('pdfjs-dist');
type PdfCanvasContext = Parameters<PDFPageProxy['render']>[0]['canvasContext'];
type CanvasAndContext = { canvas: Canvas; context: SKRSContext2D };

const POINTS_PER_INCH = 72;
const JPEG_QUALITY = 90;

let pdfjs: PdfJs | null = null;

/**
 * pdfjs looks for DOMMatrix/Path2D/ImageData on the global object and falls back to node-canvas;
 * @napi-rs/canvas provides all three, so install them before the library loads.
 */
function loadPdfJs(): PdfJs {
  if (!pdfjs) {
    for (const [name, value] of Object.entries({ DOMMatrix, ImageData, Path2D })) {
      if (!(name in globalThis)) {
        Object.assign(globalThis, { [name]: value });
      }
    }
    pdfjs = require('pdfjs-dist/legacy/build/pdf.js') as PdfJs;
  }
  return pdfjs;
}

const standardFontDataUrl = () => join(dirname(require.resolve('pdfjs-dist/package.json')), 'standard_fonts') + sep;

class NapiCanvasFactory {
  create(width: number, height: number): CanvasAndContext {
    const canvas = createCanvas(Math.max(1, width), Math.max(1, height));
    return { canvas, context: canvas.getContext('2d') };
  }

  reset(target: CanvasAndContext, width: number, height: number) {
    target.canvas.width = width;
    target.canvas.height = height;
  }

  destroy(target: CanvasAndContext) {
    target.canvas.width = 0;
    target.canvas.height = 0;
  }
}

/** Same line-joining rule pdf-parse applies: a change of baseline starts a new line. */
async function pageText(page: PDFPageProxy): Promise<string> {
  const content = await page.getTextContent();
  let text = '';
  let lastY: number | undefined;

  for (const item of content.items) {
    if (!('str' in item)) continue;
    const y = Number(item.transform[5]);
    text += lastY === undefined || lastY === y ? item.str : `\n${item.str}`;
    lastY = y;
  }

  return text;
}

async function encode(canvas: Canvas, format: ImageFormat): Promise<Buffer> {
  return format === 'jpeg' ? canvas.encode('jpeg', JPEG_QUALITY) : canvas.encode('png');
}

class PdfJsDocument implements RasterizedPdf {
  constructor(private readonly doc: PDFDocumentProxy) {}

  get pageCount(): number {
    return this.doc.numPages;
  }

  async extractText(pageNumber: number): Promise<string> {
    const page = await this.doc.getPage(pageNumber);
    try {
      return await pageText(page);
    } finally {
      page.cleanup();
    }
  }

  async renderPage(pageNumber: number, dpi: number, format: ImageFormat): Promise<RenderedPage> {
    const page = await this.doc.getPage(pageNumber);
    try {
      const viewport = page.getViewport({ scale: dpi / POINTS_PER_INCH });
      const width = Math.ceil(viewport.width);
      const height = Math.ceil(viewport.height);
      const canvas = createCanvas(width, height);
      const context = canvas.getContext('2d');

      context.fillStyle = '#ffffff';
      context.fillRect(0, 0, width, height);
      // pdfjs types the context as the DOM interface; the napi context implements the same surface.
      await page.render({ canvasContext: context as unknown as PdfCanvasContext, viewport }).promise;

      return { data: await encode(canvas, format), width, height };
    } finally {
      page.cleanup();
    }
  }

  async close(): Promise<void> {
    await this.doc.destroy();
  }
}

@Injectable()
export class PdfJsRasterizer implements PdfRasterizer {
  private readonly log = new Logger(PdfJsRasterizer.name);

  async open(data: Uint8Array): Promise<RasterizedPdf> {
    const lib = loadPdfJs();
    const params = {
      // pdfjs transfers the buffer to its worker; hand it a copy.
      data: new Uint8Array(data),
      isEvalSupported: false,
      disableFontFace: true,
      useSystemFonts: false,
      verbosity: 0,
      standardFontDataUrl: standardFontDataUrl(),
      canvasFactory: new NapiCanvasFactory()
    };
    const loadingTask = lib.getDocument(params);
    try {
      const doc = await loadingTask.promise;
      this.log.debug(`opened PDF pages=${doc.numPages}`);
      return new PdfJsDocument(doc);
    } catch (error) {
      await loadingTask.destroy();
      throw error;
    }
  }
}
