import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  PDF_CONTEXT_CONFIG,
  parseConfig,
  pdfContextConfigSchema,
  type PdfContextConfig,
  type PdfContextConfigInput
} from '../../../config/pdf-context.config';
import {
  CHAT_COMPLETIONS_TRANSPORT,
  mapProviderError,
  type ChatCompletionsTransport
} from '../../../shared/ai/chat-completions.transport';
import { ContextBuilder } from '../context/context-builder';
import { DocumentLoader, type PdfSource } from '../document/document-loader.service';
import type { PdfDocument } from '../document/pdf-document';
import type { QueryResult } from '../pdf-context.types';
import { normalizeCompletion } from './completion-normalizer';
import { previewPayload } from './payload-preview';

/**
 * Loads PDFs, builds one multimodal request from them and returns the normalized answer.
 * Each call owns its documents and builder; only the configuration is shared.
 */
@Injectable()
export class PdfQueryEngine {
  private readonly log = new Logger(PdfQueryEngine.name);
  readonly config: Readonly<PdfContextConfig>;

  constructor(
    private readonly loader: DocumentLoader,
    @Inject(CHAT_COMPLETIONS_TRANSPORT) private readonly transport: ChatCompletionsTransport,
    @Inject(PDF_CONTEXT_CONFIG) config: PdfContextConfigInput
  ) {
    this.config = parseConfig('pdf-context', pdfContextConfigSchema, config);
  }

  createContextBuilder(): ContextBuilder {
    return new ContextBuilder(this.config.builder);
  }

  loadDocument(source: PdfSource): Promise<PdfDocument> {
    return this.loader.load(source, this.config.loader);
  }

  async query(pdfPath: PdfSource, question: string): Promise<QueryResult> {
    const document = await this.loadDocument(pdfPath);
    return this.queryDocuments([document], question);
  }

  /** Sources load concurrently; their pages still appear in the order given. */
  async queryMultiple(pdfPaths: PdfSource[], question: string): Promise<QueryResult> {
    const documents = await Promise.all(pdfPaths.map((path) => this.loadDocument(path)));
    return this.queryDocuments(documents, question);
  }

  queryDocument(document: PdfDocument, question: string): Promise<QueryResult> {
    return this.queryDocuments([document], question);
  }

  private async queryDocuments(documents: PdfDocument[], question: string): Promise<QueryResult> {
    const builder = documents.reduce((acc, document) => acc.addDocument(document), this.createContextBuilder());
    const { model, maxTokens, temperature, timeoutMs, verbose } = this.config.engine;

    const payload = builder.buildRequestPayload(question, model, maxTokens, temperature);
    if (verbose) {
      this.log.log(`request payload:\n${previewPayload(payload)}`);
    }

    let raw: unknown;
    try {
      raw = await this.transport.complete(payload, { timeoutMs });
    } catch (error) {
      throw mapProviderError(error);
    }
    const result = normalizeCompletion(raw, model);
    this.log.debug(
      `answered documents=${documents.length} model=${result.model} finish=${result.finishReason} totalTokens=${result.usage.total_tokens}`
    );
    return result;
  }
}
