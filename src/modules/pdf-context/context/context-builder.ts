import { Logger } from '@nestjs/common';

import { builderConfigSchema, parseConfig, type BuilderConfigInput } from '../../../config/pdf-context.config';
import type { PdfDocument } from '../document/pdf-document';
import type { ChatMessage, ContentPart, RequestPayload } from '../pdf-context.types';
import {
  buildContentParts,
  buildMessages,
  buildRequestPayload,
  type ContentFormatOptions
} from './content-format';
import { DocumentSet } from './document-set';

/**
 * Collects documents and turns them into chat-completions content.
 *
 * The builder only holds the current {@link DocumentSet}; every build call is a pure
 * function of that set, the question and the options fixed at construction.
 */
export class ContextBuilder {
  private readonly log = new Logger(ContextBuilder.name);
  readonly options: ContentFormatOptions;
  private set: DocumentSet = DocumentSet.empty;

  constructor(options: BuilderConfigInput = {}) {
    this.options = parseConfig('context builder', builderConfigSchema, options);
  }

  get documents(): DocumentSet {
    return this.set;
  }

  addDocument(document: PdfDocument): this {
    if (document.pageCount === 0) {
      this.log.warn(`Document ${document.sourceId} has no pages; it will contribute nothing to the context.`);
    }
    this.set = this.set.add(document);
    return this;
  }

  buildContentParts(question: string): ContentPart[] {
    return buildContentParts(this.set, question, this.options);
  }

  buildRequestPayload(question: string, model: string, maxTokens: number, temperature = 0): RequestPayload {
    return buildRequestPayload(this.set, { question, model, maxTokens, temperature }, this.options);
  }

  /** System and user messages, shaped as seed history for a conversational client to append turns to. */
  buildMessageHistory(question: string): ChatMessage[] {
    return buildMessages(this.set, question, this.options);
  }
}
