import type { ChatCompletionContentPart } from 'openai/resources/chat/completions';

import type { BuilderConfig } from '../../../config/pdf-context.config';
import { EmptyContextError } from '../pdf-context.errors';
import {
  imageMimeType,
  type ChatMessage,
  type ContentPart,
  type ImageContentPart,
  type PageContent,
  type RequestPayload
} from '../pdf-context.types';
import { citationSystemPrompt } from './citation.prompt';
import type { DocumentEntry, DocumentSet } from './document-set';

export type ContentFormatOptions = Readonly<BuilderConfig>;

export const pageLabel = (page: PageContent, displayName: string) => `Page ${page.pageNumber} of ${displayName}:`;

export const questionText = (question: string) => `Question: ${question}`;

function pageParts(entry: DocumentEntry, page: PageContent, options: ContentFormatOptions): ContentPart[] {
  const parts: ContentPart[] = [{ type: 'text', text: pageLabel(page, entry.displayName) }];

  if (options.includeTextLayer && page.hasText) {
    parts.push({ type: 'text', text: page.text });
  }

  parts.push({
    type: 'image',
    image: page.image,
    mimeType: imageMimeType(entry.document.imageFormat),
    detail: options.imageDetail
  });

  return parts;
}

export function buildContentParts(set: DocumentSet, question: string, options: ContentFormatOptions): ContentPart[] {
  const parts = set.entries.flatMap((entry) => entry.document.pages.flatMap((page) => pageParts(entry, page, options)));
  parts.push({ type: 'text', text: questionText(question) });
  return parts;
}

export function buildSystemPrompt(set: DocumentSet, options: ContentFormatOptions): string {
  const prompt = options.systemPrompt ?? citationSystemPrompt;
  if (!options.includeDocumentIndex) {
    return prompt;
  }

  const index = set.entries.map(
    ({ document, displayName }) =>
      `- ${displayName}: ${document.pageCount} page${document.pageCount === 1 ? '' : 's'} (source: ${document.sourceId})`
  );
  return [prompt, '', '## Document index', ...index].join('\n');
}

export const imageDataUrl = (part: ImageContentPart) => `data:${part.mimeType};base64,${part.image.toString('base64')}`;

export function toWirePart(part: ContentPart): ChatCompletionContentPart {
  if (part.type === 'text') {
    return { type: 'text', text: part.text };
  }
  return { type: 'image_url', image_url: { url: imageDataUrl(part), detail: part.detail } };
}

export function buildMessages(set: DocumentSet, question: string, options: ContentFormatOptions): ChatMessage[] {
  if (set.isEmpty) {
    throw new EmptyContextError();
  }

  return [
    { role: 'system', content: buildSystemPrompt(set, options) },
    { role: 'user', content: buildContentParts(set, question, options).map(toWirePart) }
  ];
}

export function buildRequestPayload(
  set: DocumentSet,
  params: { question: string; model: string; maxTokens: number; temperature?: number },
  options: ContentFormatOptions
): RequestPayload {
  return {
    model: params.model,
    messages: buildMessages(set, params.question, options),
    max_tokens: params.maxTokens,
    temperature: params.temperature ?? 0
  };
}
