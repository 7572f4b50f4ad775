import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

export const IMAGE_FORMATS = ['png', 'jpeg'] as const;
export type ImageFormat = (typeof IMAGE_FORMATS)[number];

export const IMAGE_DETAILS = ['low', 'high', 'auto'] as const;
export type ImageDetail = (typeof IMAGE_DETAILS)[number];

export const isImageDetail = (value: string): value is ImageDetail => IMAGE_DETAILS.some((level) => level === value);

export type ImageMimeType = 'image/png' | 'image/jpeg';

export const imageMimeType = (format: ImageFormat): ImageMimeType =>
  format === 'jpeg' ? 'image/jpeg' : 'image/png';

export type PageContent = {
  readonly pageNumber: number;
  readonly text: string;
  readonly hasText: boolean;
  readonly image: Buffer;
  readonly width: number;
  readonly height: number;
};

export type TextContentPart = {
  readonly type: 'text';
  readonly text: string;
};

export type ImageContentPart = {
  readonly type: 'image';
  readonly image: Buffer;
  readonly mimeType: ImageMimeType;
  readonly detail: ImageDetail;
};

export type ContentPart = TextContentPart | ImageContentPart;

export type ChatMessage = ChatCompletionMessageParam;

export type RequestPayload = {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
};

export type FinishReason = 'stop' | 'length' | 'other';

export type TokenUsage = Readonly<Record<string, number>> & {
  readonly prompt_tokens: number;
  readonly completion_tokens: number;
  readonly total_tokens: number;
};

export type QueryResult = {
  readonly answer: string;
  readonly model: string;
  readonly usage: TokenUsage;
  readonly finishReason: FinishReason;
  readonly isTruncated: boolean;
  readonly rawResponse: unknown;
};
