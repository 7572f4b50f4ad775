export type PdfContextStage = 'load' | 'build' | 'remote' | 'config';

export class PdfContextError extends Error {
  readonly stage: PdfContextStage;

  constructor(stage: PdfContextStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

/** The input is not a readable PDF. */
export class SourceError extends PdfContextError {
  readonly sourceId: string;

  constructor(params: { sourceId: string; message: string; cause?: unknown }) {
    super('load', `${params.sourceId}: ${params.message}`, { cause: params.cause });
    this.sourceId = params.sourceId;
  }
}

/** The rasterizer could not produce an image for a page; the whole load is abandoned. */
export class RenderError extends PdfContextError {
  readonly sourceId: string;
  readonly pageNumber: number;

  constructor(params: { sourceId: string; pageNumber: number; message: string; cause?: unknown }) {
    super('load', `${params.sourceId} page ${params.pageNumber}: ${params.message}`, { cause: params.cause });
    this.sourceId = params.sourceId;
    this.pageNumber = params.pageNumber;
  }
}

export class PageRangeError extends PdfContextError {
  readonly pageNumber: number;
  readonly pageCount: number;

  constructor(pageNumber: number, pageCount: number) {
    super('load', `Page ${pageNumber} out of range. Document has ${pageCount} pages.`);
    this.pageNumber = pageNumber;
    this.pageCount = pageCount;
  }
}

export class EmptyContextError extends PdfContextError {
  constructor() {
    super('build', 'No documents added. Use addDocument() first.');
  }
}

export class InvalidConfigError extends PdfContextError {
  readonly issues: string[];

  constructor(scope: string, issues: string[]) {
    super('config', `Invalid ${scope} configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export type ProviderErrorType =
  | 'rate_limit'
  | 'timeout'
  | 'auth'
  | 'invalid_request'
  | 'server'
  | 'malformed_response'
  | 'unknown';

export class ProviderError extends PdfContextError {
  readonly type: ProviderErrorType;
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(params: {
    type: ProviderErrorType;
    message: string;
    status?: number;
    retryAfterMs?: number;
    cause?: unknown;
  }) {
    super('remote', params.message, { cause: params.cause });
    this.type = params.type;
    this.status = params.status;
    this.retryAfterMs = params.retryAfterMs;
  }

  isRetryable() {
    return ['rate_limit', 'timeout', 'server'].includes(this.type);
  }
}
