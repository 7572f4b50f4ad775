import 'reflect-metadata';

export * from './config/pdf-context.config';
export * from './modules/pdf-context/pdf-context.errors';
export * from './modules/pdf-context/pdf-context.types';
export * from './modules/pdf-context/pdf-context.module';
export * from './modules/pdf-context/document/pdf-document';
export * from './modules/pdf-context/document/pdf-rasterizer.types';
export * from './modules/pdf-context/document/document-loader.service';
export * from './modules/pdf-context/document/pdfjs-rasterizer';
export * from './modules/pdf-context/context/citation.prompt';
export * from './modules/pdf-context/context/document-set';
export * from './modules/pdf-context/context/content-format';
export * from './modules/pdf-context/context/context-builder';
export * from './modules/pdf-context/query/completion-normalizer';
export * from './modules/pdf-context/query/payload-preview';
export * from './modules/pdf-context/query/query-engine.service';
export * from './shared/ai/chat-completions.transport';
