import { Module, type DynamicModule } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';

import {
  PDF_CONTEXT_CONFIG,
  loadPdfContextConfig,
  parseConfig,
  pdfContextConfigSchema,
  type PdfContextConfig,
  type PdfContextConfigInput
} from '../../config/pdf-context.config';
import { CHAT_COMPLETIONS_TRANSPORT, OpenAiChatTransport } from '../../shared/ai/chat-completions.transport';
import { DocumentLoader } from './document/document-loader.service';
import { PDF_RASTERIZER } from './document/pdf-rasterizer.types';
import { PdfJsRasterizer } from './document/pdfjs-rasterizer';
import { PdfQueryEngine } from './query/query-engine.service';

// An override left undefined keeps the environment value.
const definedOnly = (values: object = {}): Record<string, unknown> =>
  Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));

const mergeConfig = (base: PdfContextConfig, overrides: PdfContextConfigInput): PdfContextConfig =>
  parseConfig('pdf-context', pdfContextConfigSchema, {
    loader: { ...base.loader, ...definedOnly(overrides.loader) },
    builder: { ...base.builder, ...definedOnly(overrides.builder) },
    engine: { ...base.engine, ...definedOnly(overrides.engine) }
  });

@Module({})
export class PdfContextModule {
  /** Settings come from the environment; `overrides` win over it section by section. */
  static forRoot(overrides: PdfContextConfigInput = {}): DynamicModule {
    return {
      module: PdfContextModule,
      imports: [ConfigModule],
      providers: [
        {
          provide: PDF_CONTEXT_CONFIG,
          inject: [ConfigService],
          useFactory: (config: ConfigService) =>
            mergeConfig(
              loadPdfContextConfig((key) => config.get<string>(key)),
              overrides
            )
        },
        { provide: PDF_RASTERIZER, useClass: PdfJsRasterizer },
        {
          provide: CHAT_COMPLETIONS_TRANSPORT,
          inject: [PDF_CONTEXT_CONFIG],
          useFactory: ({ engine }: PdfContextConfig) =>
            new OpenAiChatTransport({ apiKey: engine.apiKey, baseUrl: engine.baseUrl, maxRetries: engine.maxRetries })
        },
        DocumentLoader,
        PdfQueryEngine
      ],
      exports: [PdfQueryEngine, DocumentLoader, PDF_CONTEXT_CONFIG]
    };
  }
}
