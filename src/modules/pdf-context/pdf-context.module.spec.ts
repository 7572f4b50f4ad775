import { ConfigModule } from '@nestjs/config';
import { Test, type TestingModule } from '@nestjs/testing';

import { FakeRasterizer } from '../../../test/helpers/fake-rasterizer';
import { createPdfBytes } from '../../../test/helpers/pdf-fixtures';
import { PDF_CONTEXT_CONFIG, type PdfContextConfig } from '../../config/pdf-context.config';
import { CHAT_COMPLETIONS_TRANSPORT, type ChatCompletionsTransport } from '../../shared/ai/chat-completions.transport';
import { PDF_RASTERIZER } from './document/pdf-rasterizer.types';
import { PdfContextModule } from './pdf-context.module';
import { PdfQueryEngine } from './query/query-engine.service';

describe('PdfContextModule', () => {
  let moduleRef: TestingModule;
  const complete = jest.fn<ReturnType<ChatCompletionsTransport['complete']>, Parameters<ChatCompletionsTransport['complete']>>();
  const rasterizer = new FakeRasterizer(() => ({ label: 'wired', pages: [{ text: 'Wired page text' }] }));

  beforeEach(async () => {
    complete.mockReset();
    complete.mockResolvedValue({
      model: 'test-model',
      choices: [{ message: { content: 'ok' }, finish_reason: 'stop' }]
    });

    moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ ignoreEnvFile: true }),
        PdfContextModule.forRoot({
          loader: { dpi: 72 },
          builder: { imageDetail: 'low' },
          engine: { model: 'test-model', maxTokens: 256 }
        })
      ]
    })
      .overrideProvider(PDF_RASTERIZER)
      .useValue(rasterizer)
      .overrideProvider(CHAT_COMPLETIONS_TRANSPORT)
      .useValue({ complete })
      .compile();
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('applies overrides on top of the environment', () => {
    const config = moduleRef.get<PdfContextConfig>(PDF_CONTEXT_CONFIG);

    expect(config.loader.dpi).toBe(72);
    expect(config.builder.imageDetail).toBe('low');
    expect(config.builder.includeTextLayer).toBe(true);
    expect(config.engine.model).toBe('test-model');
    expect(config.engine.maxTokens).toBe(256);
  });

  it('wires the engine to the loader and transport', async () => {
    const engine = moduleRef.get(PdfQueryEngine);

    const result = await engine.query({ name: 'wired.pdf', data: await createPdfBytes(1) }, 'Anything?');

    expect(result.answer).toBe('ok');
    expect(result.usage).toEqual({ prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 });
    expect(rasterizer.renderCalls).toContainEqual({ pageNumber: 1, dpi: 72, format: 'png' });
    expect(complete).toHaveBeenCalledTimes(1);
    const [payload] = complete.mock.calls[0];
    expect(payload).toMatchObject({ model: 'test-model', max_tokens: 256 });
  });
});

describe('PdfContextModule configuration', () => {
  const env = {
    LLM_MODEL: 'env-model',
    PDF_DPI: '96',
    PDF_CONTEXT_IMAGE_DETAIL: 'low',
    PDF_CONTEXT_VERBOSE: 'true'
  };
  const saved = new Map<string, string | undefined>();

  beforeAll(() => {
    for (const [key, value] of Object.entries(env)) {
      saved.set(key, process.env[key]);
      process.env[key] = value;
    }
  });

  afterAll(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  const configFor = async (overrides: Parameters<typeof PdfContextModule.forRoot>[0]) => {
    const moduleRef = await Test.createTestingModule({
      imports: [ConfigModule.forRoot({ ignoreEnvFile: true }), PdfContextModule.forRoot(overrides)]
    })
      .overrideProvider(PDF_RASTERIZER)
      .useValue(new FakeRasterizer(() => ({ label: 'unused', pages: [] })))
      .compile();
    const config = moduleRef.get<PdfContextConfig>(PDF_CONTEXT_CONFIG);
    await moduleRef.close();
    return config;
  };

  it('keeps environment values for overrides left undefined', async () => {
    const config = await configFor({
      loader: { dpi: undefined },
      builder: { imageDetail: undefined, includeTextLayer: undefined },
      engine: { model: undefined, baseUrl: undefined, verbose: undefined }
    });

    expect(config.loader.dpi).toBe(96);
    expect(config.builder.imageDetail).toBe('low');
    expect(config.builder.includeTextLayer).toBe(true);
    expect(config.engine.model).toBe('env-model');
    expect(config.engine.verbose).toBe(true);
  });

  it('lets defined overrides replace environment values', async () => {
    const config = await configFor({ loader: { dpi: 200 }, engine: { model: 'flag-model' } });

    expect(config.loader.dpi).toBe(200);
    expect(config.builder.imageDetail).toBe('low');
    expect(config.engine.model).toBe('flag-model');
  });
});
