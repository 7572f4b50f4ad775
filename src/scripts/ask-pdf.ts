#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { parseArgs } from 'node:util';

import { AppModule } from '../app.module';
import type { PdfContextConfigInput } from '../config/pdf-context.config';
import { IMAGE_DETAILS, isImageDetail } from '../modules/pdf-context/pdf-context.types';
import { PdfQueryEngine } from '../modules/pdf-context/query/query-engine.service';

const USAGE = `Usage: ask-pdf [options] <file.pdf> [more.pdf ...] --question "..."

Options:
  -q, --question <text>   question to ask (required)
  -m, --model <id>        model id (default from LLM_MODEL or gpt-4o)
      --base-url <url>    OpenAI-compatible endpoint, e.g. https://openrouter.ai/api/v1
      --dpi <n>           page render resolution
      --detail <level>    image detail: low | high | auto
      --no-text           send page images only
  -v, --verbose           print the request payload (images truncated)`;

function readOverrides(values: Record<string, string | boolean | undefined>): PdfContextConfigInput {
  const str = (key: string) => {
    const value = values[key];
    return typeof value === 'string' ? value : undefined;
  };
  const dpi = str('dpi');
  const detail = str('detail');
  if (detail !== undefined && !isImageDetail(detail)) {
    throw new Error(`--detail must be one of ${IMAGE_DETAILS.join(', ')}`);
  }

  return {
    loader: { dpi: dpi === undefined ? undefined : Number(dpi) },
    builder: {
      imageDetail: detail,
      includeTextLayer: values['no-text'] ? false : undefined
    },
    engine: {
      model: str('model'),
      baseUrl: str('base-url'),
      verbose: values.verbose ? true : undefined
    }
  };
}

async function bootstrap() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      question: { type: 'string', short: 'q' },
      model: { type: 'string', short: 'm' },
      'base-url': { type: 'string' },
      dpi: { type: 'string' },
      detail: { type: 'string' },
      'no-text': { type: 'boolean' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' }
    }
  });

  if (values.help || !positionals.length || !values.question) {
    // eslint-disable-next-line no-console
    console.log(USAGE);
    process.exitCode = values.help ? 0 : 1;
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule.forRoot(readOverrides(values)), {
    logger: values.verbose ? ['log', 'warn', 'error', 'debug'] : ['warn', 'error']
  });

  try {
    const engine = app.get(PdfQueryEngine);
    const result =
      positionals.length === 1
        ? await engine.query(positionals[0], values.question)
        : await engine.queryMultiple(positionals, values.question);

    // eslint-disable-next-line no-console
    console.log(result.answer);
    // eslint-disable-next-line no-console
    console.log(`\n[model=${result.model} tokens=${result.usage.total_tokens} finish=${result.finishReason}]`);
    if (result.isTruncated) {
      // eslint-disable-next-line no-console
      console.warn('WARNING: response was truncated by the max token limit');
    }
  } finally {
    await app.close();
  }
}

bootstrap().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
