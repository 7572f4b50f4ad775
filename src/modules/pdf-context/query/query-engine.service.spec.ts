import { Logger } from '@nestjs/common';

import { FakeRasterizer, fakeImage, type FakePdf } from '../../../../test/helpers/fake-rasterizer';
import { createPdfBytes, makeDocument } from '../../../../test/helpers/pdf-fixtures';
import type { PdfContextConfigInput } from '../../../config/pdf-context.config';
import type { ChatCompletionsTransport } from '../../../shared/ai/chat-completions.transport';
import { DocumentLoader } from '../document/document-loader.service';
import { EmptyContextError, ProviderError, RenderError } from '../pdf-context.errors';
import type { RequestPayload } from '../pdf-context.types';
import { PdfQueryEngine } from './query-engine.service';

const completion = (content: string, finishReason = 'stop') => ({
  model: 'gpt-4o-2024-08-06',
  choices: [{ message: { role: 'assistant', content }, finish_reason: finishReason }],
  usage: { prompt_tokens: 900, completion_tokens: 40, total_tokens: 940 }
});

type Source = { name: string; data: Uint8Array };

async function source(name: string, fake: FakePdf, registry: Map<Uint8Array, FakePdf & { label: string }>) {
  const data = await createPdfBytes(fake.pages.length);
  registry.set(data, { label: name, ...fake });
  return { name, data };
}

function setup(config: PdfContextConfigInput = {}) {
  const registry = new Map<Uint8Array, FakePdf & { label: string }>();
  const rasterizer = new FakeRasterizer((data) => {
    const fake = registry.get(data);
    if (!fake) throw new Error('unknown test document');
    return fake;
  });
  const sent: RequestPayload[] = [];
  const complete = jest.fn(async (payload: RequestPayload): Promise<unknown> => {
    sent.push(payload);
    return completion('Revenue grew 20% [p.1, q1.pdf].');
  });
  const transport: ChatCompletionsTransport = { complete };
  const engine = new PdfQueryEngine(new DocumentLoader(rasterizer), transport, config);
  const add = (name: string, fake: FakePdf): Promise<Source> => source(name, fake, registry);
  return { engine, rasterizer, complete, sent, add };
}

const userContent = (payload: RequestPayload) => {
  const user = payload.messages[1];
  return user.role === 'user' && Array.isArray(user.content) ? user.content : [];
};

describe('PdfQueryEngine', () => {
  it('answers a question about a mixed text and scanned document', async () => {
    const { engine, sent, add } = setup();
    const q1 = await add('q1.pdf', { pages: [{ text: 'Revenue grew 20%' }, { text: '' }] });

    const result = await engine.queryMultiple([q1], 'What grew?');

    expect(result).toMatchObject({
      answer: 'Revenue grew 20% [p.1, q1.pdf].',
      model: 'gpt-4o-2024-08-06',
      usage: { prompt_tokens: 900, completion_tokens: 40, total_tokens: 940 },
      finishReason: 'stop',
      isTruncated: false
    });
    expect(sent).toHaveLength(1);
    expect(sent[0].model).toBe('gpt-4o');
    expect(sent[0].max_tokens).toBe(4096);
    expect(sent[0].temperature).toBe(0);

    const parts = userContent(sent[0]);
    expect(parts.map((part) => part.type)).toEqual(['text', 'text', 'image_url', 'text', 'image_url', 'text']);
    expect(parts[0]).toEqual({ type: 'text', text: 'Page 1 of q1.pdf:' });
    expect(parts[1]).toEqual({ type: 'text', text: 'Revenue grew 20%' });
    expect(parts[2]).toEqual({
      type: 'image_url',
      image_url: { url: `data:image/png;base64,${fakeImage('q1.pdf', 1).toString('base64')}`, detail: 'high' }
    });
    expect(parts[3]).toEqual({ type: 'text', text: 'Page 2 of q1.pdf:' });
    expect(parts[5]).toEqual({ type: 'text', text: 'Question: What grew?' });
  });

  it('keeps caller order even when later documents finish loading first', async () => {
    const { engine, sent, add } = setup();
    const slow = await add('first.pdf', { pages: [{ text: 'First doc text' }], openDelayMs: 30 });
    const fast = await add('second.pdf', { pages: [{ text: 'Second doc text' }] });

    await engine.queryMultiple([slow, fast], 'Compare');

    const labels = userContent(sent[0]).flatMap((part) =>
      part.type === 'text' && part.text.startsWith('Page ') ? [part.text] : []
    );
    expect(labels).toEqual(['Page 1 of first.pdf:', 'Page 1 of second.pdf:']);
  });

  it('aborts the whole call when any document fails to load', async () => {
    const { engine, complete, add } = setup();
    const good = await add('good.pdf', { pages: [{ text: 'Fine page' }] });
    const bad = await add('bad.pdf', { pages: [{ text: '', renderError: 'rasterizer crashed' }] });

    await expect(engine.queryMultiple([good, bad], 'q')).rejects.toBeInstanceOf(RenderError);
    expect(complete).not.toHaveBeenCalled();
  });

  it('refuses to send a request without documents', async () => {
    const { engine, complete } = setup();

    await expect(engine.queryMultiple([], 'q')).rejects.toBeInstanceOf(EmptyContextError);
    expect(complete).not.toHaveBeenCalled();
  });

  it('applies loader, builder and engine settings', async () => {
    const { engine, rasterizer, sent, complete, add } = setup({
      loader: { dpi: 96, imageFormat: 'jpeg' },
      builder: { includeTextLayer: false, imageDetail: 'auto', systemPrompt: 'Answer briefly.' },
      engine: { model: 'openai/gpt-4o', maxTokens: 512, temperature: 0.3, timeoutMs: 15_000 }
    });
    const doc = await add('deck.pdf', { pages: [{ text: 'Slide text here' }] });

    await engine.query(doc, 'Summarize');

    expect(rasterizer.renderCalls).toEqual([{ pageNumber: 1, dpi: 96, format: 'jpeg' }]);
    expect(complete).toHaveBeenCalledWith(sent[0], { timeoutMs: 15_000 });
    expect(sent[0]).toMatchObject({ model: 'openai/gpt-4o', max_tokens: 512, temperature: 0.3 });
    expect(sent[0].messages[0]).toEqual({ role: 'system', content: 'Answer briefly.' });
    expect(userContent(sent[0])).toEqual([
      { type: 'text', text: 'Page 1 of deck.pdf:' },
      {
        type: 'image_url',
        image_url: { url: `data:image/jpeg;base64,${fakeImage('deck.pdf', 1, 'jpeg').toString('base64')}`, detail: 'auto' }
      },
      { type: 'text', text: 'Question: Summarize' }
    ]);
  });

  it('queries an already loaded document', async () => {
    const { engine, rasterizer, sent } = setup();

    const result = await engine.queryDocument(makeDocument('notes.pdf', ['Meeting notes']), 'Who attended?');

    expect(result.answer).toBe('Revenue grew 20% [p.1, q1.pdf].');
    expect(rasterizer.openCount).toBe(0);
    expect(userContent(sent[0])).toHaveLength(4);
  });

  it('reports truncated answers', async () => {
    const { engine, complete } = setup();
    complete.mockResolvedValueOnce(completion('The report says', 'length'));

    const result = await engine.queryDocument(makeDocument('long.pdf', ['Long text body']), 'Summarize');

    expect(result.finishReason).toBe('length');
    expect(result.isTruncated).toBe(true);
  });

  it('wraps transport failures as ProviderError', async () => {
    const { engine, complete } = setup();
    complete.mockRejectedValueOnce(Object.assign(new Error('Bad gateway'), { status: 502 }));

    const error = await engine.queryDocument(makeDocument('a.pdf', ['Some text']), 'q').catch((err) => err);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ type: 'server', status: 502, stage: 'remote' });
  });

  it('rejects malformed provider responses', async () => {
    const { engine, complete } = setup();
    complete.mockResolvedValueOnce({ error: { message: 'overloaded' } });

    await expect(engine.queryDocument(makeDocument('a.pdf', ['Some text']), 'q')).rejects.toMatchObject({
      type: 'malformed_response'
    });
  });

  it('echoes the payload with truncated images in verbose mode', async () => {
    const log = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    const { engine } = setup({ engine: { verbose: true } });

    await engine.queryDocument(makeDocument('v.pdf', ['Verbose page']), 'q');

    expect(log).toHaveBeenCalledTimes(1);
    const [message] = log.mock.calls[0];
    expect(message).toContain('request payload:');
    expect(message).toContain('[BASE64 TRUNCATED]');
    log.mockRestore();
  });
});
