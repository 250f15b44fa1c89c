/**
 * @file test/openai.test.ts
 * @description OpenAI Responses client, Mailjet client and the production agent gateway (fetch mocked)
 */

import { z } from 'zod';
import { OpenAIService } from '../src/services/openai';
import { MailjetService } from '../src/services/mailjet';
import { createOpenAIAgentGateway } from '../src/services/agents/openaiGateway';
import { SEARCHER_INSTRUCTIONS } from '../src/config';
import { AIProviderError, DeliveryProviderError, MalformedOutputError } from '../src/types/errors';

const OPENAI_URL = 'https://openai.test/v1';
const MAILJET_URL = 'https://mailjet.test/v3.1';

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function outputText(text: string): Response {
  return jsonResponse({
    id: 'resp_1',
    output: [
      { type: 'web_search_call' },
      { type: 'message', content: [{ type: 'output_text', text }] },
    ],
    usage: { input_tokens: 12, output_tokens: 7 },
  });
}

function createOpenAI(): OpenAIService {
  return new OpenAIService({ apiKey: 'test-secret', baseUrl: OPENAI_URL, model: 'gpt-4o-mini', maxOutputTokens: 800 });
}

function createMailer(): MailjetService {
  return new MailjetService({
    apiUrl: MAILJET_URL,
    apiKey: 'test-key',
    apiSecret: 'test-secret',
    from: 'reports@example.com',
  });
}

function requestBody(spy: jest.SpyInstance, index: number = 0): Record<string, unknown> {
  const init: RequestInit | undefined = spy.mock.calls[index][1];
  return JSON.parse(String(init?.body));
}

afterEach(() => {
  jest.restoreAllMocks();
});

describe('OpenAIService', () => {
  it('should post a tool-enabled completion and return the output text', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(outputText('Vacancy rates rose to 20%.'));

    const result = await createOpenAI().complete('Search: office vacancy', {
      instructions: 'Summarize',
      tools: [{ type: 'web_search_preview', search_context_size: 'low' }],
    });

    expect(result).toEqual({ content: 'Vacancy rates rose to 20%.', usage: { input: 12, output: 7 } });
    expect(fetchSpy.mock.calls[0][0]).toBe(`${OPENAI_URL}/responses`);
    expect(fetchSpy.mock.calls[0][1]?.headers).toEqual({
      'Authorization': 'Bearer test-secret',
      'Content-Type': 'application/json',
    });
    expect(requestBody(fetchSpy)).toEqual({
      model: 'gpt-4o-mini',
      input: 'Search: office vacancy',
      instructions: 'Summarize',
      max_output_tokens: 800,
      tools: [{ type: 'web_search_preview', search_context_size: 'low' }],
      tool_choice: 'required',
    });
  });

  it('should request a strict JSON schema and parse the payload', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(outputText('{"questions":["Where?"]}'));

    const result = await createOpenAI().completeJson('kelp forests', {
      jsonSchema: { name: 'clarifying_questions', schema: { type: 'object' } },
      parser: z.object({ questions: z.array(z.string()) }),
    });

    expect(result.data).toEqual({ questions: ['Where?'] });
    expect(requestBody(fetchSpy).text).toEqual({
      format: { type: 'json_schema', name: 'clarifying_questions', schema: { type: 'object' }, strict: true },
    });
  });

  it('should accept JSON wrapped in a markdown code block', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(outputText('```json\n{"questions":[]}\n```'));

    const result = await createOpenAI().completeJson('kelp forests', {
      jsonSchema: { name: 'clarifying_questions', schema: {} },
      parser: z.object({ questions: z.array(z.string()) }),
    });

    expect(result.data).toEqual({ questions: [] });
  });

  it('should throw AIProviderError on an HTTP error', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('boom', { status: 500 }));

    const call = createOpenAI().complete('Search: kelp');

    await expect(call).rejects.toBeInstanceOf(AIProviderError);
    await expect(call).rejects.toThrow('AI Provider error (openai): HTTP 500: boom');
  });

  it('should throw MalformedOutputError when the output text is not JSON', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(outputText('I cannot help with that'));

    await expect(
      createOpenAI().completeJson('kelp', {
        jsonSchema: { name: 'x', schema: {} },
        parser: z.object({ questions: z.array(z.string()) }),
      })
    ).rejects.toThrow(new MalformedOutputError('openai', 'response is not valid JSON'));
  });

  it('should throw MalformedOutputError when the payload has the wrong shape', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(outputText('{"questions":"Where?"}'));

    await expect(
      createOpenAI().completeJson('kelp', {
        jsonSchema: { name: 'x', schema: {} },
        parser: z.object({ questions: z.array(z.string()) }),
      })
    ).rejects.toThrow(/^Malformed output from openai: questions: /);
  });

  it('should throw MalformedOutputError when the response has no output text', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(jsonResponse({ output: [] }));

    await expect(createOpenAI().complete('Search: kelp')).rejects.toThrow(
      'Malformed output from openai: response contained no output text'
    );
  });
});

describe('MailjetService', () => {
  it('should send with basic auth and return the message id', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(
      jsonResponse({ Messages: [{ Status: 'success', To: [{ Email: 'reader@example.com', MessageID: 4242 }] }] })
    );

    const result = await createMailer().send({ to: 'reader@example.com', subject: 'Report', html: '<h1>Hi</h1>' });

    expect(result).toEqual({ messageId: '4242' });
    expect(fetchSpy.mock.calls[0][0]).toBe(`${MAILJET_URL}/send`);
    expect(fetchSpy.mock.calls[0][1]?.headers).toEqual({
      'Authorization': `Basic ${Buffer.from('test-key:test-secret').toString('base64')}`,
      'Content-Type': 'application/json',
    });
    expect(requestBody(fetchSpy)).toEqual({
      Messages: [
        {
          From: { Email: 'reports@example.com' },
          To: [{ Email: 'reader@example.com' }],
          Subject: 'Report',
          HTMLPart: '<h1>Hi</h1>',
        },
      ],
    });
  });

  it('should refuse to send without credentials', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch');
    const mailer = new MailjetService({ apiUrl: MAILJET_URL, apiKey: '', apiSecret: '', from: '' });

    await expect(mailer.send({ to: 'reader@example.com', subject: 'Report', html: '<p/>' })).rejects.toBeInstanceOf(
      DeliveryProviderError
    );
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should report the API error message on a rejected message', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(
      jsonResponse({ Messages: [{ Status: 'error', Errors: [{ ErrorMessage: 'Invalid recipient' }] }] })
    );

    await expect(
      createMailer().send({ to: 'nobody', subject: 'Report', html: '<p/>' })
    ).rejects.toThrow('Delivery provider error (mailjet): Invalid recipient');
  });
});

describe('OpenAI agent gateway', () => {
  function createGateway() {
    return createOpenAIAgentGateway({
      openai: createOpenAI(),
      mailer: createMailer(),
      questionCount: 3,
      searchCount: 3,
    });
  }

  it('should run the searcher with the hosted web search tool', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(outputText('Kelp is declining.'));

    const outcome = await createGateway().invoke('searcher', 'Search: kelp\nReason: trends', { requestId: 'req-1' });

    expect(outcome).toEqual({ ok: true, value: 'Kelp is declining.' });
    const body = requestBody(fetchSpy);
    expect(body.instructions).toBe(SEARCHER_INSTRUCTIONS);
    expect(body.tools).toEqual([{ type: 'web_search_preview', search_context_size: 'low' }]);
    expect(body.tool_choice).toBe('required');
  });

  it('should map the writer payload to a report', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(
      outputText(
        JSON.stringify({
          short_summary: 'Kelp is declining.',
          markdown_report: '# Kelp\n\nDeclining.',
          follow_up_questions: 'What about otters?',
        })
      )
    );

    const outcome = await createGateway().invoke('writer', 'Original query: kelp');

    expect(outcome).toEqual({
      ok: true,
      value: { shortSummary: 'Kelp is declining.', markdownBody: '# Kelp\n\nDeclining.', followUps: 'What about otters?' },
    });
  });

  it('should tag an HTTP failure as a provider fault', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('boom', { status: 500 }));

    await expect(createGateway().invoke('planner', 'Query: kelp')).resolves.toEqual({
      ok: false,
      fault: { role: 'planner', kind: 'provider', message: 'AI Provider error (openai): HTTP 500: boom' },
    });
  });

  it('should tag unparseable output as a malformed_output fault', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(outputText('Sure! Here are some questions.'));

    await expect(createGateway().invoke('clarifier', 'kelp')).resolves.toEqual({
      ok: false,
      fault: {
        role: 'clarifier',
        kind: 'malformed_output',
        message: 'Malformed output from openai: response is not valid JSON',
      },
    });
  });

  it('should compose the email and send it through Mailjet', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockImplementation(async input => {
      if (String(input).startsWith(MAILJET_URL)) {
        return jsonResponse({ Messages: [{ Status: 'success', To: [{ Email: 'reader@example.com', MessageID: 7 }] }] });
      }
      return outputText(JSON.stringify({ subject: 'Kelp report', html_body: '<h1>Kelp</h1>' }));
    });

    const outcome = await createGateway().invoke('delivery', {
      recipient: 'reader@example.com',
      shortSummary: 'Kelp is declining.',
      markdownBody: '# Kelp',
    });

    expect(outcome).toEqual({
      ok: true,
      value: { recipient: 'reader@example.com', subject: 'Kelp report', messageId: '7' },
    });
    expect(requestBody(fetchSpy, 0).input).toBe('# Kelp');
    expect(requestBody(fetchSpy, 1)).toMatchObject({
      Messages: [{ To: [{ Email: 'reader@example.com' }], Subject: 'Kelp report', HTMLPart: '<h1>Kelp</h1>' }],
    });
  });
});
