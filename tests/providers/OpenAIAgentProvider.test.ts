import { describe, it, expect, beforeEach, vi } from 'vitest';
import { OpenAIAgentProvider } from '../../src/providers/OpenAIAgentProvider.js';
import { NotFoundError, ServiceError } from '../../src/errors.js';

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function errorResponse(status: number, message: string): Response {
  return jsonResponse({ error: { message, type: 'invalid_request_error', code: null } }, status);
}

describe('OpenAIAgentProvider', () => {
  let provider: OpenAIAgentProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    provider = new OpenAIAgentProvider({
      endpoint: 'https://agents.test/',
      apiKey: 'test-key',
      apiVersion: '2025-05-01',
      fetch: mockFetch,
    });
  });

  describe('createAgent', () => {
    it('should attach the web grounding tool when enabled with a connection', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ id: 'asst_1', created_at: 1700000000 }));

      const agent = await provider.createAgent({
        name: 'TestAssistant',
        model: 'test-model',
        instructions: 'Answer briefly.',
        enableGrounding: true,
        groundingConnectionId: 'conn-test',
      });

      expect(agent).toEqual({ id: 'asst_1', createdAt: new Date(1700000000 * 1000) });
      const [url, init] = mockFetch.mock.calls[0];
      expect(String(url)).toBe('https://agents.test/assistants?api-version=2025-05-01');
      expect(JSON.parse(init.body)).toEqual({
        model: 'test-model',
        name: 'TestAssistant',
        instructions: 'Answer briefly.',
        tools: [
          {
            type: 'bing_grounding',
            bing_grounding: { search_configurations: [{ connection_id: 'conn-test' }] },
          },
        ],
      });
    });

    it('should create the agent without tools when grounding is disabled', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ id: 'asst_2', created_at: 1700000000 }));

      await provider.createAgent({
        name: 'TestAssistant',
        model: 'test-model',
        instructions: 'Answer briefly.',
        enableGrounding: false,
        groundingConnectionId: 'conn-test',
      });

      expect(JSON.parse(mockFetch.mock.calls[0][1].body).tools).toEqual([]);
    });
  });

  describe('runs', () => {
    it('should map run status and last error', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          id: 'run_1',
          object: 'thread.run',
          status: 'failed',
          last_error: { code: 'server_error', message: 'model overloaded' },
        })
      );

      const run = await provider.getRun('thread_1', 'run_1');

      expect(run).toEqual({
        id: 'run_1',
        status: 'failed',
        lastError: { code: 'server_error', message: 'model overloaded' },
      });
    });
  });

  describe('getRunAnswer', () => {
    it('should return the text blocks of the newest assistant message', async () => {
      const annotation = {
        type: 'url_citation',
        text: '【3:0†source】',
        url_citation: { url: 'https://diet.example', title: 'Diet' },
      };
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          object: 'list',
          data: [
            {
              id: 'msg_2',
              role: 'assistant',
              content: [
                { type: 'image_file', image_file: { file_id: 'file_1' } },
                { type: 'text', text: { value: 'Eat vegetables【3:0†source】.', annotations: [annotation] } },
              ],
            },
          ],
          first_id: 'msg_2',
          last_id: 'msg_2',
          has_more: false,
        })
      );

      const answer = await provider.getRunAnswer('thread_1', 'run_1');

      expect(answer).toEqual({
        id: 'msg_2',
        content: [{ text: 'Eat vegetables【3:0†source】.', annotations: [annotation] }],
      });
    });

    it('should return null when the run produced no assistant message', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ object: 'list', data: [], first_id: null, last_id: null, has_more: false })
      );

      await expect(provider.getRunAnswer('thread_1', 'run_1')).resolves.toBeNull();
    });
  });

  describe('errors', () => {
    it('should map 404 to NotFoundError', async () => {
      mockFetch.mockResolvedValueOnce(errorResponse(404, 'No thread found'));

      const err = await provider.getThread('thread_missing').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(NotFoundError);
      expect(err).toMatchObject({ message: 'Thread "thread_missing" not found' });
    });

    it('should map throttling to a retryable ServiceError', async () => {
      mockFetch.mockResolvedValueOnce(errorResponse(429, 'Rate limit reached'));

      const err = await provider.createThread().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ServiceError);
      expect(err).toMatchObject({ retryable: true, details: { service: 'agent', status: 429 } });
    });

    it('should map auth failures to a non-retryable ServiceError', async () => {
      mockFetch.mockResolvedValueOnce(errorResponse(401, 'Invalid key'));

      const err = await provider.createThread().catch((e: unknown) => e);

      expect(err).toMatchObject({ retryable: false, details: { status: 401 } });
    });

    it('should map transport failures to a retryable ServiceError', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      const err = await provider.createThread().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ServiceError);
      expect(err).toMatchObject({ message: 'Agent service unreachable', retryable: true });
    });
  });
});
