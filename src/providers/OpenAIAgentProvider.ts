/**
 * Agent provider over an OpenAI-compatible assistants API.
 * Points the OpenAI SDK at the agent service endpoint (e.g. an Azure AI
 * Foundry project) and maps SDK objects and errors onto the provider contract.
 *
 * SDK retries are disabled: the core never retries, callers decide.
 */

import OpenAI, { APIConnectionError, APIError, type ClientOptions } from 'openai';
import { NotFoundError, ServiceError } from '../errors.js';
import type {
  AgentMessage,
  AgentRecord,
  AgentSpec,
  AgentTextBlock,
  IAgentProvider,
  RunSnapshot,
  RunStatus,
  ThreadRecord,
} from './IAgentProvider.js';

const ASSISTANTS_BETA_HEADER = { 'OpenAI-Beta': 'assistants=v2' };
const ANSWER_PAGE_SIZE = 20;

interface BingGroundingTool {
  type: 'bing_grounding';
  bing_grounding: { search_configurations: Array<{ connection_id: string }> };
}

interface AgentCreateBody {
  model: string;
  name: string;
  instructions: string;
  tools: BingGroundingTool[];
}

interface CreatedAgent {
  id: string;
  created_at: number;
}

export interface OpenAIAgentProviderOptions {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  /** Per-request transport timeout. Default: 30s. */
  requestTimeoutMs?: number;
  /** Custom fetch implementation (tests, proxies). */
  fetch?: ClientOptions['fetch'];
}

export class OpenAIAgentProvider implements IAgentProvider {
  private readonly client: OpenAI;

  constructor(opts: OpenAIAgentProviderOptions) {
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.endpoint.replace(/\/+$/, ''),
      defaultQuery: { 'api-version': opts.apiVersion },
      maxRetries: 0,
      timeout: opts.requestTimeoutMs ?? 30_000,
      ...(opts.fetch && { fetch: opts.fetch }),
    });
  }

  async createAgent(spec: AgentSpec): Promise<AgentRecord> {
    const tools: BingGroundingTool[] =
      spec.enableGrounding && spec.groundingConnectionId
        ? [
            {
              type: 'bing_grounding',
              bing_grounding: {
                search_configurations: [{ connection_id: spec.groundingConnectionId }],
              },
            },
          ]
        : [];

    // The typed assistants.create() has no slot for service-side tools.
    const agent = await this.call(() =>
      this.client.post<AgentCreateBody, CreatedAgent>('/assistants', {
        body: {
          model: spec.model,
          name: spec.name,
          instructions: spec.instructions,
          tools,
        },
        headers: ASSISTANTS_BETA_HEADER,
      })
    );
    return { id: agent.id, createdAt: fromUnix(agent.created_at) };
  }

  async getAgent(agentId: string): Promise<AgentRecord> {
    const agent = await this.call(
      () => this.client.beta.assistants.retrieve(agentId),
      `Agent "${agentId}" not found`
    );
    return { id: agent.id, createdAt: fromUnix(agent.created_at) };
  }

  async deleteAgent(agentId: string): Promise<void> {
    await this.call(
      () => this.client.beta.assistants.del(agentId),
      `Agent "${agentId}" not found`
    );
  }

  async createThread(): Promise<ThreadRecord> {
    const thread = await this.call(() => this.client.beta.threads.create({}));
    return { id: thread.id, createdAt: fromUnix(thread.created_at) };
  }

  async getThread(threadId: string): Promise<ThreadRecord> {
    const thread = await this.call(
      () => this.client.beta.threads.retrieve(threadId),
      `Thread "${threadId}" not found`
    );
    return { id: thread.id, createdAt: fromUnix(thread.created_at) };
  }

  async deleteThread(threadId: string): Promise<void> {
    await this.call(
      () => this.client.beta.threads.del(threadId),
      `Thread "${threadId}" not found`
    );
  }

  async addUserMessage(threadId: string, text: string): Promise<void> {
    await this.call(
      () => this.client.beta.threads.messages.create(threadId, { role: 'user', content: text }),
      `Thread "${threadId}" not found`
    );
  }

  async startRun(threadId: string, agentId: string): Promise<RunSnapshot> {
    const run = await this.call(
      () => this.client.beta.threads.runs.create(threadId, { assistant_id: agentId }),
      `Thread "${threadId}" not found`
    );
    return toSnapshot(run);
  }

  async getRun(threadId: string, runId: string): Promise<RunSnapshot> {
    const run = await this.call(
      () => this.client.beta.threads.runs.retrieve(threadId, runId),
      `Run "${runId}" not found`
    );
    return toSnapshot(run);
  }

  async cancelRun(threadId: string, runId: string): Promise<void> {
    await this.call(
      () => this.client.beta.threads.runs.cancel(threadId, runId),
      `Run "${runId}" not found`
    );
  }

  async getRunAnswer(threadId: string, runId: string): Promise<AgentMessage | null> {
    const page = await this.call(
      () =>
        this.client.beta.threads.messages.list(threadId, {
          order: 'desc',
          limit: ANSWER_PAGE_SIZE,
          run_id: runId,
        }),
      `Thread "${threadId}" not found`
    );

    const message = page.data.find((m) => m.role === 'assistant');
    if (!message) return null;

    const content: AgentTextBlock[] = [];
    for (const block of message.content) {
      if (block.type === 'text') {
        content.push({ text: block.text.value, annotations: block.text.annotations });
      }
    }
    return { id: message.id, content };
  }

  // ── Private ──

  private async call<T>(fn: () => PromiseLike<T>, notFoundMessage?: string): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw toProviderError(err, notFoundMessage);
    }
  }
}

function fromUnix(seconds: number): Date {
  return new Date(seconds * 1000);
}

function toSnapshot(run: {
  id: string;
  status: RunStatus;
  last_error: { code: string; message: string } | null;
}): RunSnapshot {
  return {
    id: run.id,
    status: run.status,
    lastError: run.last_error ? { code: run.last_error.code, message: run.last_error.message } : null,
  };
}

function toProviderError(err: unknown, notFoundMessage?: string): Error {
  if (err instanceof APIConnectionError) {
    return new ServiceError('agent', 'Agent service unreachable', true, { cause: err.message });
  }

  if (err instanceof APIError) {
    const status = err.status;
    if (status === 404 && notFoundMessage) {
      return new NotFoundError(notFoundMessage);
    }
    const retryable = status === undefined || status === 408 || status === 409 || status === 429 || status >= 500;
    return new ServiceError('agent', `Agent service error (${status ?? 'no status'}): ${err.message}`, retryable, {
      ...(status !== undefined && { status }),
    });
  }

  return err instanceof Error ? err : new Error(String(err));
}
