/**
 * Grounded agent provider interface.
 * Wraps a hosted assistants-style agent service: agents, threads, messages
 * and runs. Transport failures surface as ServiceError, unknown ids as
 * NotFoundError. Run outcomes are reported as data, never thrown.
 */

export interface AgentSpec {
  name: string;
  model: string;
  instructions: string;
  /** Attach the web-search grounding tool. */
  enableGrounding: boolean;
  groundingConnectionId: string | null;
}

export interface AgentRecord {
  id: string;
  createdAt: Date;
}

export interface ThreadRecord {
  id: string;
  createdAt: Date;
}

export type RunStatus =
  | 'queued'
  | 'in_progress'
  | 'requires_action'
  | 'cancelling'
  | 'cancelled'
  | 'failed'
  | 'completed'
  | 'incomplete'
  | 'expired';

export interface RunSnapshot {
  id: string;
  status: RunStatus;
  lastError: { code: string; message: string } | null;
}

export interface AgentTextBlock {
  text: string;
  /** Provider-native annotation objects; narrowed by the citation extractor. */
  annotations: readonly unknown[];
}

export interface AgentMessage {
  id: string;
  content: AgentTextBlock[];
}

export interface IAgentProvider {
  createAgent(spec: AgentSpec): Promise<AgentRecord>;
  getAgent(agentId: string): Promise<AgentRecord>;
  deleteAgent(agentId: string): Promise<void>;

  createThread(): Promise<ThreadRecord>;
  getThread(threadId: string): Promise<ThreadRecord>;
  deleteThread(threadId: string): Promise<void>;

  addUserMessage(threadId: string, text: string): Promise<void>;

  startRun(threadId: string, agentId: string): Promise<RunSnapshot>;
  getRun(threadId: string, runId: string): Promise<RunSnapshot>;
  cancelRun(threadId: string, runId: string): Promise<void>;

  /** Most recent assistant message produced by `runId`, or null if none. */
  getRunAnswer(threadId: string, runId: string): Promise<AgentMessage | null>;
}
