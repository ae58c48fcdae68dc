/**
 * Process-wide grounding context.
 * Constructed once at startup and passed by reference to the orchestrator.
 * Holds the only shared mutable state of the core: the lazily resolved agent
 * handle and the set of threads with a run in flight.
 */

import type { AgentRecord, IAgentProvider } from '../providers/IAgentProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';

export interface GroundingSettings {
  agentName: string;
  model: string;
  instructions: string;
  /** Reuse an existing agent instead of creating one. */
  agentId: string | null;
  enableGrounding: boolean;
  groundingConnectionId: string | null;
  runTimeoutMs: number;
  pollIntervalMs: number;
}

export class GroundingContext {
  private agentPromise: Promise<AgentRecord> | null = null;
  private readonly activeThreads = new Set<string>();

  constructor(
    readonly provider: IAgentProvider,
    readonly settings: Readonly<GroundingSettings>,
    private readonly logProvider: ILogProvider
  ) {}

  /**
   * Get-or-create the agent. Concurrent first callers share the same
   * in-flight promise, so the provider sees exactly one create (or lookup).
   * A failed attempt clears the guard; the next caller tries again.
   */
  ensureAgent(): Promise<AgentRecord> {
    if (this.agentPromise) return this.agentPromise;

    const attempt: Promise<AgentRecord> = this.resolveAgent().catch((err: unknown) => {
      if (this.agentPromise === attempt) this.agentPromise = null;
      throw err;
    });
    this.agentPromise = attempt;
    return attempt;
  }

  /** Delete the agent this process created and forget the handle. */
  async resetAgent(): Promise<void> {
    const pending = this.agentPromise;
    this.agentPromise = null;
    if (!pending || this.settings.agentId) return;

    const agent = await pending.catch(() => null);
    if (!agent) return;

    await this.provider.deleteAgent(agent.id);
    this.logProvider.info('Agent deleted', { agentId: agent.id });
  }

  /** Claim a thread for one run. False when a run is already in flight on it. */
  tryAcquireThread(threadId: string): boolean {
    if (this.activeThreads.has(threadId)) return false;
    this.activeThreads.add(threadId);
    return true;
  }

  releaseThread(threadId: string): void {
    this.activeThreads.delete(threadId);
  }

  isThreadActive(threadId: string): boolean {
    return this.activeThreads.has(threadId);
  }

  private async resolveAgent(): Promise<AgentRecord> {
    const { settings } = this;

    if (settings.agentId) {
      const agent = await this.provider.getAgent(settings.agentId);
      this.logProvider.info('Using existing agent', { agentId: agent.id });
      return agent;
    }

    if (settings.enableGrounding && !settings.groundingConnectionId) {
      this.logProvider.warn('Web grounding enabled without a connection id; creating agent without search tool');
    }

    const agent = await this.provider.createAgent({
      name: settings.agentName,
      model: settings.model,
      instructions: settings.instructions,
      enableGrounding: settings.enableGrounding,
      groundingConnectionId: settings.groundingConnectionId,
    });
    this.logProvider.info('Agent created', {
      agentId: agent.id,
      model: settings.model,
      grounding: settings.enableGrounding,
    });
    return agent;
  }
}
