/**
 * Grounded-conversation orchestrator.
 * Drives one query through agent → thread → message → run → answer, and hands
 * the answer to the citation extractor.
 *
 * Only DetectionResult.redactedText is ever sent to the agent. A rejected
 * result is refused before the provider is touched.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import {
  GroundingError,
  GroundingTimeoutError,
  RejectionError,
  ThreadBusyError,
} from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { RunSnapshot, RunStatus, ThreadRecord } from '../providers/IAgentProvider.js';
import type { Conversation, DetectionResult, GroundedResponse } from '../types/models.js';
import { extractCitations } from './CitationExtractor.js';
import type { GroundingContext } from './GroundingContext.js';
import { GroundingSession } from './GroundingSession.js';

const PENDING_STATUSES: ReadonlySet<RunStatus> = new Set([
  'queued',
  'in_progress',
  'requires_action',
  'cancelling',
]);

export class ConversationOrchestrator {
  constructor(
    private readonly context: GroundingContext,
    private readonly logProvider: ILogProvider
  ) {}

  async ground(detection: DetectionResult, threadId?: string): Promise<GroundedResponse> {
    if (detection.shouldReject) {
      throw new RejectionError(detection.entities.length);
    }

    const { provider } = this.context;
    const session = new GroundingSession(this.logProvider);
    let claimed: string | null = null;

    try {
      const agent = await this.context.ensureAgent();
      session.transition('AgentReady', { agentId: agent.id });

      let thread: ThreadRecord;
      if (threadId) {
        claimed = this.claimThread(threadId);
        thread = await provider.getThread(threadId);
      } else {
        thread = await provider.createThread();
        claimed = this.claimThread(thread.id);
      }
      const conversation: Conversation = {
        agentId: agent.id,
        threadId: thread.id,
        createdAt: thread.createdAt,
      };
      session.transition('ThreadOpen', { threadId: conversation.threadId, continued: Boolean(threadId) });

      await provider.addUserMessage(conversation.threadId, detection.redactedText);
      session.transition('MessageSubmitted', { messageLength: detection.redactedText.length });

      const started = await provider.startRun(conversation.threadId, conversation.agentId);
      session.transition('Running', { runId: started.id });

      const run = await this.waitForRun(conversation.threadId, started);
      const answer = await provider.getRunAnswer(conversation.threadId, run.id);
      if (!answer) {
        throw new GroundingError('Agent run completed without an answer', { runId: run.id });
      }

      const extracted = extractCitations(answer.content);
      session.transition('Completed', { runId: run.id });

      this.logProvider.info('Grounded query complete', {
        threadId: conversation.threadId,
        runId: run.id,
        answerLength: extracted.answerText.length,
        citationCount: extracted.citations.length,
        groundingUsed: extracted.groundingUsed,
      });

      return Object.freeze({
        answerText: extracted.answerText,
        citations: Object.freeze(extracted.citations),
        threadId: conversation.threadId,
        runId: run.id,
        groundingUsed: extracted.groundingUsed,
      });
    } catch (err) {
      session.fail(err);
      this.logProvider.error('Grounded query failed', {
        state: session.history[session.history.length - 2],
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    } finally {
      if (claimed) this.context.releaseThread(claimed);
    }
  }

  /** Delete a conversation thread. Refused while a run is in flight on it. */
  async deleteThread(threadId: string): Promise<void> {
    if (this.context.isThreadActive(threadId)) {
      throw new ThreadBusyError(threadId);
    }
    await this.context.provider.deleteThread(threadId);
    this.logProvider.info('Thread deleted', { threadId });
  }

  // ── Private ──

  private claimThread(threadId: string): string {
    if (!this.context.tryAcquireThread(threadId)) {
      throw new ThreadBusyError(threadId);
    }
    return threadId;
  }

  /**
   * Poll until the run leaves the pending statuses or the deadline passes.
   * Each status request is raced against the time left, so a slow poll cannot
   * outlast the deadline. On timeout the run is cancelled and nothing it
   * produced is surfaced.
   */
  private async waitForRun(threadId: string, started: RunSnapshot): Promise<RunSnapshot> {
    const { runTimeoutMs, pollIntervalMs } = this.context.settings;
    const deadline = Date.now() + runTimeoutMs;
    let run = started;

    while (PENDING_STATUSES.has(run.status)) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw await this.timeOut(threadId, run.id, runTimeoutMs);
      }

      if (run.status === 'requires_action') {
        this.logProvider.debug('Agent run is invoking tools', { runId: run.id });
      }

      await sleep(Math.min(pollIntervalMs, remaining));
      const next = await this.pollBefore(threadId, run.id, deadline);
      if (!next) {
        throw await this.timeOut(threadId, run.id, runTimeoutMs);
      }
      run = next;
    }

    if (run.status !== 'completed') {
      throw new GroundingError(`Agent run ended with status "${run.status}"`, {
        runId: run.id,
        status: run.status,
        ...(run.lastError && { errorCode: run.lastError.code, errorMessage: run.lastError.message }),
      });
    }

    return run;
  }

  /** Fetch the run, or null if the deadline passes first. */
  private async pollBefore(threadId: string, runId: string, deadline: number): Promise<RunSnapshot | null> {
    const remaining = deadline - Date.now();
    if (remaining <= 0) return null;

    const timer = new AbortController();
    try {
      return await Promise.race([
        this.context.provider.getRun(threadId, runId),
        sleep(remaining, null, { signal: timer.signal }),
      ]);
    } finally {
      timer.abort();
    }
  }

  private async timeOut(threadId: string, runId: string, timeoutMs: number): Promise<GroundingTimeoutError> {
    await this.cancelQuietly(threadId, runId);
    return new GroundingTimeoutError(runId, timeoutMs);
  }

  private async cancelQuietly(threadId: string, runId: string): Promise<void> {
    try {
      await this.context.provider.cancelRun(threadId, runId);
    } catch (err) {
      this.logProvider.warn('Failed to cancel timed-out run', {
        runId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
