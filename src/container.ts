/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * Production passes the Azure and agent-service providers; tests pass mocks.
 */

import type { PipelineConfig } from './config.js';
import type { IAgentProvider } from './providers/IAgentProvider.js';
import type { IEntityDetectionProvider } from './providers/IEntityDetectionProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { Middleware } from './middleware/pipeline.js';
import { DetectionService } from './services/DetectionService.js';
import { ConversationOrchestrator } from './services/ConversationOrchestrator.js';
import { GroundingContext, type GroundingSettings } from './services/GroundingContext.js';
import { GuardedQueryService } from './services/GuardedQueryService.js';
import { createLoggingMiddleware } from './middleware/logging.js';

export interface Container {
  detectionService: DetectionService;
  groundingContext: GroundingContext;
  orchestrator: ConversationOrchestrator;
  guardedQueryService: GuardedQueryService;
  logProvider: ILogProvider;
  logging: Middleware;
}

export function createContainer(deps: {
  detectionProvider: IEntityDetectionProvider;
  agentProvider: IAgentProvider;
  logProvider: ILogProvider;
  pipelineConfig: PipelineConfig;
  groundingSettings: GroundingSettings;
}): Container {
  const detectionService = new DetectionService(
    deps.detectionProvider,
    deps.logProvider.child({ component: 'detection' }),
    deps.pipelineConfig
  );
  const groundingLog = deps.logProvider.child({ component: 'grounding' });
  const groundingContext = new GroundingContext(
    deps.agentProvider,
    Object.freeze({ ...deps.groundingSettings }),
    groundingLog
  );
  const orchestrator = new ConversationOrchestrator(groundingContext, groundingLog);
  const guardedQueryService = new GuardedQueryService(
    detectionService,
    orchestrator,
    deps.logProvider
  );
  const logging = createLoggingMiddleware(deps.logProvider);

  return {
    detectionService,
    groundingContext,
    orchestrator,
    guardedQueryService,
    logProvider: deps.logProvider,
    logging,
  };
}
