/**
 * Production container: Azure AI Language for detection, an
 * OpenAI-compatible assistants endpoint for grounding.
 * Configuration errors surface on the first request after a cold start.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig, type Env } from './config.js';
import { AzureLanguageDetectionProvider } from './providers/AzureLanguageDetectionProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { OpenAIAgentProvider } from './providers/OpenAIAgentProvider.js';

let cached: Container | null = null;

export function getProductionContainer(env: Env = process.env): Container {
  if (cached) return cached;

  const config = loadConfig(env);

  const logProvider = new ConsoleLogProvider({
    outputToConsole: true,
    minLevel: config.logLevel,
    bufferEvents: false,
  });

  cached = createContainer({
    detectionProvider: new AzureLanguageDetectionProvider({
      endpoint: config.detection.endpoint,
      apiKey: config.detection.apiKey,
    }),
    agentProvider: new OpenAIAgentProvider({
      endpoint: config.agent.endpoint,
      apiKey: config.agent.apiKey,
      apiVersion: config.agent.apiVersion,
    }),
    logProvider,
    pipelineConfig: config.pipeline,
    groundingSettings: {
      agentName: config.agent.agentName,
      model: config.agent.model,
      instructions: config.agent.instructions,
      agentId: config.agent.agentId,
      enableGrounding: config.pipeline.enableGrounding,
      groundingConnectionId: config.agent.bingConnectionId,
      runTimeoutMs: config.agent.runTimeoutMs,
      pollIntervalMs: config.agent.pollIntervalMs,
    },
  });

  return cached;
}
