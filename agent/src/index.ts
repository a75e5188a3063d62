/**
 * Git Rollout Agent - Main Entry Point
 *
 * Watches one branch of a Git repository and rollout-restarts the
 * Deployments mapped to the paths that changed.
 */

// Load environment variables FIRST, before any other imports
import './env-loader.js';

import { loadConfig } from '@git-rollout/config';
import { redactUrl } from '@git-rollout/gitops';
import { logger, setLogLevel } from '@git-rollout/logger';
import { classifyError } from '@git-rollout/resilience';
import { createAgent } from './agent.js';
import { AgentServer } from './server.js';
import { addCleanupFunction, initializeGracefulShutdown } from './utils/graceful-shutdown.js';

async function main(): Promise<void> {
  initializeGracefulShutdown();

  const config = loadConfig();
  setLogLevel(config.logLevel);

  logger.info({
    repository: redactUrl(config.git.repository),
    branch: config.git.branch,
    namespace: config.rollout.namespace,
    pollIntervalMs: config.pollIntervalMs,
    mappingFile: config.rollout.mappingFile
  }, 'Starting git rollout agent');

  const { loop, metrics } = await createAgent(config);

  addCleanupFunction(() => loop.stop());

  if (config.httpPort > 0) {
    const server = new AgentServer({ loop, registry: metrics.registry, version: process.env.npm_package_version });
    await server.listen(config.httpPort);
    addCleanupFunction(() => server.close());
  }

  const report = await loop.start();
  logger.info({ outcome: report.outcome, revision: report.revision }, 'First cycle complete, polling');
}

main().catch((error: unknown) => {
  const agentError = classifyError(error, 'startup');
  logger.fatal({ error: agentError.toJSON() }, `Agent startup failed: ${agentError.message}`);
  process.exit(1);
});
