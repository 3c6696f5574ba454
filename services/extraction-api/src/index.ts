/**
 * Extraction API entry point
 */

import { config, logger, registerSecrets, secretsOf } from '@policy-extract/shared';
import { createApp } from './app';
import { buildServiceComponents } from './lib/pipeline';

registerSecrets(secretsOf(config));

const { pipeline, providers } = buildServiceComponents(config);
const app = createApp({ config, pipeline, providers });

// Start server
const server = app.listen(config.port, () => {
  logger.info('Extraction API started', {
    port: config.port,
    deployment_mode: config.deploymentMode,
    prompt_variant: config.promptVariant,
    status: pipeline ? 'healthy' : 'degraded',
  });
});

// Shutdown on SIGTERM/SIGINT
function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close((error) => {
    if (error) {
      logger.error('Error while closing server', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
