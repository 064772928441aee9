#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { Aggregator } from './controllers/aggregator/index.js';
import { EventStreamer } from './services/event-streamer.js';
import { HealthChecker } from './services/health-checker.js';
import { HttpServer } from './services/http-server.js';
import { ConfigError, getErrorMessage } from './utils/errors.js';
import logger from './utils/logger.js';
import { NodeClient } from './utils/node-client/index.js';

// Load environment variables
dotenv.config();

let shuttingDown = false;
let healthChecker: HealthChecker | null = null;
let server: HttpServer | null = null;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.info(`Received ${signal}, shutting down...`);

  try {
    if (healthChecker) {
      await healthChecker.stop();
    }
    if (server) {
      await server.stop();
    }
  } catch (error) {
    logger.error(`Error during shutdown: ${getErrorMessage(error)}`);
    process.exit(1);
  }

  logger.info('Exiting...');
  process.exit(0);
}

// Register shutdown handlers
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

async function main() {
  const config = loadConfig();
  logger.info(
    `Starting cluster console for "${config.clusterName}" with ${config.nodes.length} node(s)`,
  );

  const clients = config.nodes.map(
    (node) =>
      new NodeClient(node.name, node.address, {
        timeoutMs: config.nodeTimeoutMs,
      }),
  );
  const aggregator = new Aggregator(clients);

  healthChecker = new HealthChecker(aggregator, {
    intervalMs: config.healthIntervalMs,
  });
  await healthChecker.start();

  server = new HttpServer(aggregator, {
    port: config.httpPort,
    eventStreamer: new EventStreamer(aggregator),
  });
  await server.start();

  logger.info('Cluster console is ready');
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    logger.error(`Invalid configuration: ${error.message}`);
  } else {
    logger.error(`Failed to start cluster console: ${getErrorMessage(error)}`);
  }
  process.exit(1);
});
