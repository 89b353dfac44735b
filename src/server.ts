#!/usr/bin/env node
import 'dotenv/config';
import type { Server } from 'http';
import { createStatusApp, startStatusServer } from './api/status.js';
import { parseCliArgs, USAGE } from './cli.js';
import type { CliOptions } from './cli.js';
import { loadNodeConfig } from './config/node.js';
import type { NodeConfig } from './config/node.js';
import { OscNode } from './core/node.js';
import { HttpSensorSource } from './services/SensorSource.js';
import { describeError } from './utils/errors.js';
import { logger, setVerbose } from './utils/logger.js';

const EXIT_OK = 0;
const EXIT_STARTUP_FAILURE = 1;
const EXIT_USAGE = 2;

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
  });
}

// Initialize and run the node; resolves with the process exit code
async function startServer(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(describeError(error));
    console.error(USAGE);
    return EXIT_USAGE;
  }

  if (options.help) {
    console.log(USAGE);
    return EXIT_OK;
  }

  setVerbose(options.verbose);

  let config: NodeConfig;
  try {
    config = loadNodeConfig(process.env);
  } catch (error) {
    logger.error(describeError(error));
    return EXIT_STARTUP_FAILURE;
  }

  const node = new OscNode({
    host: config.host,
    recvPort: config.recvPort,
    sendPort: config.sendPort,
    sensor: new HttpSensorSource(config.sensor),
  });

  try {
    await node.listen();
  } catch (error) {
    logger.error(`Failed to start OSC node: ${describeError(error)}`);
    return EXIT_STARTUP_FAILURE;
  }

  let statusServer: Server | null = null;
  if (config.statusPort !== undefined) {
    try {
      statusServer = await startStatusServer(createStatusApp(node), config.statusPort);
    } catch (error) {
      logger.error(`Failed to start status API: ${describeError(error)}`);
      await node.stop('status API failed to start');
      return EXIT_STARTUP_FAILURE;
    }
  }

  // Handle graceful shutdown
  const onSignal = (signal: NodeJS.Signals) => {
    node.stop(`received ${signal}`).catch((error: unknown) => {
      logger.error('Error during shutdown', { error: describeError(error) });
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  logger.info(`Replies go to port ${config.sendPort} on the sender's host`);
  await node.run();

  if (statusServer) {
    await closeServer(statusServer);
  }
  return EXIT_OK;
}

startServer().then(
  (code) => process.exit(code),
  (error: unknown) => {
    logger.error('Unexpected failure', { error: describeError(error) });
    process.exit(EXIT_STARTUP_FAILURE);
  }
);
