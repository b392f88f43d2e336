#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import { A2AServer } from './A2AServer.js';
import { buildAgentCard } from './agentCard.js';
import { loadConfig } from './config.js';
import { MissingApiKeyError, errorMessage } from './errors.js';
import { log, setLogLevel } from './logger.js';
import { OpenAIChatClient } from './OpenAIChatClient.js';
import { WeatherAgent } from './WeatherAgent.js';
import { WeatherTaskManager } from './WeatherTaskManager.js';

// Load environment variables
dotenv.config();

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError(`Invalid port "${value}"`);
  }
  return port;
}

async function main(host: string, port: number): Promise<void> {
  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const agent = new WeatherAgent(new OpenAIChatClient({ apiKey: config.apiKey, model: config.model }));
    const taskManager = new WeatherTaskManager(agent, { timeoutMs: config.timeoutMs });

    const server = new A2AServer({
      agentCard: buildAgentCard(host, port),
      taskManager,
      host,
      port,
    });

    log.info(`🚀 Starting weather agent on ${host}:${port} (model: ${config.model})`);
    await server.start();
  } catch (error) {
    if (error instanceof MissingApiKeyError) {
      log.error(`❌ Error: ${error.message}`);
    } else {
      log.error(`❌ An error occurred during server startup: ${errorMessage(error)}`);
    }
    process.exit(1);
  }
}

const program = new Command()
  .name('a2a-weather-agent')
  .description('Start the A2A weather agent server')
  .option('--host <host>', 'host to bind the server to', 'localhost')
  .option('--port <port>', 'port to run the server on', parsePort, 10000)
  .action(async (opts: { host: string; port: number }) => {
    await main(opts.host, opts.port);
  });

await program.parseAsync();
