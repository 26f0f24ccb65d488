#!/usr/bin/env node
import path from 'node:path';

import { Gateway } from './application.js';
import { parseCliArgs, renderCliUsage } from './cli.js';
import { config } from './config/index.js';
import { loadSettings } from './config/loader.js';

import { logError, logInfo } from './services/logger.js';

import {
  createShutdownHandler,
  registerSignalHandlers,
} from './http/server-shutdown.js';

import { getErrorMessage, toError } from './utils/error-utils.js';

process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logError('Unhandled rejection', toError(reason));
});

const command = parseCliArgs(process.argv.slice(2));

if (command.kind === 'invalid') {
  process.stderr.write(`${command.message}\n\n${renderCliUsage()}`);
  process.exit(2);
}

if (command.kind === 'help') {
  process.stdout.write(renderCliUsage());
  process.exit(0);
}

if (command.kind === 'version') {
  process.stdout.write(`${config.server.version}\n`);
  process.exit(0);
}

const configPath =
  'configPath' in command && command.configPath
    ? path.resolve(command.configPath)
    : config.server.configPath;

async function checkConfiguration(filePath: string): Promise<void> {
  try {
    const settings = await loadSettings(filePath);
    process.stdout.write(
      `${filePath}: ok (${settings.hosts.length} hosts, ${settings.upstreams.length} upstreams)\n`
    );
    process.exit(0);
  } catch (error: unknown) {
    process.stderr.write(`${getErrorMessage(error)}\n`);
    process.exit(1);
  }
}

if (command.kind === 'check') {
  await checkConfiguration(configPath);
}

const gateway = new Gateway({ configPath });

try {
  await gateway.start();
  logInfo(`${config.server.name} ${config.server.version} started`, {
    config: configPath,
    listeners: gateway.addresses().length,
  });
} catch (error: unknown) {
  logError('Failed to start gateway', toError(error));
  process.exit(1);
}

registerSignalHandlers(createShutdownHandler(gateway), () => gateway.reload());
