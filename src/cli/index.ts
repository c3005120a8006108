#!/usr/bin/env node

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { MockServer } from '../core/server.js';
import { MockService } from '../core/mocker.js';
import { formatDuration } from '../core/delay.js';
import { createStore } from '../storage/factory.js';
import type { MockStore } from '../storage/base.js';
import { loadConfig, validateConfig, ConfigWatcher, type CliOptions } from '../config/index.js';
import { errorMessage } from '../errors/index.js';
import { isDisplayable } from '../reference/index.js';
import { NAME, VERSION } from '../version.js';
import { addHeaderOptions } from './headers.js';

const program = new Command();

// Colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
};

function log(message: string, color: keyof typeof colors = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function logInfo(label: string, value: string): void {
  console.log(`  ${colors.dim}${label}:${colors.reset} ${colors.cyan}${value}${colors.reset}`);
}

function fail(error: unknown): never {
  log(`Error: ${errorMessage(error)}`, 'red');
  process.exit(1);
}

function statusColor(status: number): string {
  return status >= 400 ? colors.red : colors.green;
}

interface StorageOptions {
  storage?: string;
  storageType?: string;
  config?: string;
}

/**
 * Open the store named by config file and CLI flags
 */
async function openStore(options: StorageOptions): Promise<MockStore> {
  const { config } = await loadConfig({
    storage: options.storage,
    storageType: options.storageType,
    config: options.config,
  });
  const store = createStore(config.storage);
  await store.init();
  return store;
}

interface NewOptions extends StorageOptions {
  status: string;
  contentType: string;
  charset: string;
  header: string[];
  body?: string;
  bodyFile?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

program
  .name(NAME)
  .description('Mock HTTP response server: register canned responses and replay them by id')
  .version(VERSION);

// ============================================================================
// START COMMAND
// ============================================================================
program
  .command('start')
  .description('Start the mock server')
  .option('-p, --port <port>', 'Server port')
  .option('-H, --host <host>', 'Interface to bind')
  .option('-s, --storage <path>', 'Storage directory (file) or database file (sqlite)')
  .option('--storage-type <type>', 'Storage type (file|sqlite)')
  .option('-d, --max-delay <duration>', 'Ceiling for requested delays, e.g. 30s')
  .option('-r, --max-records <n>', 'Keep only the n most recent mocks (0 keeps all)')
  .option('-c, --config <path>', 'Config file path')
  .option('--no-cors', 'Disable CORS')
  .option('-w, --watch', 'Reload delay and retention settings when the config file changes')
  .action(async (options) => {
    try {
      const cliOptions: CliOptions = {
        port: options.port,
        host: options.host,
        storage: options.storage,
        storageType: options.storageType,
        maxDelay: options.maxDelay,
        maxRecords: options.maxRecords,
        config: options.config,
        // commander defaults a --no-* flag to true; only an explicit --no-cors overrides the file
        cors: options.cors === false ? false : undefined,
      };
      const { config, path: configFile } = await loadConfig(cliOptions);

      const validation = validateConfig(config);
      if (!validation.valid) {
        for (const error of validation.errors) {
          log(`Error: ${error}`, 'red');
        }
        process.exit(1);
      }

      console.log('');
      log(`  ${NAME}`, 'bright');
      console.log('');

      const server = new MockServer(config, {
        onResponse: (res) => {
          const timestamp = new Date().toLocaleTimeString();
          console.log(
            `  ${colors.dim}${timestamp}${colors.reset} ${colors.magenta}${res.method}${colors.reset} ${res.path} ${statusColor(res.status)}${res.status}${colors.reset} ${colors.dim}${res.durationMs}ms${colors.reset}`
          );
        },
        onClean: (removed) => {
          log(`  Evicted ${removed} old mock(s)`, 'yellow');
        },
        onError: (error, context) => {
          log(`  Error (${context}): ${errorMessage(error)}`, 'red');
        },
      });

      await server.start();
      const address = server.address();
      const port = address?.port ?? config.port;

      console.log(`  ${colors.green}Server started${colors.reset}`);
      console.log('');
      if (configFile) {
        logInfo('Config', configFile);
      }
      logInfo('Port', String(port));
      logInfo('Storage', `${config.storage.path} (${config.storage.type})`);
      logInfo('Max delay', formatDuration(config.delay.max));
      logInfo('Max records', config.retention.maxRecords > 0 ? String(config.retention.maxRecords) : 'unlimited');
      logInfo('CORS', config.cors?.enabled ? 'enabled' : 'disabled');
      console.log('');
      log(`  Listening on http://localhost:${port}`, 'green');
      console.log('');
      logInfo('New', `POST http://localhost:${port}/v1/new?status=200&contentType=text/plain&charset=UTF-8`);
      logInfo('List', `http://localhost:${port}/v1/list`);
      logInfo('Get', `http://localhost:${port}/v1/{id}?delay=1s`);
      console.log('');

      const watcher = options.watch && configFile
        ? new ConfigWatcher(
            configFile,
            (update) => {
              server.applyConfig(update);
              log('  Config reloaded', 'cyan');
            },
            { onError: (error) => log(`  Config reload failed: ${error.message}`, 'red') }
          )
        : null;
      if (options.watch && !configFile) {
        log('  --watch ignored: no config file in use', 'yellow');
      }
      watcher?.start();

      log('  Press Ctrl+C to stop', 'dim');
      console.log('');

      // Handle graceful shutdown
      const shutdown = async (): Promise<void> => {
        console.log('');
        log('  Shutting down...', 'yellow');
        await watcher?.stop();
        await server.stop();
        log('  Server stopped', 'green');
        process.exit(0);
      };

      const onSignal = (): void => {
        shutdown().catch(fail);
      };
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);
    } catch (error) {
      fail(error);
    }
  });

// ============================================================================
// LIST COMMAND
// ============================================================================
program
  .command('list')
  .description('List stored mocks, newest first')
  .option('-s, --storage <path>', 'Storage directory or database file')
  .option('--storage-type <type>', 'Storage type (file|sqlite)')
  .option('-c, --config <path>', 'Config file path')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    try {
      const store = await openStore(options);
      const summaries = await new MockService(store).list();
      store.close();

      if (options.json) {
        console.log(JSON.stringify(summaries, null, 2));
        return;
      }

      console.log('');
      log('  Stored Mocks', 'bright');
      console.log('');

      if (summaries.length === 0) {
        log('  No mocks stored yet.', 'dim');
        console.log('');
        log('  Create one with:', 'dim');
        log(`  ${NAME} new --status 200 --content-type text/plain --body "Hello"`, 'cyan');
        console.log('');
        return;
      }

      logInfo('Count', String(summaries.length));
      console.log('');

      // Table header
      console.log(
        `  ${colors.dim}${'ID'.padEnd(38)} ${'STATUS'.padEnd(8)} ${'CONTENT TYPE'.padEnd(35)} CREATED${colors.reset}`
      );
      console.log(`  ${colors.dim}${'-'.repeat(105)}${colors.reset}`);

      for (const summary of summaries) {
        const status = String(summary.status).padEnd(8);
        console.log(
          `  ${colors.dim}${summary.id.padEnd(38)}${colors.reset} ${statusColor(summary.status)}${status}${colors.reset} ${summary.contentType.padEnd(35)} ${colors.dim}${summary.createdAt}${colors.reset}`
        );
      }

      console.log('');
    } catch (error) {
      fail(error);
    }
  });

// ============================================================================
// SHOW COMMAND
// ============================================================================
program
  .command('show <id>')
  .description('Print one mock')
  .option('-s, --storage <path>', 'Storage directory or database file')
  .option('--storage-type <type>', 'Storage type (file|sqlite)')
  .option('-c, --config <path>', 'Config file path')
  .action(async (id: string, options) => {
    try {
      const store = await openStore(options);
      const record = await new MockService(store).get(id);
      store.close();

      console.log('');
      logInfo('ID', record.id);
      logInfo('Created', record.createdAt);
      logInfo('Status', String(record.status));
      logInfo('Content-Type', `${record.contentType}; charset=${record.charset}`);
      for (const [name, value] of Object.entries(record.headers)) {
        logInfo(name, value);
      }
      console.log('');
      if (isDisplayable(record.contentType)) {
        console.log(record.body.toString('utf-8'));
      } else {
        log(`  <${record.body.length} bytes>`, 'dim');
      }
      console.log('');
    } catch (error) {
      fail(error);
    }
  });

// ============================================================================
// NEW COMMAND
// ============================================================================
program
  .command('new')
  .description('Store a new mock and print its id')
  .option('--status <code>', 'HTTP status code', '200')
  .option('--content-type <type>', 'Content type', 'application/json')
  .option('--charset <charset>', 'Charset', 'UTF-8')
  .option('--header <name=value>', 'Response header (repeatable)', collect, [])
  .option('--body <text>', 'Response body')
  .option('--body-file <path>', 'Read the response body from a file')
  .option('-s, --storage <path>', 'Storage directory or database file')
  .option('--storage-type <type>', 'Storage type (file|sqlite)')
  .option('-c, --config <path>', 'Config file path')
  .action(async (options: NewOptions) => {
    try {
      const params = addHeaderOptions(
        {
          status: options.status,
          contentType: options.contentType,
          charset: options.charset,
        },
        options.header
      );

      const body = options.bodyFile
        ? await readFile(options.bodyFile)
        : Buffer.from(options.body ?? '', 'utf-8');

      const store = await openStore(options);
      const id = await new MockService(store).create(params, body);
      store.close();

      log(id, 'green');
    } catch (error) {
      fail(error);
    }
  });

// ============================================================================
// CLEAN COMMAND
// ============================================================================
program
  .command('clean')
  .description('Remove the oldest mocks beyond a limit')
  .requiredOption('-l, --limit <n>', 'Number of most recent mocks to keep')
  .option('-s, --storage <path>', 'Storage directory or database file')
  .option('--storage-type <type>', 'Storage type (file|sqlite)')
  .option('-c, --config <path>', 'Config file path')
  .action(async (options) => {
    try {
      const limit = parseInt(options.limit, 10);
      if (isNaN(limit)) {
        throw new Error(`Invalid limit: ${options.limit}`);
      }

      const store = await openStore(options);
      const service = new MockService(store, {
        onCleanError: (id, error) => log(`Could not remove ${id}: ${errorMessage(error)}`, 'yellow'),
      });
      const removed = await service.clean(limit);
      store.close();

      log(`Removed ${removed} mock(s)`, removed > 0 ? 'green' : 'dim');
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
