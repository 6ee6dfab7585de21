#!/usr/bin/env node

/**
 * Hub Sync CLI
 *
 * Command-line interface for running the hub sync service.
 */

import { HubSyncService, VERSION } from './service.js';
import { loadConfig, validateConfig } from './config/loader.js';
import { getLogger } from './observability/logger.js';

// -----------------------------------------------------------------------------
// CLI Arguments
// -----------------------------------------------------------------------------

interface CliArgs {
  configPath?: string;
  validate?: boolean;
  help?: boolean;
  version?: boolean;
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '-c':
      case '--config':
        result.configPath = args[++i];
        break;

      case '--validate':
        result.validate = true;
        break;

      case '-h':
      case '--help':
        result.help = true;
        break;

      case '-v':
      case '--version':
        result.version = true;
        break;
    }
  }

  return result;
}

// -----------------------------------------------------------------------------
// Help & Version
// -----------------------------------------------------------------------------

function printHelp(): void {
  console.log(`
LifeSmart Hub Sync

Usage: hub-sync [options]

Options:
  -c, --config <path>   Path to configuration file
  --validate            Validate configuration and exit
  -h, --help            Show this help message
  -v, --version         Show version number

Environment Variables:
  HUBSYNC_CONFIG_PATH   Path to configuration file
  HUBSYNC_*             Configuration overrides, e.g. HUBSYNC_HUB_HOST

Examples:
  hub-sync                        Start with default config
  hub-sync -c ./my-config.json    Start with custom config
  hub-sync --validate             Validate config and exit
`);
}

function printVersion(): void {
  console.log(VERSION);
}

// -----------------------------------------------------------------------------
// Validation Mode
// -----------------------------------------------------------------------------

function runValidation(configPath?: string): void {
  try {
    const config = loadConfig({ configPath });
    const result = validateConfig(config);

    if (result.valid) {
      console.log('✓ Configuration is valid');
      console.log('\nLoaded configuration:');
      console.log(JSON.stringify(config, null, 2));
      process.exit(0);
    } else {
      console.error('✗ Configuration is invalid:');
      for (const error of result.errors ?? []) {
        console.error(`  - ${error}`);
      }
      process.exit(1);
    }
  } catch (error) {
    console.error('✗ Failed to load configuration:');
    console.error(`  ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

// -----------------------------------------------------------------------------
// Main
// -----------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.version) {
    printVersion();
    process.exit(0);
  }

  if (args.validate) {
    runValidation(args.configPath);
    return;
  }

  // Create and start service
  const service = new HubSyncService(undefined, args.configPath);

  // Handle shutdown signals
  const shutdown = (signal: string) => {
    getLogger().info({ signal }, 'Received shutdown signal');
    service
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        getLogger().error({ err: error }, 'Error during shutdown');
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    getLogger().fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    getLogger().fatal({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  try {
    await service.start();

    // Print startup information
    const config = service.getConfig();
    console.log(`
LifeSmart Hub Sync v${VERSION}
  Hub:       ws://${config.hub.host}:${config.hub.port}${config.hub.path}
  Poll:      every ${config.sync.scanInterval}ms (push ${config.sync.push.enabled ? config.sync.push.mode : 'off'})
  Metrics:   http://localhost:${config.metrics.port}${config.metrics.path}
  Health:    http://localhost:${config.health.port}/health
`);
  } catch (error) {
    console.error('Failed to start hub sync:', error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
