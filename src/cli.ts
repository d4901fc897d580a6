/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { parseChainId, parseProtocolId } from './chains.js';
import * as config from './config.js';
import { ConfigError } from './lib/error.js';
import { RunConfig } from './types.js';

export const USAGE = `
Indexer Reconciler

Replays a block range against two Ordinal/BRC20 indexers and reports every
block where their receipts disagree. Progress is checkpointed so an
interrupted run resumes where it stopped.

Usage: indexer-reconciler [options]

Options:
  -p, --primary-endpoint <url>    Reference indexer (env PRIMARY_ENDPOINT)
  -s, --secondary-endpoint <url>  Indexer under test (env SECONDARY_ENDPOINT)
  -m, --protocol <name>           ORDINAL or BRC20 (env PROTOCOL)
  -c, --chain <name>              BITCOIN or FRACTAL (env CHAIN)
  --start-block <height>          First height (default: protocol activation)
  --end-block <height>            Last height (default: lower indexer tip)
  --threads <count>               Concurrent blocks (default: 100)
  --tolerate-gaps                 Continue past blocks that cannot be fetched
  --max-attempts <count>          Fetch attempts per request (default: 5)
  --checkpoint-dir <path>         Checkpoint directory (default: data/checkpoints)
  --report-file <path>            Append a JSON-lines report to this file
  --progress-interval <ms>        Progress log interval (default: 10000)
  --log-level <level>             error, warn, info, http, verbose, debug or silly
                                  (env LOG_LEVEL, default: info)
  --log-file <path>               Also write logs to this file (env LOG_FILE)
  -h, --help                      Show this help message

Exit codes:
  0    every block matched
  1    the run failed
  2    divergences found or heights left unverified
  130  interrupted
`;

export interface CliOptions {
  primaryEndpoint?: string;
  secondaryEndpoint?: string;
  protocol?: string;
  chain?: string;
  startHeight?: number;
  endHeight?: number;
  threadCount?: number;
  tolerateGaps?: boolean;
  maxAttempts?: number;
  checkpointDir?: string;
  reportFile?: string;
  progressIntervalMs?: number;
  logLevel?: string;
  logFile?: string;
  help: boolean;
}

export type ConfigDefaults = typeof config;

export type CheckpointStoreType = 'fs' | 'memory';

export interface Settings {
  run: RunConfig;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  requestTimeoutMs: number;
  maxRequestsPerSecond: number;
  gracePeriodMs: number;
  bufferCapacity?: number;
  checkpointStoreType: CheckpointStoreType;
  checkpointDir: string;
  reportFile?: string;
  reportBucketSize: number;
  progressIntervalMs: number;
  metricsPort?: number;
  logLevel?: LogLevel;
  logFile?: string;
}

const LOG_LEVELS = [
  'error',
  'warn',
  'info',
  'http',
  'verbose',
  'debug',
  'silly',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find(
    (candidate) => candidate === value.toLowerCase(),
  );
  if (level === undefined) {
    throw new ConfigError(
      `Invalid log level: ${value}. Valid options: ${LOG_LEVELS.join(', ')}`,
    );
  }
  return level;
}

function parseInteger(flag: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(
      `${flag} requires a non-negative integer, got: ${value}`,
    );
  }
  return Number(value);
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const nextArg = argv[i + 1];
    const requireValue = (): string => {
      if (nextArg === undefined || nextArg.startsWith('-')) {
        throw new ConfigError(`${arg} requires a value`);
      }
      i++;
      return nextArg;
    };

    switch (arg) {
      case '--primary-endpoint':
      case '-p':
        options.primaryEndpoint = requireValue();
        break;
      case '--secondary-endpoint':
      case '-s':
        options.secondaryEndpoint = requireValue();
        break;
      case '--protocol':
      case '-m':
        options.protocol = requireValue();
        break;
      case '--chain':
      case '-c':
        options.chain = requireValue();
        break;
      case '--start-block':
        options.startHeight = parseInteger(arg, requireValue());
        break;
      case '--end-block':
        options.endHeight = parseInteger(arg, requireValue());
        break;
      case '--threads':
        options.threadCount = parseInteger(arg, requireValue());
        break;
      case '--tolerate-gaps':
        options.tolerateGaps = true;
        break;
      case '--max-attempts':
        options.maxAttempts = parseInteger(arg, requireValue());
        break;
      case '--checkpoint-dir':
        options.checkpointDir = requireValue();
        break;
      case '--report-file':
        options.reportFile = requireValue();
        break;
      case '--progress-interval':
        options.progressIntervalMs = parseInteger(arg, requireValue());
        break;
      case '--log-level':
        options.logLevel = requireValue();
        break;
      case '--log-file':
        options.logFile = requireValue();
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

function requireSetting(
  value: string | undefined,
  flag: string,
  envVar: string,
): string {
  if (value === undefined || value.trim() === '') {
    throw new ConfigError(`${flag} (or ${envVar}) is required`);
  }
  return value.trim();
}

const normalizeEndpoint = (endpoint: string) => endpoint.replace(/\/+$/, '');

function parseCheckpointStoreType(value: string): CheckpointStoreType {
  switch (value) {
    case 'fs':
    case 'memory':
      return value;
    default:
      throw new ConfigError(
        `Invalid CHECKPOINT_STORE_TYPE: ${value}. Valid options: fs, memory`,
      );
  }
}

/**
 * Merges command line options over environment configuration. Command line
 * values win.
 */
export function resolveSettings(
  cli: CliOptions,
  defaults: ConfigDefaults = config,
): Settings {
  const primaryEndpoint = normalizeEndpoint(
    requireSetting(
      cli.primaryEndpoint ?? defaults.PRIMARY_ENDPOINT,
      '--primary-endpoint',
      'PRIMARY_ENDPOINT',
    ),
  );
  const secondaryEndpoint = normalizeEndpoint(
    requireSetting(
      cli.secondaryEndpoint ?? defaults.SECONDARY_ENDPOINT,
      '--secondary-endpoint',
      'SECONDARY_ENDPOINT',
    ),
  );
  const protocol = parseProtocolId(
    requireSetting(cli.protocol ?? defaults.PROTOCOL, '--protocol', 'PROTOCOL'),
  );
  const chain = parseChainId(
    requireSetting(cli.chain ?? defaults.CHAIN, '--chain', 'CHAIN'),
  );

  return {
    run: {
      chain,
      protocol,
      primaryEndpoint,
      secondaryEndpoint,
      startHeight: cli.startHeight ?? defaults.START_HEIGHT,
      endHeight: cli.endHeight ?? defaults.END_HEIGHT,
      threadCount: cli.threadCount ?? defaults.THREADS,
      tolerateGaps: cli.tolerateGaps ?? defaults.TOLERATE_GAPS,
    },
    maxAttempts: cli.maxAttempts ?? defaults.MAX_FETCH_ATTEMPTS,
    retryBaseDelayMs: defaults.RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: defaults.RETRY_MAX_DELAY_MS,
    requestTimeoutMs: defaults.REQUEST_TIMEOUT_MS,
    maxRequestsPerSecond: defaults.MAX_REQUESTS_PER_SECOND,
    gracePeriodMs: defaults.SHUTDOWN_GRACE_PERIOD_MS,
    bufferCapacity: defaults.REORDER_BUFFER_CAPACITY,
    checkpointStoreType: parseCheckpointStoreType(
      defaults.CHECKPOINT_STORE_TYPE,
    ),
    checkpointDir: cli.checkpointDir ?? defaults.CHECKPOINT_DIR,
    reportFile: cli.reportFile ?? defaults.REPORT_FILE,
    reportBucketSize: defaults.REPORT_BUCKET_SIZE,
    progressIntervalMs: cli.progressIntervalMs ?? defaults.PROGRESS_INTERVAL_MS,
    metricsPort: defaults.METRICS_PORT,
    logLevel:
      cli.logLevel !== undefined ? parseLogLevel(cli.logLevel) : undefined,
    logFile: cli.logFile,
  };
}
