/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { createLogger, format, transports } from 'winston';
import * as env from './lib/env.js';

const LOG_LEVEL = env.varOrDefault('LOG_LEVEL', 'info').toLowerCase();
const LOG_FORMAT = env.varOrDefault('LOG_FORMAT', 'simple');
const LOG_FILE = env.varOrUndefined('LOG_FILE');
const LOG_ALL_STACKTRACES =
  env.varOrDefault('LOG_ALL_STACKTRACES', 'false') === 'true';

const filterStackTraces = format((info) => {
  // Only log stack traces when the log level is error or the
  // LOG_ALL_STACKTRACES environment variable is set to true
  if (info.stack !== undefined && info.level !== 'error' && !LOG_ALL_STACKTRACES) {
    delete info.stack;
  }
  return info;
});

// Detect test environment
const isTestEnvironment = process.env.NODE_TEST_CONTEXT !== undefined;

const loggerTransports = isTestEnvironment
  ? [
      new transports.File({
        filename: 'logs/test.log',
        options: { flags: 'w' }, // Overwrite file for each test run
      }),
    ]
  : [
      new transports.Console(),
      ...(LOG_FILE !== undefined
        ? [new transports.File({ filename: LOG_FILE })]
        : []),
    ];

const logger = createLogger({
  level: LOG_LEVEL,
  format: format.combine(
    filterStackTraces(),
    format.errors(),
    format.timestamp(),
    LOG_FORMAT === 'json' ? format.json() : format.simple(),
  ),
  transports: loggerTransports,
});

/**
 * Applies command line overrides to the shared logger.
 */
export function configureLogger({
  level,
  file,
}: {
  level?: string;
  file?: string;
}): void {
  if (level !== undefined) {
    logger.level = level;
  }
  if (file !== undefined && file !== LOG_FILE && !isTestEnvironment) {
    logger.add(new transports.File({ filename: file }));
  }
}

export default logger;
