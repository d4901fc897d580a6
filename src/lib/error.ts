/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

interface DetailedErrorOptions {
  stack?: string;
  cause?: unknown;
  [key: string]: unknown;
}

export class DetailedError extends Error {
  constructor(message: string, options?: DetailedErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    Object.assign(this, options);
    this.stack = options?.stack ?? new Error().stack;
  }

  toJSON() {
    const { name, message, ...rest } = this;
    return {
      name,
      message,
      stack: this.stack,
      ...rest,
    };
  }
}

export type TransientFetchReason = 'Timeout' | 'Unavailable';

/**
 * A fetch that may succeed if repeated: timeouts, connection failures, 5xx,
 * 429 and 404 (an indexer that has not reached the height yet).
 */
export class TransientFetchError extends DetailedError {
  readonly reason: TransientFetchReason;

  constructor(
    message: string,
    {
      reason,
      ...options
    }: DetailedErrorOptions & { reason: TransientFetchReason },
  ) {
    super(message, options);
    this.reason = reason;
  }
}

/**
 * A response that cannot be interpreted. Never retried.
 */
export class SchemaError extends DetailedError {
  readonly reason = 'InvalidResponse';
}

export class RangeResolutionError extends DetailedError {}

export class CheckpointIOError extends DetailedError {}

export class ConfigError extends DetailedError {}

export function isTransientFetchError(
  error: unknown,
): error is TransientFetchError {
  return error instanceof TransientFetchError;
}

export function errorSummary(error: unknown): {
  name: string;
  message: string;
} {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}
