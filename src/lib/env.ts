/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { ConfigError } from './error.js';

export function varOrDefault(envVarName: string, defaultValue: string): string {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : defaultValue;
}

export function varOrUndefined(envVarName: string): string | undefined {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

export function intOrUndefined(envVarName: string): number | undefined {
  const value = varOrUndefined(envVarName);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${envVarName} must be an integer, got: ${value}`);
  }
  return parsed;
}

export function intOrDefault(envVarName: string, defaultValue: number): number {
  return intOrUndefined(envVarName) ?? defaultValue;
}
