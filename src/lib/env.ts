/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export function varOrDefault(envVarName: string, defaultValue: string): string {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : defaultValue;
}

export function varOrUndefined(envVarName: string): string | undefined {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

export function positiveIntOrUndefined(
  envVarName: string,
): number | undefined {
  const value = varOrUndefined(envVarName);
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(
      `${envVarName} must be a positive integer, got: ${JSON.stringify(value)}`,
    );
  }
  return parsed;
}

export function positiveIntOrDefault(
  envVarName: string,
  defaultValue: number,
): number {
  return positiveIntOrUndefined(envVarName) ?? defaultValue;
}

// Comma separated, blanks dropped
export function listOrDefault(
  envVarName: string,
  defaultValue: string[],
): string[] {
  const value = varOrUndefined(envVarName);
  if (value === undefined) {
    return defaultValue;
  }

  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}
