/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

interface DetailedErrorOptions {
  stack?: string;
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

/**
 * Raised for any failure to stat, read or decode a rule file. The previous
 * rule table (if any) stays authoritative when this is thrown.
 */
export class RuleFileError extends DetailedError {
  public readonly path: string;

  constructor(path: string, cause: string) {
    super(`Failed to load rules: ${cause}`, { path });
    this.path = path;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
