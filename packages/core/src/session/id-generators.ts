import { randomUUID } from "node:crypto";

import type { SessionIdGenerator } from "@strata-session/contracts";

/**
 * Random 128-bit ids rendered as canonical UUID strings.
 */
export class UuidSessionIdGenerator implements SessionIdGenerator {
  generate(): string {
    return randomUUID();
  }
}

export interface SequentialSessionIdGeneratorOptions {
  readonly prefix?: string;
  readonly start?: number;
}

/**
 * Predictable ids (`1`, `2`, ... or `<prefix>1`, ...). Meant for tests and
 * data migrations, never for client-facing sessions.
 */
export class SequentialSessionIdGenerator implements SessionIdGenerator {
  private readonly prefix: string;
  private next: number;

  constructor(options: SequentialSessionIdGeneratorOptions = {}) {
    this.prefix = options.prefix ?? "";
    this.next = options.start ?? 1;
  }

  generate(): string {
    const id = `${this.prefix}${this.next}`;
    this.next += 1;
    return id;
  }
}

export const createSessionIdGenerator = (generate: () => string): SessionIdGenerator => ({
  generate,
});
