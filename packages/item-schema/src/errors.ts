import type { z } from 'zod';

export class ItemSchemaError extends Error {
  constructor(
    message = 'Item catalog validation failed',
    readonly issues: readonly z.ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'ItemSchemaError';
  }
}
