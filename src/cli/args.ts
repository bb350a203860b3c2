import { z } from 'zod';
import { PreparedRequest } from '../types';
import { ValidationError } from '../utils/errors';

/**
 * Turn repeated `key:value` arguments into a record. A key given more than
 * once collects its values into a list, in order.
 */
export function parseKeyValueArgs(args: string[], flag: string): Record<string, string | string[]> {
  const result: Record<string, string | string[]> = {};

  for (const arg of args) {
    const separator = arg.indexOf(':');
    if (separator <= 0) {
      throw new ValidationError(`${flag} must be formatted as ${flag}="key:value" (got "${arg}")`);
    }
    const key = arg.slice(0, separator).trim();
    const value = arg.slice(separator + 1);
    const existing = result[key];

    if (existing === undefined) {
      result[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      result[key] = [existing, value];
    }
  }

  return result;
}

/** zod field for repeated `key:value` options. */
export function keyValueOption(flag: string) {
  return z
    .array(z.string())
    .default([])
    .transform((list, ctx) => {
      try {
        return parseKeyValueArgs(list, flag);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: error instanceof Error ? error.message : String(error),
        });
        return z.NEVER;
      }
    });
}

export function validateArgs<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const messages = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(messages.join('\n'));
  }
  return result.data;
}

/** Human-readable dump of a request that was prepared but not sent. */
export function formatPreparedRequests(requests: PreparedRequest[]): string {
  return requests
    .map(request => {
      const headers = Object.entries(request.headers)
        .map(([name, value]) => ` ${name}:${value}`)
        .join('\n');
      return `Endpoint:\n ${request.url}\n\nHTTP Headers:\n${headers}`;
    })
    .join('\n---\n');
}
