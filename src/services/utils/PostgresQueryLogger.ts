import type { Pool } from 'pg';
import type { Logger } from '../../lib/logger';

interface QueryLoggerOptions {
  context: string;
  debug: boolean;
  logger: Logger;
}

const instrumentedPools = new WeakSet<Pool>();

export function normalizeQueryText(text: string | undefined): string | undefined {
  if (!text) {
    return undefined;
  }
  const condensed = text.replace(/\s+/g, ' ').trim();
  return condensed.length > 0 ? condensed : undefined;
}

export function sanitizeValue(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value === 'string') {
    return value.length > 200 ? `${value.slice(0, 200)}…` : value;
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Buffer.isBuffer(value)) {
    return `<Buffer length=${value.length}>`;
  }

  if (Array.isArray(value)) {
    if (depth > 3) {
      return '[…]';
    }
    const limit = Math.min(value.length, 20);
    const items: unknown[] = value.slice(0, limit).map((entry: unknown) => sanitizeValue(entry, depth + 1));
    if (value.length > limit) {
      items.push(`… (+${value.length - limit} items)`);
    }
    return items;
  }

  try {
    const json = JSON.stringify(value);
    return json.length > 200 ? `${json.slice(0, 200)}…` : json;
  } catch {
    return `<Unserializable ${Object.prototype.toString.call(value)}>`;
  }
}

function extractQuery(args: unknown[]): { text?: string; values?: unknown[] } {
  const [textOrConfig, maybeValues] = args;

  if (typeof textOrConfig === 'string') {
    return { text: textOrConfig, values: Array.isArray(maybeValues) ? maybeValues : undefined };
  }

  if (textOrConfig && typeof textOrConfig === 'object') {
    const text = 'text' in textOrConfig && typeof textOrConfig.text === 'string' ? textOrConfig.text : undefined;
    const values = 'values' in textOrConfig && Array.isArray(textOrConfig.values) ? textOrConfig.values : undefined;
    return { text, values };
  }

  return {};
}

/**
 * Wraps `pool.query` so every statement is logged at debug level and every
 * failing statement at error level, with its values shortened. Only pool-level
 * queries are seen; statements issued on a checked-out client are not.
 */
export function attachPostgresQueryLogger(pool: Pool, options: QueryLoggerOptions): void {
  const { context, debug, logger } = options;

  if (!debug || instrumentedPools.has(pool)) {
    return;
  }
  instrumentedPools.add(pool);

  const originalQuery = pool.query.bind(pool);

  const loggedQuery = (...args: unknown[]): unknown => {
    const { text, values } = extractQuery(args);
    const payload = {
      query: normalizeQueryText(text) ?? '<unknown>',
      values: values?.map((value) => sanitizeValue(value)),
    };
    logger.debug(`${context}: query`, payload);

    const result: unknown = Reflect.apply(originalQuery, pool, args);
    if (result instanceof Promise) {
      return result.catch((error: unknown) => {
        logger.error(`${context}: query failed`, {
          ...payload,
          error: error instanceof Error ? error.message : error,
        });
        throw error;
      });
    }
    return result;
  };

  Reflect.set(pool, 'query', loggedQuery);
}
