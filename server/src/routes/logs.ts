import type { LogLevel, LogSource } from '@dupsweep/common';
import { Router } from 'express';
import { lastSequence, query as queryLogs, type Filters } from '../logStore.js';

const ALLOWED_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
const ALLOWED_SOURCES: readonly LogSource[] = ['server', 'cli'];
const MAX_LIMIT = 200;

function parseList(value: unknown) {
  if (typeof value !== 'string' || !value.trim()) return [];
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

function pick<T extends string>(values: string[], allowed: readonly T[]): T[] {
  return allowed.filter((candidate) => values.includes(candidate));
}

function parseNumber(value: unknown): number | undefined {
  if (typeof value !== 'string' || !value.trim()) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function buildFilters(query: Record<string, unknown>): Filters {
  const level = pick(parseList(query.level), ALLOWED_LEVELS);
  const source = pick(parseList(query.source), ALLOWED_SOURCES);
  const filters: Filters = {};
  if (level.length) filters.level = level;
  if (source.length) filters.source = source;
  if (typeof query.runId === 'string' && query.runId.trim()) {
    filters.runId = query.runId.trim();
  }
  if (typeof query.text === 'string' && query.text.trim()) {
    filters.text = query.text;
  }
  const since = parseNumber(query.since);
  const until = parseNumber(query.until);
  const sinceSequence = parseNumber(query.sinceSequence);
  if (since !== undefined) filters.since = since;
  if (until !== undefined) filters.until = until;
  if (sinceSequence !== undefined) filters.sinceSequence = sinceSequence;
  return filters;
}

export function createLogsRouter() {
  const router = Router();

  router.get('/', (req, res) => {
    const filters = buildFilters(req.query);
    const limitParam = parseNumber(req.query.limit);
    const limit =
      limitParam === undefined
        ? MAX_LIMIT
        : Math.min(Math.max(1, Math.floor(limitParam)), MAX_LIMIT);
    const items = queryLogs(filters, limit);
    const hasMore = items.length === limit && (items[0]?.sequence ?? 0) > 1;
    res.json({ items, lastSequence: lastSequence(), hasMore });
  });

  return router;
}
