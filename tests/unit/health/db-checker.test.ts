/**
 * Unit tests for the warehouse health checker
 *
 * These tests focus on behavior rather than exact timing to avoid flakiness.
 */

import { describe, it, expect } from 'vitest';

import { makeDbHealthChecker } from '@/modules/health/shell/checkers/db-checker.js';

import { makeRecordingDb } from '../../fixtures/fakes.js';

describe('makeDbHealthChecker', () => {
  it('is healthy when SELECT 1 succeeds', async () => {
    const { db, queries } = makeRecordingDb();
    const checker = makeDbHealthChecker(db, { name: 'warehouse' });

    const result = await checker.check();

    expect(checker.name).toBe('warehouse');
    expect(checker.critical).toBe(true);
    expect(result.healthy).toBe(true);
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
    expect(result.message).toBeUndefined();
    expect(queries.map((q) => q.sql)).toEqual(['SELECT 1']);
  });

  it('is unhealthy when the query fails', async () => {
    const { db } = makeRecordingDb({ failWithError: new Error('Connection refused') });
    const checker = makeDbHealthChecker(db, { name: 'warehouse' });

    const result = await checker.check();

    expect(result.healthy).toBe(false);
    expect(result.message).toBe('Connection refused');
  });

  it('is unhealthy when the query times out', async () => {
    const { db } = makeRecordingDb({ delayMs: 1000 });
    const checker = makeDbHealthChecker(db, { name: 'warehouse', timeoutMs: 50 });

    const result = await checker.check();

    expect(result.healthy).toBe(false);
    expect(result.message).toBe('Database health check timed out after 50ms');
    expect(result.latencyMs).toBeLessThan(500);
  });

  it('succeeds when the query completes before the timeout', async () => {
    const { db } = makeRecordingDb({ delayMs: 10 });
    const checker = makeDbHealthChecker(db, { name: 'warehouse', timeoutMs: 500 });

    const result = await checker.check();

    expect(result.healthy).toBe(true);
  });
});
