import type { Job } from 'bullmq';
import { describe, expect, it } from 'vitest';
import { ensureTraceId, withTrace } from '../../src/observability/trace.js';
import { stub } from '../test-helpers.js';

describe('ensureTraceId', () => {
  it('returns existing trace id as-is', () => {
    expect(ensureTraceId('trace-123')).toBe('trace-123');
  });

  it('creates a trace id when value is missing', () => {
    expect(ensureTraceId()).toMatch(/^[0-9a-f-]{36}$/i);
  });

  it('creates a trace id when value is blank', () => {
    expect(ensureTraceId('   ')).toMatch(/^[0-9a-f-]{36}$/i);
  });
});

describe('withTrace', () => {
  it('stores a generated trace id on the job', () => {
    const job = stub<Job<{ traceId?: string }>>({ data: {} });

    const traceId = withTrace(job);

    expect(job.data.traceId).toBe(traceId);
  });

  it('keeps the producer trace id', () => {
    const job = stub<Job<{ traceId?: string }>>({ data: { traceId: 'manual-1' } });

    expect(withTrace(job)).toBe('manual-1');
  });
});
