import { vi } from 'vitest';
import type { Logger } from 'pino';
import { createEvent } from '../src/application/event-codec.js';
import type { EventOf } from '../src/application/event-schema.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  };
}

export type FakeLogger = ReturnType<typeof fakeLogger>;

export function asLogger(log: FakeLogger): Logger {
  return log as unknown as Logger;
}

/** Fixed instant used for event timestamps. */
export const FIXED_TIMESTAMP = '2026-03-02T09:30:00.000Z';

let counter = 0;

/** Deterministic UUID: 00000000-0000-4000-8000-<n padded to 12 digits>. */
export function testUuid(n: number): string {
  return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
}

/**
 * Factory for a small catalog event with a fresh deterministic id.
 */
export function makeEvent(courseId = 'crs-1'): EventOf<'academic.course.deleted'> {
  counter++;
  return createEvent(
    'academic.course.deleted',
    { course_id: courseId },
    { source_service: 'test-service' },
    { event_id: testUuid(counter), timestamp: FIXED_TIMESTAMP },
  );
}

/** Resolves once `predicate` holds, polling on the macrotask queue. */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error('waitFor timed out');
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

interface Sample {
  value: number;
  labels: Partial<Record<string, string | number>>;
  metricName?: string;
}

/**
 * Current value of the sample whose labels include `labels`, or undefined.
 * For histograms pass `metricName` (e.g. `nats_publish_duration_seconds_count`).
 */
export async function sampleValue(
  metric: { get(): Promise<{ values: Sample[] }> },
  labels: Record<string, string>,
  metricName?: string,
): Promise<number | undefined> {
  const { values } = await metric.get();
  const match = values.find(
    (sample) =>
      (metricName === undefined || sample.metricName === metricName) &&
      Object.entries(labels).every(([key, value]) => String(sample.labels[key]) === value),
  );
  return match?.value;
}
