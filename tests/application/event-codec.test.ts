import { readFileSync } from 'node:fs';
import { ZodError } from 'zod';
import { createEvent, decodeEvent, encodeEvent } from '../../src/application/event-codec.js';
import { EVENT_TYPES, isEventType } from '../../src/application/event-schema.js';
import { DecodeError } from '../../src/domain/index.js';
import { FIXED_TIMESTAMP, testUuid } from '../helpers.js';

const fixtures: unknown[] = JSON.parse(
  readFileSync(new URL('../fixtures/catalog-events.json', import.meta.url), 'utf-8'),
);

const encoder = new TextEncoder();

function bytes(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

function decodeError(data: Uint8Array): DecodeError {
  try {
    decodeEvent(data);
  } catch (err) {
    if (err instanceof DecodeError) return err;
    throw err;
  }
  throw new Error('expected decodeEvent to throw');
}

describe('event catalog', () => {
  it('has 28 event types', () => {
    expect(EVENT_TYPES).toHaveLength(28);
    expect(isEventType('academic.quiz.deleted')).toBe(true);
    expect(isEventType('academic.quiz.archived')).toBe(false);
    expect(isEventType('toString')).toBe(false);
  });

  it('fixture covers every event type', () => {
    const types = fixtures.map((f) => decodeEvent(bytes(f)).event_type);
    expect([...types].sort()).toEqual([...EVENT_TYPES].sort());
  });
});

// --- Round trip ---

describe('encodeEvent / decodeEvent', () => {
  it.each(fixtures.map((f, i): [number, unknown] => [i, f]))('round-trips fixture %i', (_i, fixture) => {
    const decoded = decodeEvent(bytes(fixture));
    expect(decodeEvent(encodeEvent(decoded))).toEqual(decoded);
  });

  it('applies catalog defaults on decode', () => {
    const decoded = decodeEvent(
      bytes({
        event_id: testUuid(1),
        event_type: 'academic.course.deleted',
        timestamp: FIXED_TIMESTAMP,
        metadata: { source_service: 'test-service' },
        course_id: 'crs-1',
      }),
    );
    expect(decoded).toEqual({
      event_id: testUuid(1),
      event_type: 'academic.course.deleted',
      event_version: '1.0',
      timestamp: FIXED_TIMESTAMP,
      metadata: { source_service: 'test-service', trace_context: {} },
      course_id: 'crs-1',
      soft_delete: true,
    });
  });

  it('rejects bytes that are not UTF-8', () => {
    const err = decodeError(new Uint8Array([0xff, 0xfe, 0x7b]));
    expect(err.reason).toBe('malformed_payload');
    expect(err.message).toBe('Event payload is not valid UTF-8 JSON');
  });

  it('rejects text that is not JSON', () => {
    expect(decodeError(encoder.encode('{not json')).reason).toBe('malformed_payload');
  });

  it('rejects an unknown event type', () => {
    const err = decodeError(
      bytes({
        event_id: testUuid(2),
        event_type: 'academic.course.archived',
        timestamp: FIXED_TIMESTAMP,
        metadata: { source_service: 'test-service' },
      }),
    );
    expect(err.reason).toBe('invalid_event');
    expect(err.message).toMatch(/^Invalid event: event_type: /);
  });

  it('reports the path of a missing field', () => {
    const err = decodeError(
      bytes({
        event_id: testUuid(3),
        event_type: 'academic.course.deleted',
        timestamp: FIXED_TIMESTAMP,
        metadata: { source_service: 'test-service' },
      }),
    );
    expect(err.reason).toBe('invalid_event');
    expect(err.message).toBe('Invalid event: course_id: Required');
  });

  it('reports (root) for a JSON value that is not an object', () => {
    const err = decodeError(bytes(42));
    expect(err.reason).toBe('invalid_event');
    expect(err.message).toBe('Invalid event: (root): Expected object, received number');
  });
});

// --- Factory ---

describe('createEvent', () => {
  it('assigns id, version and timestamp', () => {
    const before = Date.now();
    const event = createEvent(
      'academic.exam.deleted',
      { exam_id: 'exm-1' },
      { source_service: 'test-service', correlation_id: 'corr-1' },
    );

    expect(event.event_type).toBe('academic.exam.deleted');
    expect(event.event_id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(event.event_version).toBe('1.0');
    expect(Date.parse(event.timestamp)).toBeGreaterThanOrEqual(before);
    expect(event.exam_id).toBe('exm-1');
    expect(event.soft_delete).toBe(true);
    expect(event.metadata.correlation_id).toBe('corr-1');
  });

  it('keeps pinned envelope fields', () => {
    const event = createEvent(
      'academic.quiz.updated',
      { quiz_id: 'qz-1', changes: { weight: 0.05 } },
      { source_service: 'test-service' },
      { event_id: testUuid(9), event_version: '2.0', timestamp: FIXED_TIMESTAMP },
    );
    expect(event.event_id).toBe(testUuid(9));
    expect(event.event_version).toBe('2.0');
    expect(event.timestamp).toBe(FIXED_TIMESTAMP);
  });

  it('defaults created_date to now', () => {
    const event = createEvent(
      'academic.study.created',
      {
        todo_id: 'todo-1',
        title: 'Review notes',
        student_id: 'stu-1',
        description: 'Chapters 1-3',
        priority: 'High',
        estimated_minutes: 45,
      },
      { source_service: 'test-service' },
    );
    expect(Number.isNaN(Date.parse(event.created_date))).toBe(false);
    expect(event.status).toBe('Next Action');
  });

  it('throws ZodError for invalid fields', () => {
    expect(() =>
      createEvent('academic.course.deleted', { course_id: '' }, { source_service: 'test-service' }),
    ).toThrow(ZodError);
  });

  it('throws ZodError for empty source_service', () => {
    expect(() =>
      createEvent('academic.course.deleted', { course_id: 'crs-1' }, { source_service: '' }),
    ).toThrow(ZodError);
  });
});
