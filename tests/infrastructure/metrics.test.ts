import { Registry } from 'prom-client';
import { EventMetrics, getDefaultMetrics } from '../../src/infrastructure/metrics/index.js';
import { sampleValue } from '../helpers.js';

describe('EventMetrics', () => {
  it('gives each instance its own registry', () => {
    const a = new EventMetrics();
    const b = new EventMetrics();
    expect(a.registry).not.toBe(b.registry);
  });

  it('registers on a supplied registry', async () => {
    const registry = new Registry();
    new EventMetrics(registry);
    expect(registry.getSingleMetric('nats_events_consumed_total')).toBeDefined();
  });

  it('flips the connection gauge and duration', async () => {
    const metrics = new EventMetrics();

    metrics.setConnected('test-client', true);
    expect(await sampleValue(metrics.connectionStatus, { client_name: 'test-client' })).toBe(1);
    expect(await sampleValue(metrics.connectionDuration, { client_name: 'test-client' })).toBeGreaterThanOrEqual(0);

    metrics.setConnected('test-client', false);
    expect(await sampleValue(metrics.connectionStatus, { client_name: 'test-client' })).toBe(0);
    expect(await sampleValue(metrics.connectionDuration, { client_name: 'test-client' })).toBe(0);
  });

  it('exposes every metric family', async () => {
    const text = await new EventMetrics().expose();
    for (const name of [
      'nats_events_published_total',
      'nats_publish_duration_seconds',
      'nats_publish_errors_total',
      'nats_publish_retries_total',
      'nats_event_payload_size_bytes',
      'nats_events_consumed_total',
      'nats_consume_duration_seconds',
      'nats_consumer_lag_messages',
      'nats_consumer_processing_messages',
      'nats_consumer_errors_total',
      'nats_connection_status',
      'nats_reconnection_attempts_total',
      'nats_connection_duration_seconds',
      'nats_stream_messages_total',
      'nats_stream_bytes_total',
    ]) {
      expect(text).toContain(`# TYPE ${name} `);
    }
  });

  it('resets recorded values', async () => {
    const metrics = new EventMetrics();
    metrics.consumerErrors.inc({ consumer: 'grades', error_type: 'Error' });
    metrics.reset();
    expect(await sampleValue(metrics.consumerErrors, { consumer: 'grades' })).toBeUndefined();
  });

  it('shares one default instance', () => {
    expect(getDefaultMetrics()).toBe(getDefaultMetrics());
  });
});
