import pino from 'pino';
import type { BrokerConnection } from '../../src/infrastructure/broker/index.js';
import { EventMetrics } from '../../src/infrastructure/metrics/index.js';
import { createMetricsServer } from '../../src/interfaces/http/index.js';

function connection(connected: boolean): BrokerConnection {
  return {
    get streams(): never {
      throw new Error('not used');
    },
    maxPayloadBytes: 1024 * 1024,
    maxPendingMessages: 65536,
    clientName: 'test-client',
    isConnected: () => connected,
  };
}

describe('metrics routes', () => {
  let metrics: EventMetrics;

  beforeEach(() => {
    metrics = new EventMetrics();
  });

  async function server(connected = true) {
    return createMetricsServer({
      metrics,
      connection: connection(connected),
      log: pino({ level: 'silent' }),
    });
  }

  it('GET /metrics returns the registry in exposition format', async () => {
    metrics.eventsPublished.inc({ event_type: 'academic.course.deleted', stream: 'ACADEMIC_EVENTS', status: 'success' });
    const app = await server();

    const res = await app.inject({ method: 'GET', url: '/metrics' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe(metrics.contentType);
    expect(res.body.split('\n')).toContain(
      'nats_events_published_total{event_type="academic.course.deleted",stream="ACADEMIC_EVENTS",status="success"} 1',
    );
    await app.close();
  });

  it('GET /health reports a connected broker', async () => {
    const app = await server(true);

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', broker: 'connected' });
    await app.close();
  });

  it('GET /health returns 503 while disconnected', async () => {
    const app = await server(false);

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ status: 'degraded', broker: 'disconnected' });
    await app.close();
  });
});
