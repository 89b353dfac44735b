import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';
import { logger } from './logger.js';

class MetricsCollector {
  public readonly register: Registry;

  public readonly datagramsReceived: Counter;
  public readonly decodeErrors: Counter<'reason'>;
  public readonly messagesDispatched: Counter<'route'>;
  public readonly dispatchErrors: Counter<'address'>;
  public readonly repliesSent: Counter<'address'>;
  public readonly sensorFetchDuration: Histogram<'outcome'>;
  public readonly httpRequestDuration: Histogram<'method' | 'route' | 'status_code'>;

  constructor() {
    this.register = new Registry();

    // Enable default Node.js metrics
    collectDefaultMetrics({
      register: this.register,
      prefix: 'node_',
      gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
    });

    const registers = [this.register];

    // Datagram path
    this.datagramsReceived = new Counter({
      name: 'oscnode_datagrams_received_total',
      help: 'UDP datagrams received on the OSC port',
      registers,
    });

    this.decodeErrors = new Counter({
      name: 'oscnode_decode_errors_total',
      help: 'Datagrams dropped because they did not decode',
      labelNames: ['reason'],
      registers,
    });

    this.messagesDispatched = new Counter({
      name: 'oscnode_messages_dispatched_total',
      help: 'Messages dispatched, by handler or fallback route',
      labelNames: ['route'],
      registers,
    });

    this.dispatchErrors = new Counter({
      name: 'oscnode_dispatch_errors_total',
      help: 'Handler failures caught at the dispatch boundary',
      labelNames: ['address'],
      registers,
    });

    this.repliesSent = new Counter({
      name: 'oscnode_replies_sent_total',
      help: 'Reply messages sent back to the patch',
      labelNames: ['address'],
      registers,
    });

    // Sensor fetch latency
    this.sensorFetchDuration = new Histogram({
      name: 'oscnode_sensor_fetch_duration_seconds',
      help: 'Duration of sensor sample fetches in seconds',
      labelNames: ['outcome'],
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
      registers,
    });

    // Status API
    this.httpRequestDuration = new Histogram({
      name: 'oscnode_http_request_duration_milliseconds',
      help: 'Duration of status API requests in milliseconds',
      labelNames: ['method', 'route', 'status_code'],
      buckets: [5, 10, 25, 50, 100, 250, 500, 1000],
      registers,
    });
  }

  /**
   * Get metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    try {
      return await this.register.metrics();
    } catch (error) {
      logger.error('Failed to collect metrics', { error: String(error) });
      return '';
    }
  }

  /**
   * Track HTTP request duration
   */
  trackHttpRequest(method: string, route: string, statusCode: number, durationMs: number): void {
    this.httpRequestDuration
      .labels(method, route, statusCode.toString())
      .observe(durationMs);
  }
}

export type { MetricsCollector };

export const metrics = new MetricsCollector();
