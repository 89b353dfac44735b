import fetch from 'node-fetch';
import { z } from 'zod';
import { describeError, SourceUnavailable } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';

/** One instantaneous reading of the three sensor channels. */
export interface SensorSample {
  channelA: number;
  channelB: number;
  channelC: number;
}

/**
 * Where `/nextframe` gets its readings. Implementations reject with
 * `SourceUnavailable` when no sample can be produced.
 */
export interface SensorSource {
  fetch(): Promise<SensorSample>;
}

export type SensorChannels = readonly [string, string, string];

export interface HttpSensorSourceOptions {
  baseUrl: string;
  channels: SensorChannels;
  timeoutMs: number;
}

// Each channel carries its own sample buffer; the first entry is the latest reading.
const ChannelSchema = z.object({
  buffer: z.array(z.number().nullable()),
});

const ResponseSchema = z.object({
  buffer: z.record(ChannelSchema),
});

type SensorResponse = z.infer<typeof ResponseSchema>;

/**
 * Reads the latest sample of three channels from a sensor app's HTTP
 * export: `GET <baseUrl>/get?<a>&<b>&<c>`.
 */
export class HttpSensorSource implements SensorSource {
  constructor(private readonly options: HttpSensorSourceOptions) {}

  public get url(): string {
    const base = this.options.baseUrl.replace(/\/+$/, '');
    return `${base}/get?${this.options.channels.join('&')}`;
  }

  public async fetch(): Promise<SensorSample> {
    const endTimer = metrics.sensorFetchDuration.startTimer();
    try {
      const sample = await this.request();
      endTimer({ outcome: 'ok' });
      return sample;
    } catch (error) {
      endTimer({ outcome: 'error' });
      if (error instanceof SourceUnavailable) throw error;
      throw new SourceUnavailable(`Sensor request to ${this.url} failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  private async request(): Promise<SensorSample> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let body: unknown;
    try {
      const response = await fetch(this.url, { signal: controller.signal });
      if (!response.ok) {
        throw new SourceUnavailable(`Sensor responded with HTTP ${response.status}`);
      }
      body = await response.json();
    } finally {
      clearTimeout(timer);
    }

    const parsed = ResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceUnavailable(`Unexpected sensor response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    }

    const [a, b, c] = this.options.channels;
    const sample = {
      channelA: firstReading(parsed.data, a),
      channelB: firstReading(parsed.data, b),
      channelC: firstReading(parsed.data, c),
    };
    logger.debug('Sensor sample', { [a]: sample.channelA, [b]: sample.channelB, [c]: sample.channelC });
    return sample;
  }
}

function firstReading(response: SensorResponse, channel: string): number {
  const first: number | null | undefined = response.buffer[channel]?.buffer[0];
  if (first === null || first === undefined) {
    throw new SourceUnavailable(`Sensor response has no reading for channel '${channel}'`);
  }
  return first;
}
