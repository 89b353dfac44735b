import { z } from 'zod';
import type { SensorChannels } from '../services/SensorSource.js';
import { ConfigError } from '../utils/errors.js';

// The patch sends to the node on 12001 and listens for replies on 12000.
export const DEFAULT_RECV_PORT = 12001;
export const DEFAULT_SEND_PORT = 12000;

export interface NodeConfig {
  host: string;
  recvPort: number;
  sendPort: number;
  sensor: {
    baseUrl: string;
    channels: SensorChannels;
    timeoutMs: number;
  };
  statusPort?: number;
}

const port = z.coerce.number().int().min(0).max(65535);

// Schema ensures well-formed environment values before any socket is opened.
const EnvSchema = z.object({
  OSC_HOST: z.string().min(1).default('0.0.0.0'),
  OSC_RECV_PORT: port.default(DEFAULT_RECV_PORT),
  OSC_SEND_PORT: port.min(1).default(DEFAULT_SEND_PORT),
  SENSOR_URL: z.string().url().default('http://192.168.1.12'),
  SENSOR_CHANNELS: z
    .string()
    .default('accX,accY,accZ')
    .transform((value) =>
      value
        .split(',')
        .map((channel) => channel.trim())
        .filter((channel) => channel.length > 0)
    )
    .pipe(z.tuple([z.string(), z.string(), z.string()])),
  SENSOR_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  STATUS_PORT: port.min(1).optional(),
});

/**
 * Build the node configuration from environment variables. Empty variables
 * count as unset.
 *
 * @throws {ConfigError} naming every invalid variable.
 */
export function loadNodeConfig(env: NodeJS.ProcessEnv = process.env): NodeConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    host: values.OSC_HOST,
    recvPort: values.OSC_RECV_PORT,
    sendPort: values.OSC_SEND_PORT,
    sensor: {
      baseUrl: values.SENSOR_URL,
      channels: values.SENSOR_CHANNELS,
      timeoutMs: values.SENSOR_TIMEOUT_MS,
    },
    statusPort: values.STATUS_PORT,
  };
}
