import { float, int, oscMessage } from '../osc/codec.js';
import type { Endpoint, OscMessage } from '../osc/types.js';
import type { OscHandler } from '../services/AddressDispatcher.js';
import type { ParameterName, ParameterStore } from '../services/ParameterStore.js';
import type { SensorSample, SensorSource } from '../services/SensorSource.js';
import { DispatchError, SourceUnavailable } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Every address the node answers to. */
export const NODE_ADDRESSES = ['/reset', '/quit', '/ping', '/xfreq', '/yfreq', '/nextframe'] as const;

export type NodeAddress = (typeof NODE_ADDRESSES)[number];

export const TRAJECTORY_COLS = 10;
export const TRAJECTORY_ROWS = 2;

/**
 * State and capabilities the handlers work against. The runtime owns it and
 * passes it in explicitly; handlers keep nothing of their own.
 */
export interface NodeContext {
  readonly parameters: ParameterStore;
  readonly sensor: SensorSource;
  readonly counters: { pings: number };
  /** Send a reply to the sender's host on the node's send port. */
  reply(message: OscMessage, sender: Endpoint): Promise<void>;
  stop(reason: string): void;
}

/**
 * A 2 x `cols` frame: row 0 holds the second channel's reading and row 1 the
 * third's, each repeated across every column.
 */
export function buildTrajectory(sample: SensorSample, cols: number = TRAJECTORY_COLS): number[][] {
  return [new Array<number>(cols).fill(sample.channelB), new Array<number>(cols).fill(sample.channelC)];
}

/**
 * `/trajectory <cols> <rows> <samples...>` with samples flattened row by row.
 */
export function trajectoryMessage(frame: number[][]): OscMessage {
  const cols = frame[0]?.length ?? 0;
  const samples = frame.flat().map(float);
  return oscMessage('/trajectory', int(cols), int(frame.length), ...samples);
}

function numericArgument(message: OscMessage): number {
  const first = message.args[0];
  if (!first || (first.type !== 'i' && first.type !== 'f')) {
    throw new DispatchError(message.address, `${message.address} expects a numeric first argument`);
  }
  return first.value;
}

function parameterSetter(context: NodeContext, name: ParameterName): OscHandler {
  return (message) => {
    context.parameters.set(name, numericArgument(message));
  };
}

/**
 * The fixed handler table, built once per runtime.
 */
export function createNodeHandlers(context: NodeContext): Record<NodeAddress, OscHandler> {
  return {
    '/reset': () => {
      logger.debug('Received reset request');
      context.parameters.reset();
    },

    '/quit': () => {
      logger.debug('Received quit request, shutting down');
      context.stop('quit request');
    },

    '/ping': (_message, sender) => {
      logger.debug('Received ping request');
      context.counters.pings += 1;
      return context.reply(oscMessage('/pong', int(context.counters.pings)), sender);
    },

    '/xfreq': parameterSetter(context, 'xfreq'),
    '/yfreq': parameterSetter(context, 'yfreq'),

    '/nextframe': async (_message, sender) => {
      logger.debug('Generating next frame');
      let sample: SensorSample;
      try {
        sample = await context.sensor.fetch();
      } catch (error) {
        if (error instanceof SourceUnavailable) {
          logger.warn(`No trajectory sent: ${error.message}`);
          return;
        }
        throw error;
      }
      await context.reply(trajectoryMessage(buildTrajectory(sample)), sender);
    },
  };
}
