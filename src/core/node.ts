import { argumentValues, decodePacket } from '../osc/codec.js';
import type { Endpoint, OscMessage } from '../osc/types.js';
import { AddressDispatcher, logUnmatched } from '../services/AddressDispatcher.js';
import { ParameterStore } from '../services/ParameterStore.js';
import type { GeneratorParameters } from '../services/ParameterStore.js';
import type { SensorSource } from '../services/SensorSource.js';
import { UdpTransport } from '../services/UdpTransport.js';
import { DecodeError, describeError, StateError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';
import { createNodeHandlers, NODE_ADDRESSES } from './handlers.js';
import type { NodeContext } from './handlers.js';

export type NodeState = 'created' | 'listening' | 'running' | 'stopped';

export interface OscNodeOptions {
  host?: string;
  recvPort: number;
  sendPort: number;
  sensor: SensorSource;
  transport?: UdpTransport;
}

export interface NodeStatus {
  state: NodeState;
  receive: Endpoint | null;
  sendPort: number;
  startedAt: string | null;
  stopReason: string | null;
  pings: number;
  datagrams: number;
  malformed: number;
  parameters: GeneratorParameters;
  addresses: string[];
}

/**
 * The OSC service node: binds the receive and send ports, registers the
 * fixed handler set and processes datagrams until told to quit.
 *
 * created --listen()--> listening --run()--> running --stop()--> stopped
 */
export class OscNode {
  private state: NodeState = 'created';
  private readonly transport: UdpTransport;
  private readonly dispatcher = new AddressDispatcher();
  private readonly parameters = new ParameterStore();
  private readonly counters = { pings: 0 };
  private readonly stats = { datagrams: 0, malformed: 0 };
  private startedAt: Date | null = null;
  private stopReason: string | null = null;
  private stopping: Promise<void> | null = null;
  private resolveRun: (() => void) | null = null;

  constructor(private readonly options: OscNodeOptions) {
    this.transport = options.transport ?? new UdpTransport();
  }

  public getState(): NodeState {
    return this.state;
  }

  /**
   * Bind both sockets and register the handlers.
   *
   * @throws {BindError} when a socket cannot be bound; the node stays `created`.
   */
  public async listen(): Promise<void> {
    this.expectState('created', 'listen');

    try {
      await this.transport.bind(this.options.recvPort, this.options.host);
      await this.transport.openSender();
    } catch (error) {
      await this.transport.close();
      throw error;
    }

    const handlers = createNodeHandlers(this.context());
    for (const address of NODE_ADDRESSES) {
      this.dispatcher.register(address, handlers[address]);
    }
    this.dispatcher.setFallback(logUnmatched);

    this.state = 'listening';
  }

  /**
   * Start processing datagrams. Resolves once the node has stopped.
   */
  public run(): Promise<void> {
    this.expectState('listening', 'run');

    const finished = new Promise<void>((resolve) => {
      this.resolveRun = resolve;
    });
    this.state = 'running';
    this.startedAt = new Date();
    this.transport.receiveLoop((bytes, sender) => this.handleDatagram(bytes, sender));
    logger.info('OSC node running');
    return finished;
  }

  /**
   * Move to `stopped`: close the sockets, wait for in-flight handlers and
   * release `run()`. Later calls return the same shutdown.
   */
  public stop(reason: string = 'stop requested'): Promise<void> {
    if (this.stopping) return this.stopping;

    this.state = 'stopped';
    this.stopReason = reason;
    logger.info(`Stopping OSC node (${reason})`);
    this.stopping = this.shutdown();
    return this.stopping;
  }

  /** Wait for handlers that are still awaiting the sensor or a send. */
  public settle(): Promise<void> {
    return this.dispatcher.settle();
  }

  public receiveAddress(): Endpoint | null {
    return this.transport.receiveAddress();
  }

  public status(): NodeStatus {
    return {
      state: this.state,
      receive: this.transport.receiveAddress(),
      sendPort: this.options.sendPort,
      startedAt: this.startedAt ? this.startedAt.toISOString() : null,
      stopReason: this.stopReason,
      pings: this.counters.pings,
      datagrams: this.stats.datagrams,
      malformed: this.stats.malformed,
      parameters: { ...this.parameters.snapshot() },
      addresses: this.dispatcher.patterns(),
    };
  }

  private async shutdown(): Promise<void> {
    try {
      await this.transport.close();
      await this.dispatcher.settle();
    } finally {
      this.resolveRun?.();
      this.resolveRun = null;
      logger.info('Event loop exited');
    }
  }

  private handleDatagram(bytes: Buffer, sender: Endpoint): void {
    if (this.state !== 'running') return;

    this.stats.datagrams += 1;
    metrics.datagramsReceived.inc();

    let messages: OscMessage[];
    try {
      messages = decodePacket(bytes);
    } catch (error) {
      this.stats.malformed += 1;
      const reason = error instanceof DecodeError ? error.reason : 'unknown';
      metrics.decodeErrors.inc({ reason });
      logger.warn(`Dropped datagram from ${sender.host}:${sender.port}: ${describeError(error)}`);
      return;
    }

    for (const message of messages) {
      // A /quit earlier in the same bundle ends processing
      if (this.state !== 'running') break;
      logger.debug(`${message.address} from ${sender.host}:${sender.port}`, { args: argumentValues(message) });
      this.dispatcher.dispatch(message, sender);
    }
  }

  private context(): NodeContext {
    return {
      parameters: this.parameters,
      sensor: this.options.sensor,
      counters: this.counters,
      reply: (message, sender) => this.reply(message, sender),
      stop: (reason) => {
        this.stop(reason).catch((error: unknown) => {
          logger.error('Error during shutdown', { error: describeError(error) });
        });
      },
    };
  }

  private async reply(message: OscMessage, sender: Endpoint): Promise<void> {
    if (this.state === 'stopped') {
      logger.warn(`Dropping ${message.address} reply to ${sender.host}: node is stopped`);
      return;
    }
    const destination: Endpoint = { host: sender.host, port: this.options.sendPort };
    await this.transport.send(message, destination);
    metrics.repliesSent.inc({ address: message.address });
    logger.debug(`Sent ${message.address} to ${destination.host}:${destination.port}`);
  }

  private expectState(expected: NodeState, action: string): void {
    if (this.state !== expected) {
      throw new StateError(`Cannot ${action} while ${this.state}`);
    }
  }
}
