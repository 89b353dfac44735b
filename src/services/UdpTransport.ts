import dgram from 'node:dgram';
import { encodeMessage, MAX_PACKET_SIZE } from '../osc/codec.js';
import type { Endpoint, OscMessage } from '../osc/types.js';
import { BindError, describeError, SendError, StateError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type DatagramListener = (bytes: Buffer, sender: Endpoint) => void;

function bindSocket(port: number, host?: string): Promise<dgram.Socket> {
  return new Promise((resolve, reject) => {
    const socket = dgram.createSocket('udp4');

    const onError = (error: Error) => {
      try {
        socket.close();
      } catch (closeError) {
        logger.debug('Socket was already closed after bind failure', { error: describeError(closeError) });
      }
      reject(new BindError(port, { cause: error }));
    };

    socket.once('error', onError);
    socket.bind(port, host, () => {
      socket.off('error', onError);
      resolve(socket);
    });
  });
}

function closeSocket(socket: dgram.Socket | null): Promise<void> {
  if (!socket) return Promise.resolve();
  return new Promise((resolve) => {
    socket.close(() => resolve());
  });
}

function endpointOf(socket: dgram.Socket | null): Endpoint | null {
  if (!socket) return null;
  const { address, port } = socket.address();
  return { host: address, port };
}

/**
 * Owns the node's two UDP sockets: one bound to the fixed receive port and
 * one on an ephemeral port for outbound replies.
 */
export class UdpTransport {
  private receiver: dgram.Socket | null = null;
  private sender: dgram.Socket | null = null;
  private closed = false;

  /**
   * Bind the receive socket.
   *
   * @throws {BindError} when the port is taken or the address is invalid.
   */
  public async bind(port: number, host?: string): Promise<void> {
    if (this.receiver || this.closed) {
      throw new StateError('Receive socket is already bound or the transport is closed');
    }
    const socket = await bindSocket(port, host);
    socket.on('error', (error) => {
      logger.error('Receive socket error', { error: error.message });
    });
    this.receiver = socket;

    const bound = endpointOf(socket);
    logger.info(`Listening on osc.udp://${bound?.host}:${bound?.port}`);
  }

  /** Bind the outbound socket to any free port. */
  public async openSender(): Promise<void> {
    if (this.sender || this.closed) {
      throw new StateError('Send socket is already open or the transport is closed');
    }
    const socket = await bindSocket(0);
    socket.on('error', (error) => {
      logger.error('Send socket error', { error: error.message });
    });
    this.sender = socket;

    logger.debug(`Ready to send using port ${endpointOf(socket)?.port}`);
  }

  /**
   * Deliver every datagram on the receive socket to `onDatagram`, in the
   * order the OS hands them over, until the transport is closed.
   */
  public receiveLoop(onDatagram: DatagramListener): void {
    const socket = this.receiver;
    if (!socket) {
      throw new StateError('Receive socket is not bound');
    }
    socket.on('message', (bytes, rinfo) => {
      if (bytes.length > MAX_PACKET_SIZE) {
        logger.warn(`Dropping ${bytes.length}-byte datagram from ${rinfo.address}:${rinfo.port}`);
        return;
      }
      onDatagram(bytes, { host: rinfo.address, port: rinfo.port });
    });
  }

  public send(message: OscMessage, destination: Endpoint): Promise<void> {
    const socket = this.sender;
    if (!socket || this.closed) {
      return Promise.reject(new SendError(`Cannot send ${message.address}: send socket is not open`));
    }

    const packet = encodeMessage(message);
    if (packet.length > MAX_PACKET_SIZE) {
      return Promise.reject(
        new SendError(`Cannot send ${message.address}: ${packet.length} bytes exceeds ${MAX_PACKET_SIZE}`)
      );
    }

    return new Promise((resolve, reject) => {
      socket.send(packet, destination.port, destination.host, (error) => {
        if (error) {
          reject(
            new SendError(`Failed to send ${message.address} to ${destination.host}:${destination.port}`, {
              cause: error,
            })
          );
          return;
        }
        resolve();
      });
    });
  }

  public receiveAddress(): Endpoint | null {
    return this.closed ? null : endpointOf(this.receiver);
  }

  public senderAddress(): Endpoint | null {
    return this.closed ? null : endpointOf(this.sender);
  }

  public isClosed(): boolean {
    return this.closed;
  }

  /** Close both sockets. Only the first call does anything. */
  public async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const receiver = this.receiver;
    const sender = this.sender;
    this.receiver = null;
    this.sender = null;
    await Promise.all([closeSocket(receiver), closeSocket(sender)]);
    logger.debug('UDP sockets closed');
  }
}
