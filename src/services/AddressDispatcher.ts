import { argumentValues } from '../osc/codec.js';
import type { Endpoint, OscMessage } from '../osc/types.js';
import { describeError, DispatchError, RegistrationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';

/**
 * A message handler. Synchronous work runs on the dispatching turn; a
 * returned promise is tracked until it settles.
 */
export type OscHandler = (message: OscMessage, sender: Endpoint) => void | Promise<void>;

export type DispatchRoute = 'handler' | 'fallback';

const FALLBACK_LABEL = 'fallback';

/**
 * Logs the unmatched address with its arguments and takes no other action.
 */
export const logUnmatched: OscHandler = (message, sender) => {
  logger.info(
    `Received OSC message with unhandled address '${message.address}' from ${sender.host}:${sender.port}`,
    { args: argumentValues(message) }
  );
};

/**
 * Routes messages to handlers by exact address. Exactly one fallback is
 * active at any time; registrations are fixed once the node starts.
 */
export class AddressDispatcher {
  private handlers: Map<string, OscHandler> = new Map();
  private fallback: OscHandler = logUnmatched;
  private inFlight: Set<Promise<void>> = new Set();

  public register(pattern: string, handler: OscHandler): void {
    if (!pattern.startsWith('/')) {
      throw new RegistrationError(`OSC address must start with '/': '${pattern}'`);
    }
    if (this.handlers.has(pattern)) {
      throw new RegistrationError(`A handler is already registered for '${pattern}'`);
    }
    this.handlers.set(pattern, handler);
    logger.debug(`Registered handler for ${pattern}`);
  }

  public setFallback(handler: OscHandler): void {
    this.fallback = handler;
  }

  public patterns(): string[] {
    return [...this.handlers.keys()];
  }

  /**
   * Invoke the handler registered for the message's address, or the
   * fallback. Handler failures are logged and counted here and never reach
   * the caller.
   */
  public dispatch(message: OscMessage, sender: Endpoint): DispatchRoute {
    const handler = this.handlers.get(message.address);
    const route: DispatchRoute = handler ? 'handler' : 'fallback';
    const label = handler ? message.address : FALLBACK_LABEL;
    metrics.messagesDispatched.inc({ route });

    let result: void | Promise<void>;
    try {
      result = (handler ?? this.fallback)(message, sender);
    } catch (error) {
      this.reportFailure(message, label, error);
      return route;
    }

    if (result instanceof Promise) {
      this.track(
        result.catch((error: unknown) => {
          this.reportFailure(message, label, error);
        })
      );
    }
    return route;
  }

  /**
   * Resolves once every asynchronous handler started so far has finished.
   */
  public async settle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  public pending(): number {
    return this.inFlight.size;
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.finally(() => {
      this.inFlight.delete(task);
    });
  }

  private reportFailure(message: OscMessage, label: string, error: unknown): void {
    const failure =
      error instanceof DispatchError
        ? error
        : new DispatchError(message.address, `Handler for ${message.address} failed: ${describeError(error)}`, {
            cause: error,
          });
    metrics.dispatchErrors.inc({ address: label });
    logger.error(failure.message, { address: message.address, args: argumentValues(message) });
  }
}
