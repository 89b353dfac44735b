import { logger } from '../utils/logger.js';

export interface GeneratorParameters {
  xfreq: number;
  yfreq: number;
  xphase: number;
  yphase: number;
}

export type ParameterName = keyof GeneratorParameters;

export const PARAMETER_DEFAULTS: Readonly<GeneratorParameters> = Object.freeze({
  xfreq: 25,
  yfreq: 25,
  xphase: 0.0,
  yphase: 0.0,
});

/**
 * Generator parameters controlled from the patch. Owned by a single node
 * runtime and only touched from its message handlers.
 */
export class ParameterStore {
  private values: GeneratorParameters = { ...PARAMETER_DEFAULTS };

  public get(name: ParameterName): number {
    return this.values[name];
  }

  public set(name: ParameterName, value: number): void {
    this.values[name] = value;
    logger.debug(`${name} now ${value}`);
  }

  /**
   * Restore every field to its default in one step.
   */
  public reset(): void {
    this.values = { ...PARAMETER_DEFAULTS };
  }

  public snapshot(): Readonly<GeneratorParameters> {
    return { ...this.values };
  }
}
