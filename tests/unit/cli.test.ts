import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../../src/cli.js';

describe('parseCliArgs()', () => {
  it('should default to quiet output', () => {
    expect(parseCliArgs([])).toEqual({ verbose: false, help: false });
  });

  it('should accept the verbose flag in long and short form', () => {
    expect(parseCliArgs(['--verbose']).verbose).toBe(true);
    expect(parseCliArgs(['-v']).verbose).toBe(true);
  });

  it('should accept the help flag', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
  });

  it('should reject unknown flags', () => {
    expect(() => parseCliArgs(['--port', '9000'])).toThrow();
  });

  it('should reject positional arguments', () => {
    expect(() => parseCliArgs(['extra'])).toThrow();
  });
});
