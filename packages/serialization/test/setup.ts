/**
 * Jest test setup - Configuration only, no logic
 */

import { jest } from '@jest/globals';

jest.setTimeout(30000);

declare global {
  namespace jest {
    interface Matchers<R> {
      toBeFilledWith(byte: number): R;
    }
  }
}

expect.extend({
  toBeFilledWith(received: unknown, byte: number) {
    const pass =
      received instanceof Uint8Array && received.every(value => value === byte);

    return {
      pass,
      message: () =>
        pass
          ? `expected bytes not to be filled with 0x${byte.toString(16).padStart(2, '0')}`
          : `expected bytes to be filled with 0x${byte.toString(16).padStart(2, '0')}`
    };
  }
});
