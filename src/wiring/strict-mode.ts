/**
 * Process-wide default for strict mode.
 *
 * Strict mode makes a builder reject a field resolver or default resolver that
 * is bound twice. Builders read the default once, when they are created, so
 * changing it never alters builders that already exist.
 *
 * @example
 * ```typescript
 * setDefaultStrictMode(false);
 * const builder = newTypeWiring('Pet'); // lenient
 * setDefaultStrictMode(true);
 * builder.isStrict(); // still false
 * ```
 */

import { InvalidArgumentError } from './errors.js';

/** Strict mode state every process starts with. */
export const INITIAL_STRICT_MODE = true;

/**
 * Holder for the default strict mode.
 *
 * Use instance() for the process-wide setting. Separate instances can be
 * created and handed to a builder where a test or an embedding needs its own.
 */
export class StrictModeSetting {
  private static _instance: StrictModeSetting | null = null;

  private strict: boolean;

  constructor(initial: boolean = INITIAL_STRICT_MODE) {
    this.strict = initial;
  }

  /**
   * Get the process-wide setting.
   */
  static instance(): StrictModeSetting {
    if (!StrictModeSetting._instance) {
      StrictModeSetting._instance = new StrictModeSetting();
    }
    return StrictModeSetting._instance;
  }

  /**
   * Drop the process-wide setting so the next read starts from the initial value.
   *
   * Primarily for testing.
   */
  static resetInstance(): void {
    StrictModeSetting._instance = null;
  }

  get(): boolean {
    return this.strict;
  }

  set(strict: boolean): void {
    if (typeof strict !== 'boolean') {
      throw new InvalidArgumentError('strict', 'Strict mode must be a boolean');
    }
    this.strict = strict;
  }
}

/**
 * Overwrite the process-wide default strict mode.
 *
 * Only builders created after this call see the new value.
 */
export function setDefaultStrictMode(strict: boolean): void {
  StrictModeSetting.instance().set(strict);
}

/**
 * Read the process-wide default strict mode.
 */
export function getDefaultStrictMode(): boolean {
  return StrictModeSetting.instance().get();
}
