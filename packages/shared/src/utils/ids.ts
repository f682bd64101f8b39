/**
 * ID generation with support for deterministic testing.
 *
 * By default, uses timestamp + crypto.randomUUID() for unique IDs.
 */

/**
 * IdGenerator interface for injectable ID generation.
 */
export interface IdGenerator {
  generate(prefix?: string): string;
}

/**
 * Default ID generator using timestamp + crypto random.
 */
export const defaultIdGenerator: IdGenerator = {
  generate: (prefix?: string) => {
    const timestamp = Date.now().toString(36);
    const random = globalThis.crypto.randomUUID().slice(0, 8);
    return prefix ? `${prefix}-${timestamp}-${random}` : `${timestamp}-${random}`;
  },
};

export interface GenerateIdOptions {
  /**
   * Custom ID generator for deterministic testing.
   */
  idGenerator?: IdGenerator;
}

/**
 * Generate a correlation ID that ties together the log lines of one API call.
 *
 * @example
 * generateCorrelationId() // => 'cor-lq2x4y-a1b2c3d4'
 *
 * const fixed = { generate: () => 'cor-fixed' };
 * generateCorrelationId({ idGenerator: fixed }) // => 'cor-fixed'
 */
export function generateCorrelationId(options?: GenerateIdOptions): string {
  const generator = options?.idGenerator ?? defaultIdGenerator;
  return generator.generate('cor');
}
