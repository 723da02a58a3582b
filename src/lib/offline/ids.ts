/**
 * Identity and time sources for the offline layer.
 * Injected so tests can replace them with deterministic versions.
 */

export interface IdAllocator {
  nextId(): string;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** UUIDs generated client-side. */
export const uuidAllocator: IdAllocator = {
  nextId: () => crypto.randomUUID(),
};

/** `prefix-1`, `prefix-2`, ... */
export function sequenceAllocator(prefix = 'mut'): IdAllocator {
  let counter = 0;
  return {
    nextId: () => {
      counter++;
      return `${prefix}-${counter}`;
    },
  };
}
