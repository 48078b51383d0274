// packages/core/src/utils/assert.ts

/** Exhaustiveness guard for switches over tagged unions. */
export function assertNever(value: never, context = 'value'): never {
  throw new Error(`Unhandled ${context}: ${String(value)}`);
}
