/**
 * Exhaustiveness guard for discriminated unions (error codes, edge kinds,
 * session phases). Adding a union member without handling it is a compile error.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}
