/**
 * Exhaustiveness check for `switch` over a discriminated union.
 * Adding a union member without a matching case fails to compile.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled union member: ${JSON.stringify(x)}`);
}
