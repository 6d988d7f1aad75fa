/**
 * Nominal marker for values that crossed a parsing boundary,
 * e.g. configuration that went through `loadConfig`.
 *
 * A string key rather than a `unique symbol`, so exported types that carry it stay nameable.
 * Erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
