/**
 * Async Reader function type that reads from environment E and resolves to R
 */
export type AsyncReader<E, R> = (env: E) => Promise<R>;
