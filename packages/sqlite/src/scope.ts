/**
 * Anything with a scope-exit method: transactions dispose, statements close,
 * columns release.
 */
export type ScopedResource = { dispose(): void } | { close(): void } | { release(): void };

function exitScope(resource: ScopedResource): void {
  if ('dispose' in resource) {
    resource.dispose();
  } else if ('close' in resource) {
    resource.close();
  } else {
    resource.release();
  }
}

/**
 * Run `fn` with `resource` and always clean the resource up afterwards,
 * whether `fn` returns or throws.
 */
export function scoped<R extends ScopedResource, T>(resource: R, fn: (resource: R) => T): T {
  try {
    return fn(resource);
  } finally {
    exitScope(resource);
  }
}
