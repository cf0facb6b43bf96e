/**
 * Run a command body against an engine and close it afterwards,
 * whether the body returns or throws.
 */

export interface ClosableEngine {
  close(): Promise<void>;
}

export async function withEngine<E extends ClosableEngine, T>(
  engine: E,
  body: (engine: E) => T | Promise<T>,
): Promise<T> {
  try {
    return await body(engine);
  } finally {
    await engine.close();
  }
}
