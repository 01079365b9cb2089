/**
 * Single-initialization gate keyed by name.
 *
 * The first `run` for a key calls the body and stores its result; later calls for the same key return
 * the stored result without calling anything.
 */
export class OnceGate<T = void> {
  private readonly results = new Map<string, { value: T }>();

  run(key: string, body: () => T): { value: T; fresh: boolean } {
    const done = this.results.get(key);

    if (done) {
      return { value: done.value, fresh: false };
    }

    const entry = { value: body() };

    this.results.set(key, entry);

    return { value: entry.value, fresh: true };
  }
}
