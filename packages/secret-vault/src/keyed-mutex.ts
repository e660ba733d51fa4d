/**
 * Serializes async operations that share a key. Operations on different keys
 * never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  public async runExclusive<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    let release: () => void = () => undefined
    const current = new Promise<void>(resolve => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous
    try {
      return await operation()
    } finally {
      release()
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  public get pendingKeyCount() {
    return this.tails.size
  }
}
