/**
 * Binary Cache
 *
 * Explicit cache of provisioned binary paths, keyed by the absolute
 * version-scoped install directory. Each key is written once, after its
 * provisioning promise resolves, and read thereafter.
 *
 * Concurrent first requests for the same key share one in-flight promise, so
 * at most one fetch/extract sequence runs per version directory. A rejected
 * promise is dropped without caching anything; the next request starts over.
 */

export class BinaryCache {
  private readonly resolved = new Map<string, string>()
  private readonly inflight = new Map<string, Promise<string>>()

  /**
   * Return the cached path for key, joining an in-flight provisioning if one
   * exists, otherwise run create() and cache its result on success.
   */
  getOrCreate(key: string, create: () => Promise<string>): Promise<string> {
    const cached = this.resolved.get(key)
    if (cached !== undefined) {
      return Promise.resolve(cached)
    }

    const pending = this.inflight.get(key)
    if (pending) {
      return pending
    }

    const promise = create().then(
      (path) => {
        this.resolved.set(key, path)
        this.inflight.delete(key)
        return path
      },
      (error: unknown) => {
        this.inflight.delete(key)
        throw error
      },
    )
    this.inflight.set(key, promise)
    return promise
  }

  evict(key: string): boolean {
    return this.resolved.delete(key)
  }
}

/**
 * Process-wide cache used by every provisioner that is not given its own, so
 * separate provisioners pointed at the same install dir share one download
 */
export const binaryCache = new BinaryCache()
