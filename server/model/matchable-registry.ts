import type { Matchable } from './matchable.js'

/**
 * Per-port ordered collections of matchables
 *
 * Lookups prefer the most recently registered match, so registering a second
 * matchable for the same pattern overrides the first until it is removed.
 *
 * Not synchronized: a registry belongs to one event loop. Sharing an instance
 * across worker threads is unsupported.
 */
export class MatchableRegistry<T extends Matchable = Matchable> {
  private readonly byPort = new Map<number, T[]>()

  register(matchable: T, port: number): void {
    const elements = this.byPort.get(port)
    if (elements) {
      elements.push(matchable)
    } else {
      this.byPort.set(port, [matchable])
    }
  }

  /**
   * Remove every element on `port` with the given id
   */
  unregister(id: string, port: number): void {
    const elements = this.byPort.get(port)
    if (!elements) {
      return
    }
    this.byPort.set(port, elements.filter(element => element.id !== id))
  }

  reset(port: number): void {
    this.byPort.delete(port)
  }

  findForEndpoint(path: string, port: number): T | undefined {
    const elements = this.byPort.get(port) || []
    for (let i = elements.length - 1; i >= 0; i--) {
      if (elements[i].matches(path)) {
        return elements[i]
      }
    }
    return undefined
  }

  findAllForEndpoint(path: string, port: number): T[] {
    const elements = this.byPort.get(port) || []
    return elements.filter(element => element.matches(path))
  }

  /**
   * Ports that currently hold at least one element
   */
  ports(): number[] {
    return Array.from(this.byPort.entries())
      .filter(([, elements]) => elements.length > 0)
      .map(([port]) => port)
  }

  size(port: number): number {
    return this.byPort.get(port)?.length ?? 0
  }

  all(port: number): T[] {
    return [...(this.byPort.get(port) || [])]
  }
}
