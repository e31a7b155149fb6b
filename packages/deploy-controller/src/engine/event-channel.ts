import { createServiceLogger, type Logger } from "@stackship/logger"
import { errorMessage } from "@stackship/shared"

export type EventListener<T> = (event: T) => void | Promise<void>

/**
 * Fan-out of events to any number of listeners.
 * Emitting never waits on a listener; one that throws or rejects is detached
 * and the rest keep receiving events.
 */
export class EventChannel<T> {
  private listeners = new Set<EventListener<T>>()
  private logger: Logger

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createServiceLogger("Events")
  }

  subscribe(listener: EventListener<T>): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  emit(event: T): void {
    for (const listener of [...this.listeners]) {
      try {
        const result = listener(event)
        if (result instanceof Promise) {
          void result.catch(error => this.detach(listener, error))
        }
      } catch (error) {
        this.detach(listener, error)
      }
    }
  }

  get listenerCount(): number {
    return this.listeners.size
  }

  private detach(listener: EventListener<T>, error: unknown): void {
    if (this.listeners.delete(listener)) {
      this.logger.warn(`Listener failed and was removed: ${errorMessage(error)}`)
    }
  }
}
