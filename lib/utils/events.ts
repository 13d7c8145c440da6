/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import { EventEmitter as NodeEventEmitter } from 'node:events'

/**
 * Anything that can receive forwarded events.
 */
export interface EventSink {
  dispatch(event: string, args: unknown[]): void
}

/**
 * Typed event emitter. `Events` maps each event name to its listener arguments.
 */
export default class EventEmitter<Events extends Record<keyof Events, unknown[]>> implements EventSink {
  private readonly emitter = new NodeEventEmitter()
  private readonly targets: EventSink[] = []

  on<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void) {
    this.emitter.on(event, listener)
    return this
  }

  once<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void) {
    this.emitter.once(event, listener)
    return this
  }

  off<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void) {
    this.emitter.off(event, listener)
    return this
  }

  emit<K extends keyof Events & string>(event: K, ...args: Events[K]) {
    this.dispatch(event, args)
  }

  dispatch(event: string, args: unknown[]) {
    this.emitter.emit(event, ...args)
    this.targets.forEach((target) => target.dispatch(event, args))
  }

  /**
   * Re-emit every event of this emitter on `target`.
   * @param target The emitter (usually the owner of this one) to forward events to.
   */
  forwardEvents(target: EventSink) {
    this.targets.push(target)
  }
}
