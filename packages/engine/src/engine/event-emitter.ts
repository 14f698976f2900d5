// ─── Event Emitter ─────────────────────────────────────────────────
// A typed, synchronous emitter for engine events. Listeners run in
// registration order, so a listener subscribed first observes an event
// (and finishes any cascade it causes) before later listeners run.

import type { EngineEventListener, EngineEventMap, EngineEventName } from "../types/index.js";

type ListenerTable = { [K in EngineEventName]: Array<EngineEventListener<K>> };

function emptyTable(): ListenerTable {
  return {
    "damage-dealt": [],
    "player-died": [],
    "character-revealed": [],
    "ability-triggered": [],
    "ability-activated": [],
    "ability-failed": [],
    "turn-started": [],
    "phase-changed": [],
    "equipment-changed": [],
    "card-drawn": [],
    "game-over": [],
  };
}

export class EngineEventEmitter {
  private listeners: ListenerTable = emptyTable();

  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends EngineEventName>(event: K, listener: EngineEventListener<K>): () => void {
    this.listeners[event].push(listener);
    return () => this.off(event, listener);
  }

  /** Subscribe for a single emission only. */
  once<K extends EngineEventName>(event: K, listener: EngineEventListener<K>): () => void {
    const wrapper: EngineEventListener<K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };
    return this.on(event, wrapper);
  }

  off<K extends EngineEventName>(event: K, listener: EngineEventListener<K>): void {
    const list = this.listeners[event];
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends EngineEventName>(event: K, payload: EngineEventMap[K]): void {
    // Copy so listeners can unsubscribe during emission
    const snapshot = [...this.listeners[event]];
    for (const fn of snapshot) {
      fn(payload);
    }
  }

  removeAllListeners(): void {
    this.listeners = emptyTable();
  }

  listenerCount(event: EngineEventName): number {
    return this.listeners[event].length;
  }
}
