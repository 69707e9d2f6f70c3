export type ServerStateSnapshot = {
  alive: boolean
  ready: boolean
}

/**
 * Liveness and readiness flags of one admin status server.
 *
 * Writes are never rejected; `ready` implies `alive` only when read through
 * {@link ServerState.isReady}.
 */
export class ServerState {
  private alive = false
  private ready = false

  public setAlive(value: boolean) {
    this.alive = value
  }

  public setReady(value: boolean) {
    this.ready = value
  }

  public isLive() {
    return this.alive
  }

  public isReady() {
    return this.alive && this.ready
  }

  public snapshot(): ServerStateSnapshot {
    return {alive: this.alive, ready: this.ready}
  }
}
