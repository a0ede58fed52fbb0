import { getLogger } from '@wirecall/logger';

import type { Awaitable } from '../core/awaitable.js';

/**
 * A transport session that is either supplied by the caller or created
 * lazily on first use. Only a session created here is ever closed here, and
 * at most once.
 */
export class OwnedSession<S> {
  private readonly logger = getLogger('OwnedSession');
  private session: S | undefined;
  private readonly ownsSession: boolean;
  private closed = false;

  constructor(
    private readonly label: string,
    private readonly factory: () => S,
    supplied?: S | undefined
  ) {
    this.session = supplied;
    this.ownsSession = supplied === undefined;
  }

  get owned(): boolean {
    return this.ownsSession;
  }

  /** Whether a session exists yet (a supplied one always does) */
  get created(): boolean {
    return this.session !== undefined;
  }

  get(): S {
    if (this.closed) {
      throw new Error(`${this.label} session is closed`);
    }
    if (this.session === undefined) {
      this.session = this.factory();
      this.logger.debug({ transport: this.label }, 'Created transport session');
    }
    return this.session;
  }

  /**
   * Close the session with `closeSession` if this wrapper created it.
   * Later calls do nothing.
   */
  release(closeSession: (session: S) => Awaitable<void>): Awaitable<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const session = this.session;
    if (!this.ownsSession || session === undefined) {
      return;
    }
    this.logger.debug({ transport: this.label }, 'Closing transport session');
    return closeSession(session);
  }
}
