/**
 * packages/core/src/renderer/renderLock.ts: Per-renderer mutual exclusion.
 *
 * Guards one renderer's layout container, engine binding and storage map.
 * JavaScript runs one call stack per realm, so the only way to reach a held
 * lock is re-entry from inside the guarded section (an engine or cache
 * callback calling back into the renderer). That throws STX_REENTRANT_CALL
 * instead of corrupting engine state mid-layout. The lock is always released
 * on the way out, including when the guarded work throws.
 */

import { StyledTextError } from "../errors.js";

export class RenderLock {
  private holder: string | null = null;

  get held(): boolean {
    return this.holder !== null;
  }

  run<T>(method: string, fn: () => T): T {
    if (this.holder !== null) {
      throw new StyledTextError(
        "STX_REENTRANT_CALL",
        `${method}: re-entrant call while ${this.holder} holds the renderer lock`,
      );
    }
    this.holder = method;
    try {
      return fn();
    } finally {
      this.holder = null;
    }
  }
}
