import { ContextError } from "tessera-shared";
import type { HookEngine } from "../engine/engine";

// ============================================================================
// Render Context (set while an engine renders)
// ============================================================================

let activeEngine: HookEngine | null = null;

/**
 * Engine currently rendering. Throws if called outside render.
 */
export function getCurrentEngine(hook = "hook"): HookEngine {
  if (activeEngine === null) {
    throw ContextError.outsideRender(hook);
  }
  return activeEngine;
}

export function tryGetCurrentEngine(): HookEngine | null {
  return activeEngine;
}

/**
 * Set the rendering engine (called by the engine). Returns the previous one
 * so renders of different engines can nest.
 */
export function setActiveEngine(engine: HookEngine | null): HookEngine | null {
  const previous = activeEngine;
  activeEngine = engine;
  return previous;
}
