/**
 * # Tessera
 *
 * Hook-state engine with a reactive atom system. Render functions call hooks
 * that keep their state by call-site identity, read atoms that re-render
 * exactly the components that read them, and clean up after themselves when
 * their call-site disappears.
 *
 * ## Key Features
 *
 * - **Engine** - Explicit engine value owning every store; several may coexist
 * - **Hooks** - `useState`, `useEffect`, `useAtom`, `useComputed` and more
 * - **Atoms** - Reactive cells with equality bailout, inert writes and undo history
 * - **Reactions** - Derived atoms recomputed synchronously from their sources
 * - **Scheduler** - Deduplicated, batched re-renders with a reentrancy bound
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createEngine, component, useState } from 'tessera';
 *
 * const engine = createEngine();
 * const theme = engine.atoms.create('light', { name: 'theme' });
 *
 * const App = () => {
 *   const [clicks, setClicks] = useState(0);
 *   return [clicks, component(() => theme.get())];
 * };
 *
 * engine.runPass(App);
 * theme.set('dark'); // re-renders the child component only
 * ```
 *
 * @module tessera
 */

export * from "./identity/call-identity";
export * from "./identity/allocator";
export * from "./store/state-store";
export * from "./tracking/dependency-tracker";
export * from "./atoms/atom";
export * from "./atoms/atom-registry";
export * from "./atoms/reaction";
export * from "./atoms/history";
export * from "./lifecycle/effects";
export * from "./lifecycle/sweeper";
export * from "./scheduler/render-scheduler";
export * from "./config";
export * from "./diagnostics";
export * from "./engine/types";
export * from "./engine/engine";
export * from "./hooks";
