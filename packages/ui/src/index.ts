/**
 * @spindle/ui
 *
 * The view-facing side of a loop: event injection, the latest state,
 * two-way bindings and render callbacks.
 *
 * @packageDocumentation
 */

export { type Binding, type BindingEvent, createBinding } from "./binding.js"
export {
  createSyncStore,
  type SyncStore,
  type SyncStoreOptions,
} from "./create-sync-store.js"
export {
  LoopHandle,
  type LoopHandleOptions,
  type Renderer,
} from "./loop-handle.js"
