/**
 * Shared state handed to the HTTP and WebSocket layers.
 *
 * @module vipervault/context
 */

import type { VaultConfig, ViewConfig } from './config';
import type { SessionStore } from './session-store';
import { renderView } from './output';

export interface VaultContext {
  config: VaultConfig;
  store: SessionStore;
  /** Runs the view's command; replaced in tests. */
  renderView(name: string, view: ViewConfig): Promise<string>;
}

export function createContext(config: VaultConfig, store: SessionStore): VaultContext {
  return {
    config,
    store,
    renderView: (name, view) => renderView(name, view, config)
  };
}
