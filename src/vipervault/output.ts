/**
 * Output rendering for views.
 *
 * @module vipervault/output
 */

import type { VaultConfig, ViewConfig } from './config';
import { getViewOutput } from './command-runner';

const TEXT_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;'
};

const ATTRIBUTE_ESCAPES: Record<string, string> = {
  ...TEXT_ESCAPES,
  '"': '&quot;',
  "'": '&#x27;'
};

/**
 * Escape `&`, `<` and `>`. Quotes are left alone.
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>]/g, ch => TEXT_ESCAPES[ch]);
}

/**
 * Escape for use inside a quoted attribute value.
 */
export function escapeAttribute(text: string): string {
  return text.replace(/[&<>"']/g, ch => ATTRIBUTE_ESCAPES[ch]);
}

export function renderViewOutput(view: Pick<ViewConfig, 'safe_output'>, raw: string): string {
  return view.safe_output ? escapeHtml(raw) : raw;
}

/**
 * Run a view's command and render the result as it is sent to the browser.
 */
export async function renderView(
  name: string,
  view: ViewConfig,
  limits: Pick<VaultConfig, 'command_timeout' | 'max_output_bytes'>
): Promise<string> {
  const raw = await getViewOutput(view.cmd, {
    view: name,
    timeoutMs: limits.command_timeout * 1000,
    maxOutputBytes: limits.max_output_bytes
  });
  return renderViewOutput(view, raw);
}
