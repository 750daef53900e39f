// src/core/render/Renderer.ts

import { ConfigurationError } from '../../utils/errors';

export interface RenderOptions {
  waitFor?: string; // CSS selector that must be present before capture
  settleMs?: number;
  signal?: AbortSignal;
}

/**
 * Produces fully rendered markup for pages that build their DOM in the browser.
 */
export interface Renderer {
  render(url: string, options?: RenderOptions): Promise<string>;
  close(): Promise<void>;
}

export class DisabledRenderer implements Renderer {
  async render(url: string): Promise<string> {
    throw new ConfigurationError('Rendering is disabled (HARVEST_RENDER_ENABLED=false)', { url });
  }

  async close(): Promise<void> {
    // nothing launched
  }
}
