// src/core/render/PlaywrightRenderer.ts

import { chromium, type Browser } from 'playwright-core';
import type { RenderConfig } from '../../config/ConfigValidator';
import type { Logger } from '../../observability/Logger';
import type { RenderOptions, Renderer } from './Renderer';
import { ConfigurationError, ExtractionError, errorMessage } from '../../utils/errors';

/**
 * Headless Chromium renderer. The browser is launched on first use and shared
 * by every page rendered through this instance.
 */
export class PlaywrightRenderer implements Renderer {
  private browser?: Promise<Browser>;

  constructor(
    private config: RenderConfig,
    private logger: Logger
  ) {}

  async render(url: string, options: RenderOptions = {}): Promise<string> {
    if (options.signal?.aborted) {
      throw new ExtractionError(`Render of ${url} aborted`, { url });
    }
    const browser = await this.launch();
    const context = await browser.newContext();
    const page = await context.newPage();
    const abort = () => {
      context.close().catch((error: unknown) => {
        this.logger.debug('Browser context close failed', { url, error: errorMessage(error) });
      });
    };
    options.signal?.addEventListener('abort', abort, { once: true });

    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.config.timeoutMs });

      if (options.waitFor) {
        try {
          await page.waitForSelector(options.waitFor, { timeout: this.config.timeoutMs });
        } catch (error: unknown) {
          throw new ExtractionError(`Selector ${options.waitFor} never appeared on ${url}`, {
            url,
            cause: errorMessage(error),
          });
        }
      }

      const settleMs = options.settleMs ?? this.config.settleMs;
      if (settleMs > 0) {
        await page.waitForTimeout(settleMs);
      }

      const html = await page.content();
      this.logger.debug('Page rendered', { url, length: html.length });
      return html;
    } finally {
      options.signal?.removeEventListener('abort', abort);
      await context.close();
    }
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    const pending = this.browser;
    this.browser = undefined;
    try {
      const browser = await pending;
      await browser.close();
    } catch (error: unknown) {
      // A browser that never launched has nothing to close
      this.logger.debug('Renderer close skipped', { error: errorMessage(error) });
    }
  }

  private launch(): Promise<Browser> {
    if (!this.browser) {
      this.browser = chromium
        .launch({ headless: this.config.headless, timeout: this.config.timeoutMs })
        .catch((error: unknown) => {
          throw new ConfigurationError(
            `Browser rendering unavailable: ${errorMessage(error).split('\n')[0]}`,
            { engine: 'chromium' }
          );
        });
    }
    return this.browser;
  }
}
