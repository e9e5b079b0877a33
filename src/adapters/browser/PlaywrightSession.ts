import { randomInt } from 'node:crypto';
import { firefox, type Browser, type BrowserContext, type BrowserType, type Page } from 'playwright-core';
import type {
  ArtifactPoster,
  ContentDiscoverer,
  DiscoverOptions,
  ExternalRuntimeSession,
  PostRequest,
} from '../../pipeline/collaborators.js';
import { FatalError, TransientError, errorMessage } from '../../pipeline/errors.js';
import type { ContentRef } from '../../types.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import { sleep } from '../../utils/retry.js';
import { loadCookies, toBrowserCookie } from '../cookies.js';

export interface PlaywrightSessionOptions {
  feedUrl: string;
  /** JSON cookie export applied after every start */
  cookiesFile: string;
  headless: boolean;
  discoveryRetries: number;
  navigationTimeoutMs?: number;
}

const VIDEO_LINK_SELECTOR = 'a[href*="/video/"]';
const SCROLL_PX = { min: 400, max: 1200 };
const SCROLL_PAUSE_MS = { min: 1000, max: 1600 };
const REFRESH_PAUSE_MS = 1200;
const ELEMENT_TIMEOUT_MS = 15_000;
const TYPING_DELAY_MS = 50;

const between = (range: { min: number; max: number }): number => randomInt(range.min, range.max + 1);

function shuffle<T>(items: T[]): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomInt(i + 1);
    const swap = result[i];
    const other = result[j];
    if (swap !== undefined && other !== undefined) {
      result[i] = other;
      result[j] = swap;
    }
  }
  return result;
}

/**
 * A single Firefox page that scrolls the feed for fresh links and drives the
 * upload form. The launcher is injectable; browsers are not downloaded here,
 * so Firefox must already be installed for Playwright.
 */
export class PlaywrightSession implements ExternalRuntimeSession, ContentDiscoverer, ArtifactPoster {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;

  constructor(
    private readonly options: PlaywrightSessionOptions,
    private readonly launcher: BrowserType = firefox,
    private readonly logger: Logger = createLogger('browser')
  ) {}

  isRunning(): boolean {
    return this.browser?.isConnected() ?? false;
  }

  async start(): Promise<void> {
    if (this.isRunning()) {
      return;
    }

    const browser = await this.launcher.launch({ headless: this.options.headless });
    const context = await browser.newContext({ viewport: { width: 1200, height: 900 } });
    const page = await context.newPage();
    page.setDefaultNavigationTimeout(this.options.navigationTimeoutMs ?? 30_000);

    this.browser = browser;
    this.context = context;
    this.page = page;

    await page.goto(this.options.feedUrl, { waitUntil: 'domcontentloaded' });
    this.logger.info('Firefox session started');
  }

  /**
   * Adds each stored cookie to the context and reloads. A cookie that is
   * rejected is logged and skipped.
   */
  async applyStoredCredentials(): Promise<void> {
    const { context, page } = this.requireSession();
    const cookies = await loadCookies(this.options.cookiesFile);

    let applied = 0;
    for (const cookie of cookies) {
      try {
        await context.addCookies([toBrowserCookie(cookie)]);
        applied++;
      } catch (error) {
        this.logger.error(`Failed to add cookie ${cookie.name}: ${errorMessage(error)}`);
      }
    }

    await page.reload({ waitUntil: 'domcontentloaded' });
    this.logger.info(`Applied ${applied}/${cookies.length} cookies`);
  }

  async stop(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.context = null;
    this.page = null;

    if (browser) {
      await browser.close();
      this.logger.info('Firefox session closed');
    }
  }

  /**
   * Scrolls the feed and returns a random unseen video link, reloading the
   * page on every other attempt.
   * @throws {FatalError} once every attempt came up empty
   */
  async discoverOne({ isSeen, signal }: DiscoverOptions): Promise<ContentRef> {
    const { page } = this.requireSession();
    const attempts = this.options.discoveryRetries;

    for (let attempt = 0; attempt < attempts; attempt++) {
      if (signal?.aborted) {
        throw new TransientError('Discovery was aborted');
      }

      try {
        await page.mouse.wheel(0, between(SCROLL_PX));
        await sleep(between(SCROLL_PAUSE_MS), signal);

        const fresh = shuffle(await this.collectVideoLinks(page)).find((href) => !isSeen(href));
        if (fresh) {
          this.logger.info(`Found video link: ${fresh}`);
          return fresh;
        }
      } catch (error) {
        this.logger.warn(`Attempt ${attempt + 1} failed to find a video link: ${errorMessage(error)}`);
      }

      if (attempt % 2 === 0) {
        try {
          await page.reload({ waitUntil: 'domcontentloaded' });
          await sleep(REFRESH_PAUSE_MS, signal);
        } catch (error) {
          this.logger.warn(`Feed reload failed: ${errorMessage(error)}`);
        }
      }
    }

    throw new FatalError(`Failed to locate a unique video link after ${attempts} attempts`);
  }

  /**
   * Uploads through the web form. Resolves false instead of throwing so a
   * failed post never disturbs navigation.
   */
  async post({ path, caption, hashtags, signal }: PostRequest): Promise<boolean> {
    try {
      const { page } = this.requireSession();

      await page.goto(this.options.feedUrl, { waitUntil: 'domcontentloaded' });
      await sleep(between({ min: 1000, max: 2000 }), signal);

      await page.locator('input[type="file"]').first().setInputFiles(path, { timeout: ELEMENT_TIMEOUT_MS });
      await sleep(between({ min: 2000, max: 4000 }), signal);

      const editor = page.locator('[contenteditable="true"]').first();
      await editor.click({ timeout: ELEMENT_TIMEOUT_MS });
      const fullCaption = `${caption} ${hashtags.join(' ')}`.trim();
      await editor.pressSequentially(fullCaption, { delay: TYPING_DELAY_MS });
      await sleep(between({ min: 1000, max: 3000 }), signal);

      await page.getByRole('button', { name: 'Post' }).first().click({ timeout: ELEMENT_TIMEOUT_MS });
      await sleep(5000, signal);

      this.logger.info(`Posted video ${path}`);
      return true;
    } catch (error) {
      this.logger.error(`Posting ${path} failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private async collectVideoLinks(page: Page): Promise<string[]> {
    const anchors = await page.locator(VIDEO_LINK_SELECTOR).all();
    const links: string[] = [];
    for (const anchor of anchors) {
      const href = await anchor.getAttribute('href');
      if (href) {
        links.push(new URL(href, page.url()).toString());
      }
    }
    return links;
  }

  private requireSession(): { context: BrowserContext; page: Page } {
    if (!this.context || !this.page) {
      throw new TransientError('Browser session is not running');
    }
    return { context: this.context, page: this.page };
  }
}
