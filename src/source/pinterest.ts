import { chromium, type Browser, type BrowserContext, type Page } from 'playwright-core';
import type { Config } from '../shared/config.js';
import type { CandidateRecord, EndOfStream, RecordSession, RecordSource } from '../harvest/types.js';
import { END_OF_STREAM } from '../harvest/types.js';
import { CancelledError, SourceError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { abortable, nowISO, randomBetween, sleep, throwIfAborted } from '../shared/utils.js';

const BASE_URL = 'https://www.pinterest.com';

const SELECTORS = {
  card: 'div[data-test-id="pin"]',
  title: 'div[data-test-id="pin-title"]',
  description: 'div[data-test-id="pin-description"]',
  image: 'img[src*="pinimg.com"]',
  link: 'a[href*="/pin/"]',
} as const;

const BROWSER_ARGS = [
  '--no-sandbox',
  '--disable-blink-features=AutomationControlled',
  '--disable-web-security',
  '--disable-features=VizDisplayCompositor',
];

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

const STEALTH_SCRIPT = `
  Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
  Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });
  Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
  window.chrome = { runtime: {} };
`;

/**
 * Text and attributes read from one pin card in the page.
 */
export interface RawPinCard {
  title: string | null;
  description: string | null;
  imgSrc: string | null;
  href: string | null;
}

export function searchUrl(topic: string): string {
  return `${BASE_URL}/search/pins/?q=${encodeURIComponent(topic)}`;
}

export function extractPinId(href: string): string {
  const afterPin = href.split('/pin/').pop() ?? '';
  return afterPin.split('/')[0] ?? '';
}

/**
 * Turn a raw card into a candidate; cards without an image or a pin link are dropped.
 */
export function parsePinCard(
  card: RawPinCard,
  category: string,
  topic: string,
  scrapedAt: string = nowISO(),
): CandidateRecord | null {
  const href = card.href ?? '';
  const pinId = href ? extractPinId(href) : '';
  if (!card.imgSrc || !pinId) return null;

  return Object.freeze({
    sourceItemId: pinId,
    title: (card.title ?? '').trim(),
    description: (card.description ?? '').trim(),
    imageRef: card.imgSrc,
    pinUrl: href.startsWith('http') ? href : `${BASE_URL}${href}`,
    category,
    topic,
    scrapedAt,
  });
}

function randomInt(min: number, max: number): number {
  return Math.floor(randomBetween(min, max + 1));
}

export interface PinterestSourceOptions {
  headless: boolean;
  timeoutMs: number;
  proxy?: string;
  executablePath?: string;
  maxStagnantScrolls: number;
}

export function pinterestOptionsFromConfig(config: Config['source']): PinterestSourceOptions {
  return {
    headless: config.headless,
    timeoutMs: config.timeout_ms,
    proxy: config.proxy || undefined,
    executablePath: config.executable_path || undefined,
    maxStagnantScrolls: config.max_stagnant_scrolls,
  };
}

/**
 * One browser per topic session. Each pull scrolls like a person, then reads
 * every visible card and returns the ones not returned before. The stream
 * ends after maxStagnantScrolls pulls in a row leave the page height unchanged.
 */
class PinterestSession implements RecordSession {
  private readonly seen = new Set<string>();
  private lastHeight = 0;
  private stagnantScrolls = 0;

  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly category: string,
    private readonly topic: string,
    private readonly maxStagnantScrolls: number,
  ) {}

  async nextBatch(signal?: AbortSignal): Promise<CandidateRecord[] | EndOfStream> {
    if (this.stagnantScrolls >= this.maxStagnantScrolls) return END_OF_STREAM;

    try {
      await this.humanLikeScroll(signal);
      await this.randomMouseMove(signal);
      await sleep(randomBetween(1800, 4200), signal);

      const cards = await abortable(
        this.page.$$eval(
          SELECTORS.card,
          (elements, sel) =>
            elements.map((el) => ({
              title: el.querySelector<HTMLElement>(sel.title)?.innerText ?? null,
              description: el.querySelector<HTMLElement>(sel.description)?.innerText ?? null,
              imgSrc: el.querySelector(sel.image)?.getAttribute('src') ?? null,
              href: el.querySelector(sel.link)?.getAttribute('href') ?? null,
            })),
          SELECTORS,
        ),
        signal,
      );

      const height = await abortable(
        this.page.evaluate(() => document.body.scrollHeight),
        signal,
      );
      if (height === this.lastHeight) {
        this.stagnantScrolls++;
      } else {
        this.stagnantScrolls = 0;
        this.lastHeight = height;
      }

      const scrapedAt = nowISO();
      const batch: CandidateRecord[] = [];
      for (const card of cards) {
        const candidate = parsePinCard(card, this.category, this.topic, scrapedAt);
        if (!candidate || this.seen.has(candidate.sourceItemId)) continue;
        this.seen.add(candidate.sourceItemId);
        batch.push(candidate);
      }
      return batch;
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      throw new SourceError(`Scroll failed: ${errorMessage(err)}`, { topic: this.topic });
    }
  }

  async close(): Promise<void> {
    await this.browser.close();
  }

  private async humanLikeScroll(signal?: AbortSignal): Promise<void> {
    const viewportHeight = this.page.viewportSize()?.height ?? 1080;
    for (let i = randomInt(2, 5); i > 0; i--) {
      const distance = randomInt(300, Math.max(300, viewportHeight - 200));
      await abortable(this.page.evaluate((d) => window.scrollBy(0, d), distance), signal);
      await sleep(randomBetween(800, 2200), signal);
    }
  }

  private async randomMouseMove(signal?: AbortSignal): Promise<void> {
    const viewport = this.page.viewportSize() ?? { width: 1920, height: 1080 };
    const x = randomInt(100, viewport.width - 100);
    const y = randomInt(100, viewport.height - 100);
    await abortable(this.page.mouse.move(x, y, { steps: randomInt(8, 15) }), signal);
    await sleep(randomBetween(300, 1000), signal);
  }
}

export class PinterestSource implements RecordSource {
  constructor(private readonly options: PinterestSourceOptions) {}

  async open(category: string, topic: string, signal?: AbortSignal): Promise<RecordSession> {
    throwIfAborted(signal);

    let browser: Browser;
    try {
      browser = await chromium.launch({
        headless: this.options.headless,
        executablePath: this.options.executablePath,
        proxy: this.options.proxy ? { server: this.options.proxy } : undefined,
        args: BROWSER_ARGS,
      });
    } catch (err) {
      throw new SourceError(`Browser launch failed: ${errorMessage(err)}`);
    }
    if (signal?.aborted) {
      await browser.close();
      throw new CancelledError();
    }

    try {
      const context = await this.newContext(browser);
      const page = await context.newPage();

      const timeout = this.options.timeoutMs;
      await abortable(page.goto(BASE_URL, { waitUntil: 'domcontentloaded', timeout }), signal);
      await sleep(randomBetween(2000, 4000), signal);
      await abortable(page.goto(searchUrl(topic), { waitUntil: 'domcontentloaded', timeout }), signal);
      await this.acceptCookies(page);
      throwIfAborted(signal);

      logger.debug({ category, topic }, 'Search page loaded');
      return new PinterestSession(browser, page, category, topic, this.options.maxStagnantScrolls);
    } catch (err) {
      await browser.close();
      if (err instanceof CancelledError) throw err;
      throw new SourceError(`Failed to open search for "${topic}": ${errorMessage(err)}`, { topic });
    }
  }

  private async newContext(browser: Browser): Promise<BrowserContext> {
    const context = await browser.newContext({
      viewport: { width: 1920, height: 1080 },
      userAgent: USER_AGENT,
      locale: 'en-US',
      timezoneId: 'America/New_York',
      extraHTTPHeaders: {
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
        DNT: '1',
        'Upgrade-Insecure-Requests': '1',
      },
    });
    await context.addInitScript(STEALTH_SCRIPT);
    return context;
  }

  private async acceptCookies(page: Page): Promise<void> {
    try {
      await page.getByRole('button', { name: 'Accept all' }).click({ timeout: 8000 });
    } catch (err) {
      logger.debug({ error: errorMessage(err) }, 'No cookie banner');
    }
  }
}
