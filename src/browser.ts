import { chromium, type Browser, type BrowserContext, type Locator, type Page } from 'playwright-core';
import type { AppConfig, ManagedSession, PageElement, Position, SessionGateway } from './types';

const VIEWPORT = { width: 1920, height: 1080 };
const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface BrowserSession extends ManagedSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
}

class LocatorElement implements PageElement {
  constructor(private readonly locator: Locator) {}

  async text(): Promise<string> {
    return (await this.locator.innerText()).trim();
  }

  attribute(name: string): Promise<string | null> {
    return this.locator.getAttribute(name);
  }

  click(): Promise<void> {
    return this.locator.click();
  }

  fill(value: string): Promise<void> {
    return this.locator.fill(value);
  }

  isDisplayed(): Promise<boolean> {
    return this.locator.isVisible();
  }

  isEnabled(): Promise<boolean> {
    return this.locator.isEnabled();
  }

  async position(): Promise<Position | null> {
    const box = await this.locator.boundingBox();
    return box ? { x: box.x, y: box.y } : null;
  }
}

export class PlaywrightGateway implements SessionGateway {
  constructor(private readonly page: Page) {}

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async findAll(query: string): Promise<PageElement[]> {
    const locators = await this.page.locator(query).all();
    return locators.map((locator) => new LocatorElement(locator));
  }

  async find(query: string): Promise<PageElement | null> {
    const locator = this.page.locator(query).first();
    const count = await locator.count();
    return count > 0 ? new LocatorElement(locator) : null;
  }

  pause(ms: number): Promise<void> {
    return this.page.waitForTimeout(ms);
  }
}

export async function launchBrowser(config: AppConfig): Promise<BrowserSession> {
  const browser = await chromium.launch({
    headless: config.headless,
    args: ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
  });

  const context = await browser.newContext({ viewport: VIEWPORT, userAgent: USER_AGENT });
  context.setDefaultTimeout(config.pageLoadTimeout);
  context.setDefaultNavigationTimeout(config.pageLoadTimeout);

  const page = await context.newPage();

  return {
    browser,
    context,
    page,
    gateway: new PlaywrightGateway(page),
    isAlive: () => browser.isConnected() && !page.isClosed(),
    close: async () => {
      await context.close().catch(() => undefined);
      await browser.close().catch(() => undefined);
    },
  };
}

export function isMissingBrowserError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const message = error.message.toLowerCase();
  return message.includes('executable doesn') || message.includes('playwright install');
}
