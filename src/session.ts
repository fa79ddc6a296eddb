import type { Logger } from 'pino';
import type { ManagedSession, SessionGateway, SessionProvider } from './types';

/**
 * Owns the browser across polling cycles. `acquire` hands out the live
 * session's gateway and relaunches when the browser or page has gone away;
 * `release` drops the session so the next `acquire` starts a fresh one.
 */
export class BrowserSessionHolder implements SessionProvider {
  private session: ManagedSession | null = null;
  private launches = 0;

  constructor(
    private readonly launch: () => Promise<ManagedSession>,
    private readonly logger: Logger
  ) {}

  get launchCount(): number {
    return this.launches;
  }

  async acquire(): Promise<SessionGateway> {
    if (this.session && this.session.isAlive()) {
      return this.session.gateway;
    }

    if (this.session) {
      this.logger.warn('Browser session is gone; relaunching');
      await this.release();
    }

    this.logger.info({ launch: this.launches + 1 }, 'Launching browser');
    const session = await this.launch();
    this.launches += 1;
    this.session = session;
    return session.gateway;
  }

  async release(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = null;

    try {
      await session.close();
      this.logger.info('Browser closed.');
    } catch (error) {
      this.logger.warn({ err: error }, 'Error closing browser session');
    }
  }
}
