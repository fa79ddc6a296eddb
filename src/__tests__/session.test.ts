import { describe, it, expect } from 'vitest';
import { BrowserSessionHolder } from '../session';
import { FakeGateway, FakeSession, sessionLauncher, silentLogger } from './fakes';

describe('BrowserSessionHolder', () => {
  it('launches lazily and hands out the same gateway while alive', async () => {
    const browser = new FakeSession(new FakeGateway());
    const sessions = new BrowserSessionHolder(sessionLauncher(browser), silentLogger());

    expect(sessions.launchCount).toBe(0);
    expect(await sessions.acquire()).toBe(browser.gateway);
    expect(await sessions.acquire()).toBe(browser.gateway);
    expect(sessions.launchCount).toBe(1);
  });

  it('closes a dead session before launching a replacement', async () => {
    const first = new FakeSession(new FakeGateway());
    const second = new FakeSession(new FakeGateway());
    const sessions = new BrowserSessionHolder(sessionLauncher(first, second), silentLogger());

    await sessions.acquire();
    first.alive = false;

    expect(await sessions.acquire()).toBe(second.gateway);
    expect(first.closes).toBe(1);
    expect(sessions.launchCount).toBe(2);
  });

  it('launches again after release', async () => {
    const first = new FakeSession(new FakeGateway());
    const second = new FakeSession(new FakeGateway());
    const sessions = new BrowserSessionHolder(sessionLauncher(first, second), silentLogger());

    await sessions.acquire();
    await sessions.release();
    await sessions.release();

    expect(first.closes).toBe(1);
    expect(await sessions.acquire()).toBe(second.gateway);
  });

  it('retries the launch on the next acquire after a launch failure', async () => {
    const browser = new FakeSession(new FakeGateway());
    let calls = 0;
    const sessions = new BrowserSessionHolder(async () => {
      calls += 1;
      if (calls === 1) {
        throw new Error('browser crashed on start');
      }
      return browser;
    }, silentLogger());

    await expect(sessions.acquire()).rejects.toThrow('browser crashed on start');
    expect(await sessions.acquire()).toBe(browser.gateway);
    expect(sessions.launchCount).toBe(1);
  });

  it('keeps going when closing the old browser fails', async () => {
    const first = new FakeSession(new FakeGateway());
    first.close = async () => {
      throw new Error('browser already gone');
    };
    const second = new FakeSession(new FakeGateway());
    const sessions = new BrowserSessionHolder(sessionLauncher(first, second), silentLogger());

    await sessions.acquire();
    first.alive = false;

    expect(await sessions.acquire()).toBe(second.gateway);
  });
});
