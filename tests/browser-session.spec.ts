import { chromiumLaunchOptions, withSession } from '../session/browser-session';
import { test, expect } from '../fixtures/test.fixture';

class StubSession {
  closed = 0;

  async close(): Promise<void> {
    this.closed += 1;
  }
}

test.describe('withSession', () => {
  test('closes the session after the work completes', async () => {
    const session = new StubSession();

    const result = await withSession(async () => session, async () => 'done');

    expect(result).toBe('done');
    expect(session.closed).toBe(1);
  });

  test('closes the session when the work throws and rethrows the error', async () => {
    const session = new StubSession();

    await expect(
      withSession(async () => session, async () => {
        throw new Error('page crashed');
      })
    ).rejects.toThrow('page crashed');
    expect(session.closed).toBe(1);
  });

  test('does not run the work when the session cannot be opened', async () => {
    let ran = false;

    await expect(
      withSession(async (): Promise<StubSession> => {
        throw new Error('browser executable not found');
      }, async () => {
        ran = true;
      })
    ).rejects.toThrow('browser executable not found');
    expect(ran).toBe(false);
  });
});

test.describe('chromiumLaunchOptions', () => {
  test('leaves Ctrl+C to the collector instead of Playwright', () => {
    expect(chromiumLaunchOptions(true)).toEqual({
      headless: true,
      args: ['--disable-gpu', '--no-sandbox', '--disable-dev-shm-usage'],
      handleSIGINT: false
    });
    expect(chromiumLaunchOptions(false).handleSIGINT).toBe(false);
  });
});
