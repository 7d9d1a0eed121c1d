/**
 * Page Capture Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  PageCapture,
  createPageCapture,
  coercePageHeight,
  sleep,
  MAX_TIMER_MS,
  assertNavigableUrl,
  NavigationError,
  ScreenshotError,
  resolveCaptureRequest,
  buildBrowserConfig,
  type SessionHandle,
} from '../src/lib/capture/index.js';
import { FakeBrowserDriver, fixtureDom, recordingSleep, type FakeDriverOptions } from './fake-driver.js';

const SETTINGS = {
  storageDirectory: '/unused',
  timeoutSeconds: 10,
  userAgent: 'pagesnap-test',
  disableSandbox: false,
};

async function openSession(options: FakeDriverOptions = {}) {
  const driver = new FakeBrowserDriver(options);
  const request = resolveCaptureRequest({ url: 'https://example.com', fullPage: true });
  const config = buildBrowserConfig(request, SETTINGS);
  const session: SessionHandle = { id: 'test', config, page: await driver.launch(config) };
  const pages = new PageCapture({ timeoutSeconds: 10, sleep: recordingSleep(driver) });
  return { driver, session, pages };
}

describe('coercePageHeight', () => {
  it('should floor numeric heights', () => {
    expect(coercePageHeight(820)).toBe(820);
    expect(coercePageHeight(1234.9)).toBe(1234);
  });

  it('should parse numeric strings', () => {
    expect(coercePageHeight('900')).toBe(900);
    expect(coercePageHeight('900.7')).toBe(900);
  });

  it('should fall back to 768 for anything else', () => {
    expect(coercePageHeight('900px')).toBe(768);
    expect(coercePageHeight('')).toBe(768);
    expect(coercePageHeight(null)).toBe(768);
    expect(coercePageHeight(undefined)).toBe(768);
    expect(coercePageHeight({ height: 900 })).toBe(768);
    expect(coercePageHeight(Number.NaN)).toBe(768);
    expect(coercePageHeight(Number.POSITIVE_INFINITY)).toBe(768);
    expect(coercePageHeight(0)).toBe(768);
    expect(coercePageHeight(-20)).toBe(768);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should wait the full duration past the timer limit', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    let done = false;
    const waiting = sleep(MAX_TIMER_MS + 5000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(1000);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(MAX_TIMER_MS);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(4000);
    await waiting;
    expect(done).toBe(true);
  });
});

describe('assertNavigableUrl', () => {
  it('should accept web URLs', () => {
    expect(() => assertNavigableUrl('https://example.com/path?q=1')).not.toThrow();
    expect(() => assertNavigableUrl('http://localhost:8080')).not.toThrow();
  });

  it('should reject strings that are not URLs', () => {
    expect(() => assertNavigableUrl('not-a-url')).toThrow(NavigationError);
    expect(() => assertNavigableUrl('example.com')).toThrow('Invalid URL: example.com');
  });

  it('should reject schemes a browser cannot render', () => {
    expect(() => assertNavigableUrl('mailto:someone@example.com')).toThrow(
      'Unsupported URL scheme: mailto:'
    );
  });
});

describe('PageCapture', () => {
  describe('measureHeight', () => {
    it('should warn and fall back to 768 when the probe throws', async () => {
      const { session } = await openSession({ evaluateError: new Error('Execution context was destroyed') });
      const pages = createPageCapture({ timeoutSeconds: 10 });
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      expect(await pages.measureHeight(session.page)).toBe(768);
      expect(warn).toHaveBeenCalledWith(
        '[Capture] Height probe failed: Execution context was destroyed, using 768px'
      );
      warn.mockRestore();
    });

    it('should take the maximum of the six probes', async () => {
      const { session, pages } = await openSession({ dom: fixtureDom([800, 820, 800, 820, 750, 750]) });
      expect(await pages.measureHeight(session.page)).toBe(820);
    });

    it('should see the document element when it is the tallest', async () => {
      const { session, pages } = await openSession({ dom: fixtureDom([400, 400, 400, 2400, 400, 400]) });
      expect(await pages.measureHeight(session.page)).toBe(2400);
    });
  });

  describe('capture', () => {
    it('should report each step in order', async () => {
      const { session, pages } = await openSession();
      const steps: string[] = [];

      await pages.capture(
        session,
        resolveCaptureRequest({ url: 'https://example.com', delaySeconds: 1, fullPage: true }),
        (step) => steps.push(step)
      );

      expect(steps).toEqual(['navigating', 'delaying', 'measuring', 'capturing']);
    });

    it('should wait 500ms after resizing even without a delay', async () => {
      const { driver, session, pages } = await openSession();

      await pages.capture(session, resolveCaptureRequest({ url: 'https://example.com', fullPage: true }));

      expect(driver.events.filter((e) => e.startsWith('sleep'))).toEqual(['sleep 500']);
    });

    it('should wrap driver capture failures in ScreenshotError', async () => {
      const { session, pages } = await openSession({ screenshotError: new Error('Target closed') });

      await expect(
        pages.capture(session, resolveCaptureRequest({ url: 'https://example.com' }))
      ).rejects.toThrow(ScreenshotError);
    });

    it('should return the bytes of the capture', async () => {
      const { session, pages } = await openSession();

      const bytes = await pages.capture(
        session,
        resolveCaptureRequest({ url: 'https://example.com', width: 320, height: 480 })
      );

      expect(bytes.toString()).toBe('PNG 320x480');
    });
  });
});
