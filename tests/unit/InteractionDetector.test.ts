import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InteractionDetector } from '../../src/detector/InteractionDetector.js';
import { InteractionRunner } from '../../src/detector/lib/InteractionSimulator.js';
import { PopupHistory } from '../../src/detector/lib/PopupHistory.js';
import { domSnapshotScript } from '../../src/detector/lib/DomSnapshotProbe.js';
import { ResponseCache } from '../../src/shared/cache/ResponseCache.js';
import { NavigationError } from '../../src/shared/errors/DetectorErrors.js';
import { PageAnalysis } from '../../src/types/index.js';
import {
    FakePageState,
    createFakeDriver,
    createPageState,
    overlay,
    overlayButton,
    overlayLink,
    snapshotElement
} from './helpers/FakePage.js';

const PAGE_URL = 'https://shop.test/';

/** A hover menu, a popup button and an inert block */
function storefront(): FakePageState {
    const page = createPageState({
        snapshot: {
            url: PAGE_URL,
            truncated: false,
            elements: [
                snapshotElement({ locator: '#products', text: 'Products', listeners: ['mouseenter'] }),
                snapshotElement({
                    locator: '#menu',
                    tagName: 'button',
                    text: 'Menu',
                    attributes: { 'aria-haspopup': 'true' }
                }),
                snapshotElement({ locator: '#plain', text: 'Plain' })
            ]
        }
    });

    const dropdown = overlay(1, '', 'Shoes Bags');
    page.onHover.set('#products', p => {
        p.overlays.push(dropdown, overlayLink(dropdown, 1, 'Shoes', 'https://shop.test/shoes'));
    });

    const account = overlay(2, 'Account', 'Sign in to continue');
    page.onClick.set('#menu', p => {
        p.overlays.push(account, overlayButton(account, 1, 'Sign in'));
    });
    return page;
}

describe('InteractionDetector', () => {
    let page: FakePageState;
    let driver: ReturnType<typeof createFakeDriver>;
    let log: ReturnType<typeof vi.fn>;

    beforeEach(() => {
        page = storefront();
        driver = createFakeDriver(page);
        log = vi.fn();
    });

    describe('analyze', () => {
        it('should report hover and popup interactions for the page', async () => {
            const history = new PopupHistory();
            const detector = new InteractionDetector(driver, { history, log });

            const analysis = await detector.analyze(PAGE_URL);

            expect(analysis.url).toBe(PAGE_URL);
            expect(analysis.title).toBe('Shop');
            expect(analysis.hoverInteractions).toHaveLength(1);
            expect(analysis.hoverInteractions[0]).toMatchObject({
                kind: 'revealed',
                action: 'hover',
                trigger: { locator: '#products', text: 'Products' },
                revealed: [{ kind: 'link', href: 'https://shop.test/shoes' }]
            });

            expect(analysis.popupInteractions).toHaveLength(1);
            expect(analysis.popupInteractions[0]).toMatchObject({
                action: 'click',
                trigger: { locator: '#menu', text: 'Menu' },
                popup: { title: 'Account', content: 'Sign in to continue' }
            });
            expect(analysis.popupInteractions[0].actions.map(a => a.descriptor.text)).toEqual(['Sign in']);

            expect(analysis.metadata).toMatchObject({
                language: 'en',
                candidateCount: 2,
                hoverSimulated: 1,
                clickSimulated: 1,
                skippedByCap: 0,
                abandoned: 0,
                timedOut: false
            });
            expect(analysis.diagnostics).toEqual({ noChangeCount: 0, failedCount: 0, failures: [] });
            expect(history.size).toBe(1);
        });

        it('should install the listener tracker before navigating', async () => {
            await new InteractionDetector(driver, { log }).analyze(PAGE_URL);

            expect(driver.addInitScript).toHaveBeenCalledTimes(1);
            expect(driver.addInitScript.mock.invocationCallOrder[0])
                .toBeLessThan(driver.navigate.mock.invocationCallOrder[0]);
        });

        it('should dismiss the popup after recording it', async () => {
            await new InteractionDetector(driver, { log }).analyze(PAGE_URL);

            expect(page.overlays.map(n => n.key)).toEqual([
                'body > div:nth-of-type(1)',
                'body > div:nth-of-type(1) > a:nth-of-type(1)'
            ]);
        });

        it('should reject with NavigationError when the page cannot be loaded', async () => {
            driver.navigate.mockRejectedValueOnce(new Error('boom'));
            const detector = new InteractionDetector(driver, { log });

            const run = detector.analyze(PAGE_URL);

            await expect(run).rejects.toBeInstanceOf(NavigationError);
            await expect(run).rejects.toThrow('Failed to load https://shop.test/: boom');
            expect(driver.hover).not.toHaveBeenCalled();
        });

        it('should return partial results when classification fails', async () => {
            driver.evaluate.mockImplementationOnce(async (script: unknown) => {
                if (script === domSnapshotScript) throw new Error('snapshot failed');
                throw new Error('unexpected page script');
            });
            const detector = new InteractionDetector(driver, { log });

            const analysis = await detector.analyze(PAGE_URL);

            expect(analysis.hoverInteractions).toEqual([]);
            expect(analysis.popupInteractions).toEqual([]);
            expect(analysis.metadata.candidateCount).toBe(0);
            expect(log).toHaveBeenCalledWith('[Detector] Continuing with partial results: snapshot failed');
        });

        it('should skip hover simulation when disabled', async () => {
            const detector = new InteractionDetector(driver, { config: { detectHover: false }, log });

            const analysis = await detector.analyze(PAGE_URL);

            expect(driver.hover).not.toHaveBeenCalled();
            expect(driver.click).toHaveBeenCalledTimes(1);
            expect(analysis.hoverInteractions).toEqual([]);
            expect(analysis.popupInteractions).toHaveLength(1);
        });

        it('should resolve with partial results once the deadline passes', async () => {
            const stuck: InteractionRunner = {
                simulate: () => new Promise(() => undefined)
            };
            const detector = new InteractionDetector(driver, {
                config: { timing: { runDeadlineMs: 50 } },
                createRunner: () => stuck,
                log
            });

            const analysis = await detector.analyze(PAGE_URL);

            expect(analysis.metadata).toMatchObject({ timedOut: true, hoverSimulated: 0, abandoned: 1 });
            expect(analysis.hoverInteractions).toEqual([]);
            expect(log).toHaveBeenCalledWith('[Orchestrator] Deadline reached, skipping Phase: Popup');
        });

        it('should reuse a cached analysis for the same url and config', async () => {
            const cache = new ResponseCache<PageAnalysis>();
            const detector = new InteractionDetector(driver, { cache, log });

            const first = await detector.analyze(PAGE_URL);
            const second = await detector.analyze(PAGE_URL);

            expect(second).toBe(first);
            expect(driver.navigate).toHaveBeenCalledTimes(1);
            expect(log).toHaveBeenCalledWith(`[Detector] Cache hit for ${PAGE_URL}`);
        });

        it('should not share cached analyses across configs', async () => {
            const cache = new ResponseCache<PageAnalysis>();

            await new InteractionDetector(driver, { cache, log }).analyze(PAGE_URL);
            await new InteractionDetector(driver, { cache, config: { detectPopups: false }, log }).analyze(PAGE_URL);

            expect(driver.navigate).toHaveBeenCalledTimes(2);
            expect(cache.size).toBe(2);
        });
    });

    describe('scan', () => {
        it('should classify without simulating', async () => {
            const result = await new InteractionDetector(driver, { log }).scan(PAGE_URL);

            expect(result.candidates.map(c => [c.descriptor.locator, c.roles])).toEqual([
                ['#products', ['hoverable']],
                ['#menu', ['clickable', 'popup-trigger']]
            ]);
            expect(result.metadata).toMatchObject({ candidateCount: 2, truncated: false, language: 'en' });
            expect(driver.hover).not.toHaveBeenCalled();
            expect(driver.click).not.toHaveBeenCalled();
        });
    });
});
