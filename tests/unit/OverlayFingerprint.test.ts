import { describe, it, expect } from 'vitest';
import * as crypto from 'crypto';
import {
    Fingerprint,
    OverlayFingerprint,
    OverlayNode,
    diff,
    fingerprintDigest,
    overlayFingerprintScript
} from '../../src/detector/lib/OverlayFingerprint.js';
import { DEFAULT_THRESHOLDS } from '../../src/detector/config/DetectorConfig.js';
import { createFakeDriver, createPageState, overlay, overlayLink } from './helpers/FakePage.js';

const fingerprintOf = (nodes: OverlayNode[]): Fingerprint => ({ digest: fingerprintDigest(nodes), nodes });

describe('OverlayFingerprint', () => {
    const menu = overlay(4, 'Menu', 'Menu Sale');
    const sale = overlayLink(menu, 1, 'Sale', 'https://shop.test/sale');

    describe('fingerprintDigest', () => {
        it('is the md5 of the sorted structural keys', () => {
            const expected = crypto.createHash('md5')
                .update('body > div:nth-of-type(4)|body > div:nth-of-type(4) > a:nth-of-type(1)')
                .digest('hex');

            expect(fingerprintDigest([sale, menu])).toBe(expected);
            expect(fingerprintDigest([menu, sale])).toBe(expected);
        });

        it('ignores text', () => {
            const renamed: OverlayNode = { ...sale, descriptor: { ...sale.descriptor, text: 'Clearance' } };
            expect(fingerprintDigest([menu, renamed])).toBe(fingerprintDigest([menu, sale]));
        });
    });

    describe('diff', () => {
        it('returns nodes whose key is new', () => {
            const before = fingerprintOf([menu]);
            const after = fingerprintOf([menu, sale]);

            expect(diff(before, after)).toEqual([sale]);
        });

        it('reports nothing when an existing node only changed its text', () => {
            const before = fingerprintOf([menu, sale]);
            const changed: OverlayNode = { ...sale, descriptor: { ...sale.descriptor, text: 'Clearance' }, href: 'https://shop.test/clearance' };
            const after = fingerprintOf([menu, changed]);

            expect(diff(before, after)).toEqual([]);
        });

        it('does not report removed nodes', () => {
            expect(diff(fingerprintOf([menu, sale]), fingerprintOf([]))).toEqual([]);
        });

        it('keeps the order of the after capture', () => {
            const tooltip = overlay(7, '', 'Free shipping');
            const added = diff(fingerprintOf([]), fingerprintOf([tooltip, menu, sale]));

            expect(added.map(n => n.key)).toEqual([tooltip.key, menu.key, sale.key]);
        });
    });

    describe('capture', () => {
        it('passes the overlay thresholds to the page and digests the result', async () => {
            const page = createPageState({ overlays: [menu, sale] });
            const driver = createFakeDriver(page);

            const fingerprint = await new OverlayFingerprint(driver, { ...DEFAULT_THRESHOLDS, overlayMinZIndex: 10 }).capture();

            expect(driver.evaluate).toHaveBeenCalledWith(overlayFingerprintScript, {
                minWidth: 40,
                minHeight: 20,
                minZIndex: 10,
                textMaxLength: 200,
                bodyMaxLength: 500
            });
            expect(fingerprint.nodes).toEqual([menu, sale]);
            expect(fingerprint.digest).toBe(fingerprintDigest([menu, sale]));
        });
    });
});
