import { describe, it, expect, vi, afterEach } from 'vitest';
import { classify, withRole } from '../../src/detector/lib/BehaviorClassifier.js';
import { DEFAULT_THRESHOLDS } from '../../src/detector/config/DetectorConfig.js';
import { PopupHistory } from '../../src/detector/lib/PopupHistory.js';
import { DomSnapshot, SnapshotElement } from '../../src/detector/lib/DomSnapshotProbe.js';
import { snapshotElement } from './helpers/FakePage.js';

const snapshotOf = (...elements: SnapshotElement[]): DomSnapshot => ({
    url: 'https://shop.test/',
    elements,
    truncated: false
});

describe('BehaviorClassifier', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('assigns no role to elements without any interactivity signal', () => {
        const snapshot = snapshotOf(
            snapshotElement({ locator: '#plain', text: 'Just text' }),
            snapshotElement({ locator: '#span', tagName: 'span', text: 'More text' })
        );

        expect(classify(snapshot, DEFAULT_THRESHOLDS)).toEqual([]);
    });

    it('marks anchors and buttons as clickable', () => {
        const candidates = classify(snapshotOf(
            snapshotElement({ locator: '#buy', tagName: 'button', text: 'Buy' }),
            snapshotElement({ locator: '#docs', tagName: 'a', text: 'Docs', attributes: { href: 'https://shop.test/docs' } })
        ), DEFAULT_THRESHOLDS);

        expect(candidates.map(c => [c.descriptor.locator, c.roles])).toEqual([
            ['#buy', ['clickable']],
            ['#docs', ['clickable']]
        ]);
    });

    it('treats registered click listeners, onclick and framework attributes as handlers', () => {
        const candidates = classify(snapshotOf(
            snapshotElement({ locator: '#listener', listeners: ['click'] }),
            snapshotElement({ locator: '#property', hasOnclickProperty: true }),
            snapshotElement({ locator: '#vue', attributes: { '@click': 'open()' } }),
            snapshotElement({ locator: '#role', attributes: { role: 'button' } })
        ), DEFAULT_THRESHOLDS);

        expect(candidates.map(c => c.descriptor.locator)).toEqual(['#listener', '#property', '#vue', '#role']);
        expect(candidates.every(c => c.roles.length === 1 && c.roles[0] === 'clickable')).toBe(true);
    });

    it('requires a clickable box of at least the minimum size', () => {
        const candidates = classify(snapshotOf(
            snapshotElement({ locator: '#tiny', tagName: 'button', size: { width: 3, height: 30 } }),
            snapshotElement({ locator: '#edge', tagName: 'button', size: { width: 4, height: 4 } })
        ), DEFAULT_THRESHOLDS);

        expect(candidates.map(c => c.descriptor.locator)).toEqual(['#edge']);
    });

    it('applies the opacity threshold inclusively', () => {
        const candidates = classify(snapshotOf(
            snapshotElement({ locator: '#below', hover: { opacityDelta: 0.05, visibilityChange: false, transformChange: false } }),
            snapshotElement({ locator: '#at', hover: { opacityDelta: 0.1, visibilityChange: false, transformChange: false } }),
            snapshotElement({ locator: '#visibility', hover: { opacityDelta: 0, visibilityChange: true, transformChange: false } }),
            snapshotElement({ locator: '#transform', hover: { opacityDelta: 0, visibilityChange: false, transformChange: true } })
        ), DEFAULT_THRESHOLDS);

        expect(candidates.map(c => [c.descriptor.locator, c.roles])).toEqual([
            ['#at', ['hoverable']],
            ['#visibility', ['hoverable']],
            ['#transform', ['hoverable']]
        ]);
    });

    it('counts a hover listener as a hover signal even without a style sample', () => {
        const candidates = classify(snapshotOf(
            snapshotElement({ locator: '#menu', listeners: ['mouseenter'], hover: null })
        ), DEFAULT_THRESHOLDS);

        expect(candidates).toHaveLength(1);
        expect(candidates[0].roles).toEqual(['hoverable']);
    });

    it('gives one element several roles in a fixed order', () => {
        const [candidate] = classify(snapshotOf(
            snapshotElement({
                locator: '#account',
                tagName: 'button',
                text: 'Account',
                attributes: { 'aria-haspopup': 'menu' },
                hover: { opacityDelta: 0.4, visibilityChange: false, transformChange: false }
            })
        ), DEFAULT_THRESHOLDS);

        expect(candidate.roles).toEqual(['hoverable', 'clickable', 'popup-trigger']);
    });

    it('does not treat aria-haspopup="false" as a popup trigger', () => {
        const [candidate] = classify(snapshotOf(
            snapshotElement({ locator: '#plain-btn', tagName: 'button', attributes: { 'aria-haspopup': 'false' } })
        ), DEFAULT_THRESHOLDS);

        expect(candidate.roles).toEqual(['clickable']);
    });

    it('marks triggers seen revealing a popup before as popup triggers', () => {
        const history = new PopupHistory();
        history.record({ locator: '#old-location', tagName: 'button', text: 'Account', attributes: {} });

        const [candidate] = classify(snapshotOf(
            snapshotElement({ locator: 'body > header:nth-of-type(1) > button:nth-of-type(2)', tagName: 'button', text: '  account \n' })
        ), DEFAULT_THRESHOLDS, history);

        expect(candidate.roles).toEqual(['clickable', 'popup-trigger']);
    });

    it('treats a predicate that cannot be evaluated as an absent signal only', () => {
        const warn = vi.spyOn(console, 'warn');
        const error = vi.spyOn(console, 'error');

        const candidates = classify(snapshotOf(
            snapshotElement({ locator: '#unmeasured', tagName: 'a', size: null, hover: { opacityDelta: 0.5, visibilityChange: false, transformChange: false } }),
            snapshotElement({ locator: '#unknown', size: null, hover: null, listeners: null })
        ), DEFAULT_THRESHOLDS);

        expect(candidates.map(c => [c.descriptor.locator, c.roles])).toEqual([['#unmeasured', ['hoverable']]]);
        expect(warn).not.toHaveBeenCalled();
        expect(error).not.toHaveBeenCalled();
    });

    it('keeps document order and normalizes text', () => {
        const candidates = classify(snapshotOf(
            snapshotElement({ locator: '#c', tagName: 'button', text: 'Third' }),
            snapshotElement({ locator: '#a', tagName: 'button', text: '  Shop \n\t now  ' }),
            snapshotElement({ locator: '#b', tagName: 'a', text: 'Second' })
        ), DEFAULT_THRESHOLDS);

        expect(candidates.map(c => c.descriptor.locator)).toEqual(['#c', '#a', '#b']);
        expect(candidates[1].descriptor.text).toBe('Shop now');
    });

    it('uses the thresholds it is given', () => {
        const snapshot = snapshotOf(snapshotElement({ locator: '#buy', tagName: 'button' }));

        expect(classify(snapshot, { ...DEFAULT_THRESHOLDS, minClickableSize: 50 })).toEqual([]);
        expect(classify(snapshot, DEFAULT_THRESHOLDS)).toHaveLength(1);
    });

    it('filters candidates by role', () => {
        const candidates = classify(snapshotOf(
            snapshotElement({ locator: '#hover', hover: { opacityDelta: 1, visibilityChange: false, transformChange: false } }),
            snapshotElement({ locator: '#click', tagName: 'button' })
        ), DEFAULT_THRESHOLDS);

        expect(withRole(candidates, 'hoverable').map(c => c.descriptor.locator)).toEqual(['#hover']);
        expect(withRole(candidates, 'clickable').map(c => c.descriptor.locator)).toEqual(['#click']);
    });
});
