import { describe, it, expect, vi } from 'vitest';
import {
    FingerprintProbeArgs,
    diff,
    fingerprintDigest,
    overlayFingerprintScript
} from '../../src/detector/lib/OverlayFingerprint.js';
import { dismissOverlayScript } from '../../src/detector/lib/OverlayDismisser.js';
import { useLayout } from './helpers/layout.js';

const ARGS: FingerprintProbeArgs = {
    minWidth: 40,
    minHeight: 20,
    minZIndex: 1,
    textMaxLength: 200,
    bodyMaxLength: 500
};

const PAGE = `
    <div style="position: fixed; z-index: 10" data-box="240x120">
        <h2>Account</h2>
        <p>Sign in to continue</p>
        <a href="https://shop.test/login">Log in</a>
        <button>Close</button>
    </div>
    <div style="position: absolute">Tooltip without stacking</div>
    <div style="position: fixed; z-index: 10" data-box="30x10">Badge</div>
    <div style="position: fixed; z-index: 10; display: none">Closed drawer</div>
    <div style="position: relative; z-index: 50">
        <div style="position: absolute" data-box="200x50"><a href="https://shop.test/deals">Deals</a></div>
    </div>
`;

describe('overlayFingerprintScript', () => {
    useLayout();

    it('lists eligible containers with their links and actions by structural key', () => {
        document.body.innerHTML = PAGE;

        const nodes = overlayFingerprintScript(ARGS);

        expect(nodes.map(n => [n.kind, n.key])).toEqual([
            ['container', 'body > div:nth-of-type(1)'],
            ['link', 'body > div:nth-of-type(1) > a:nth-of-type(1)'],
            ['action', 'body > div:nth-of-type(1) > button:nth-of-type(1)'],
            ['container', 'body > div:nth-of-type(5) > div:nth-of-type(1)'],
            ['link', 'body > div:nth-of-type(5) > div:nth-of-type(1) > a:nth-of-type(1)']
        ]);
    });

    it('reads heading, body and href', () => {
        document.body.innerHTML = PAGE;

        const [container, link] = overlayFingerprintScript(ARGS);

        expect(container.heading).toBe('Account');
        expect(container.body).toBe('Account Sign in to continue Log in Close');
        expect(container.descriptor.size).toEqual({ width: 240, height: 120 });
        expect(link.href).toBe('https://shop.test/login');
        expect(link.descriptor.text).toBe('Log in');
        expect(link.container).toBe('body > div:nth-of-type(1)');
    });

    it('takes the stacking level from the highest z-index among ancestors', () => {
        document.body.innerHTML = PAGE;

        const nodes = overlayFingerprintScript({ ...ARGS, minZIndex: 20 });

        expect(nodes.filter(n => n.kind === 'container').map(n => n.key)).toEqual([
            'body > div:nth-of-type(5) > div:nth-of-type(1)'
        ]);
    });

    it('keeps the digest when only text changes', () => {
        document.body.innerHTML = PAGE;
        const beforeNodes = overlayFingerprintScript(ARGS);
        const before = { digest: fingerprintDigest(beforeNodes), nodes: beforeNodes };

        const heading = document.querySelector('h2');
        if (heading) heading.textContent = 'Your profile';
        const afterNodes = overlayFingerprintScript(ARGS);
        const after = { digest: fingerprintDigest(afterNodes), nodes: afterNodes };

        expect(afterNodes[0].heading).toBe('Your profile');
        expect(after.digest).toBe(before.digest);
        expect(diff(before, after)).toEqual([]);
    });
});

describe('dismissOverlayScript', () => {
    useLayout();

    it('clicks a control labelled as close', () => {
        document.body.innerHTML = `
            <div>
                <button>Continue</button>
                <button aria-label="Close dialog"></button>
            </div>
        `;
        const onClose = vi.fn();
        document.querySelectorAll('button')[1].addEventListener('click', onClose);

        expect(dismissOverlayScript('body > div:nth-of-type(1)')).toBe(true);
        expect(onClose).toHaveBeenCalledTimes(1);
    });

    it('matches a bare close glyph', () => {
        document.body.innerHTML = '<div><span role="button"> x </span></div>';
        const onClose = vi.fn();
        document.querySelector('span')?.addEventListener('click', onClose);

        expect(dismissOverlayScript('body > div:nth-of-type(1)')).toBe(true);
        expect(onClose).toHaveBeenCalledTimes(1);
    });

    it('returns false without dispatching key events when there is no close control', () => {
        document.body.innerHTML = '<div><button>Continue</button></div>';
        const onKey = vi.fn();
        document.addEventListener('keydown', onKey);

        expect(dismissOverlayScript('body > div:nth-of-type(1)')).toBe(false);
        expect(onKey).not.toHaveBeenCalled();
        document.removeEventListener('keydown', onKey);
    });

    it('returns false for a container key that does not resolve', () => {
        expect(dismissOverlayScript('body > div:nth-of-type(9)')).toBe(false);
        expect(dismissOverlayScript('div[')).toBe(false);
    });
});
