import { describe, expect, it } from 'vitest';
import { chance, clamp, gaussian, mulberry32, shuffle, uniform } from './random.js';

describe('mulberry32', () => {
    it('replays the same sequence for the same seed', () => {
        const a = mulberry32(42);
        const b = mulberry32(42);
        const first = Array.from({ length: 5 }, () => a());
        const second = Array.from({ length: 5 }, () => b());
        expect(first).toEqual(second);
    });

    it('diverges for different seeds', () => {
        expect(mulberry32(1)()).not.toBe(mulberry32(2)());
    });

    it('stays in [0, 1)', () => {
        const rng = mulberry32(7);
        for (let i = 0; i < 1000; i++) {
            const value = rng();
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });
});

describe('helpers', () => {
    it('uniform maps the draw onto the range', () => {
        expect(uniform(() => 0.5, 10, 20)).toBe(15);
        expect(uniform(() => 0, 10, 20)).toBe(10);
    });

    it('gaussian centres on the mean', () => {
        const rng = mulberry32(3);
        const samples = Array.from({ length: 5000 }, () => gaussian(rng, 10, 2));
        const mean = samples.reduce((a, b) => a + b, 0) / samples.length;
        expect(mean).toBeGreaterThan(9.9);
        expect(mean).toBeLessThan(10.1);
    });

    it('chance compares against the probability', () => {
        expect(chance(() => 0.29, 0.3)).toBe(true);
        expect(chance(() => 0.3, 0.3)).toBe(false);
    });

    it('clamp bounds both ends', () => {
        expect(clamp(-5, 0, 100)).toBe(0);
        expect(clamp(150, 0, 100)).toBe(100);
        expect(clamp(42, 0, 100)).toBe(42);
    });

    it('shuffle keeps every item and leaves the input alone', () => {
        const input = [1, 2, 3, 4, 5, 6];
        const out = shuffle(input, mulberry32(9));
        expect(input).toEqual([1, 2, 3, 4, 5, 6]);
        expect([...out].sort((a, b) => a - b)).toEqual(input);
    });
});
