import { describe, it, expect } from 'vitest';
import { mulberry32, pick, randn } from '../random';

describe('random', () => {
    it('repeats the same sequence for the same seed', () => {
        const a = mulberry32(42);
        const b = mulberry32(42);
        const first = Array.from({ length: 10 }, () => a());
        const second = Array.from({ length: 10 }, () => b());
        expect(second).toEqual(first);
    });

    it('diverges for different seeds', () => {
        const a = mulberry32(1);
        const b = mulberry32(2);
        expect(Array.from({ length: 5 }, () => a())).not.toEqual(Array.from({ length: 5 }, () => b()));
    });

    it('stays in [0, 1)', () => {
        const rng = mulberry32(7);
        for (let i = 0; i < 10_000; i++) {
            const u = rng();
            expect(u).toBeGreaterThanOrEqual(0);
            expect(u).toBeLessThan(1);
        }
    });

    it('draws standard normal values', () => {
        const rng = mulberry32(123);
        const samples = Array.from({ length: 20_000 }, () => randn(rng));
        const mean = samples.reduce((s, x) => s + x, 0) / samples.length;
        const variance = samples.reduce((s, x) => s + (x - mean) ** 2, 0) / samples.length;
        expect(Math.abs(mean)).toBeLessThan(0.05);
        expect(Math.abs(variance - 1)).toBeLessThan(0.05);
    });

    it('picks only from the given items', () => {
        const rng = mulberry32(5);
        const items = ['a', 'b', 'c'] as const;
        const seen = new Set<string>();
        for (let i = 0; i < 200; i++) seen.add(pick(rng, items));
        expect([...seen].sort()).toEqual(['a', 'b', 'c']);
        expect(pick(rng, ['only'])).toBe('only');
    });
});
