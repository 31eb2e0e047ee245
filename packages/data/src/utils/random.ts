export type RandomSource = () => number;

/**
 * mulberry32: small seeded PRNG returning floats in [0, 1). Good enough for
 * synthetic price paths; not for anything security related.
 */
export const mulberry32 = (seed: number): RandomSource => {
	let a = seed >>> 0;
	return () => {
		a = (a + 0x6d2b79f5) >>> 0;
		let t = a;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
};

// Box-Muller; u and v must be non-zero for the log.
export const gaussian = (random: RandomSource): number => {
	let u = 0;
	let v = 0;
	while (u === 0) u = random();
	while (v === 0) v = random();
	return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
};
