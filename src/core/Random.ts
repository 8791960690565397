const MASK_64 = (1n << 64n) - 1n;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;

// uniformF64 draws an integer in [0, 2^53 - 2] by multiply-shift and divides it
// by 2^53 - 1. Draws whose low product word is below (2^64 - bound) % bound are
// rejected.
const F64_DIVISOR = 2 ** 53 - 1;
const F64_REJECT_BELOW = 4096;
const TWO_POW_20 = 0x100000;
const TWO_POW_21 = 0x200000;
const UINT32_MAX = 0xffffffff;
const SIGN_BIT = 0x80000000;

function splitmix64(state: { value: bigint }): bigint {
    state.value = (state.value + GOLDEN_GAMMA) & MASK_64;
    let z = state.value;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
    return z ^ (z >> 31n);
}

export type Seed = number | bigint;

export function toSeed64(seed: Seed): bigint {
    if (typeof seed === 'bigint') {
        if (seed < 0n) throw new Error(`Seed must be non-negative, got ${seed}`);
        return seed & MASK_64;
    }
    if (!Number.isSafeInteger(seed) || seed < 0) {
        throw new Error(`Seed must be a non-negative safe integer, got ${seed}`);
    }
    return BigInt(seed);
}

/**
 * 🎲 Rng - xoshiro256+ stream seeded through splitmix64
 *
 * Not thread-safe and not meant to be: every strip worker owns its own instance.
 * The four state words come from four consecutive splitmix64 outputs, so
 * neighbouring seeds (seed, seed + 1, ...) still give decorrelated streams.
 *
 * The 64-bit words are kept as (hi, lo) pairs of 32-bit halves so the hot path
 * never allocates a BigInt.
 */
export class Rng {
    // s0 = [0, 1], s1 = [2, 3], s2 = [4, 5], s3 = [6, 7]
    private readonly state = new Uint32Array(8);
    private outHi: number = 0;
    private outLo: number = 0;

    constructor(seed: Seed) {
        const sm = { value: toSeed64(seed) };
        for (let i = 0; i < 4; i++) {
            const word = splitmix64(sm);
            this.state[2 * i] = Number(word >> 32n);
            this.state[2 * i + 1] = Number(word & 0xffffffffn);
        }
    }

    /**
     * Advances the state; the output word lands in outHi / outLo.
     */
    private step(): void {
        const s = this.state;

        // result = s0 + s3
        const sumLo = s[1] + s[7];
        this.outLo = sumLo >>> 0;
        this.outHi = (s[0] + s[6] + (sumLo > UINT32_MAX ? 1 : 0)) >>> 0;

        // t = s1 << 17
        const tHi = (s[2] << 17) | (s[3] >>> 15);
        const tLo = s[3] << 17;

        s[4] ^= s[0]; s[5] ^= s[1];     // s2 ^= s0
        s[6] ^= s[2]; s[7] ^= s[3];     // s3 ^= s1
        s[2] ^= s[4]; s[3] ^= s[5];     // s1 ^= s2
        s[0] ^= s[6]; s[1] ^= s[7];     // s0 ^= s3
        s[4] ^= tHi; s[5] ^= tLo;       // s2 ^= t

        // s3 = rotl(s3, 45): swap halves, then rotate by 13
        const hi = s[6];
        const lo = s[7];
        s[6] = (lo << 13) | (hi >>> 19);
        s[7] = (hi << 13) | (lo >>> 19);
    }

    public nextU64(): bigint {
        this.step();
        return (BigInt(this.outHi) << 32n) | BigInt(this.outLo);
    }

    /**
     * Uniform integer in [0, bound) using Lemire's multiply-shift with rejection.
     */
    public boundedU64(bound: bigint): bigint {
        if (bound <= 0n || bound > MASK_64) {
            throw new Error(`Bound must be in [1, 2^64), got ${bound}`);
        }

        let m = this.nextU64() * bound;
        let low = m & MASK_64;

        if (low < bound) {
            const threshold = ((1n << 64n) - bound) % bound;
            while (low < threshold) {
                m = this.nextU64() * bound;
                low = m & MASK_64;
            }
        }

        return m >> 64n;
    }

    /**
     * Same draw as `boundedU64(2^53 - 2) / (2^53 - 1)`, in 32-bit arithmetic.
     *
     * With x = hi·2^32 + lo, q = x >> 11 and r = x & 0x7ff the product x·(2^53 - 2)
     * shifted down by 64 is q + floor(r/2^11 - x/2^63), and its low word is
     * (r·2^53 - 2x) mod 2^64.
     */
    public uniformF64(): number {
        for (;;) {
            this.step();
            const hi = this.outHi;
            const lo = this.outLo;
            const r = lo & 0x7ff;

            // Low product word, rejected when below the Lemire threshold
            const twiceHi = ((hi << 1) | (lo >>> 31)) >>> 0;
            const twiceLo = (lo << 1) >>> 0;
            const lowHi = (r * TWO_POW_21 - twiceHi - (twiceLo !== 0 ? 1 : 0)) >>> 0;
            const lowLo = (0 - twiceLo) >>> 0;
            if (lowHi === 0 && lowLo < F64_REJECT_BELOW) {
                continue;
            }

            const q = hi * TWO_POW_21 + (lo >>> 11);
            const rHi = r * TWO_POW_20;

            let scaled: number;
            if (hi < rHi || (hi === rHi && lo === 0)) {
                scaled = q;
            } else if (hi > SIGN_BIT + rHi || (hi === SIGN_BIT + rHi && lo > 0)) {
                scaled = q - 2;
            } else {
                scaled = q - 1;
            }

            return scaled / F64_DIVISOR;
        }
    }

    public uniformF64Range(min: number, max: number): number {
        return min + (max - min) * this.uniformF64();
    }
}
