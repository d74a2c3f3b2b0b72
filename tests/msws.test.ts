import { describe, it, expect } from "vitest";
import { Msws } from "@/engine/generators/msws";
import { SeedLengthError, SeedValueError } from "@/engine/errors";
import type { RandomSource } from "@/engine/types";
import { countingSeed, seedFromWords, take } from "./helpers";

/** Replays a fixed list of 64-bit words */
function scriptedSource(words: bigint[]): RandomSource & { drawn: number } {
  let i = 0;
  return {
    get drawn() {
      return i;
    },
    nextU64() {
      if (i >= words.length) throw new Error("script exhausted");
      return words[i++];
    },
    nextU32() {
      return Number(this.nextU64() & 0xffffffffn);
    },
    fillBytes() {
      throw new Error("not used");
    },
  };
}

describe("Msws", () => {
  it("matches the reference stream for a counting seed", () => {
    const rng = Msws.fromSeed(countingSeed(16));
    expect(take(3, () => rng.nextU64())).toEqual([
      0xb92db652c3de1059n,
      0x26b2b64630cc2aban,
      0xcf28a127bcfe72a5n,
    ]);
  });

  it("returns the low half of the 64-bit output as its 32-bit output", () => {
    const a = Msws.fromSeed(countingSeed(16));
    const b = Msws.fromSeed(countingSeed(16));
    for (let i = 0; i < 20; i++) {
      expect(a.nextU32()).toBe(Number(b.nextU64() & 0xffffffffn));
    }
  });

  it("is deterministic for identical seeds", () => {
    const a = Msws.fromSeed(countingSeed(16));
    const b = Msws.fromSeed(countingSeed(16));
    expect(take(100, () => a.nextU64())).toEqual(take(100, () => b.nextU64()));
  });

  it("rejects a stream constant whose high 32 bits are zero", () => {
    expect(() => Msws.fromSeed(seedFromWords(0n, 5n))).toThrow(SeedValueError);
    expect(() => Msws.fromSeed(seedFromWords(0xfffffffen, 5n))).toThrow(SeedValueError);
    expect(() => Msws.fromSeed(new Uint8Array(16))).toThrow(SeedValueError);
  });

  it("accepts any stream constant with a high bit set", () => {
    expect(() => Msws.fromSeed(seedFromWords(0x100000000n, 0n))).not.toThrow();
    expect(() => Msws.fromSeed(seedFromWords(0x8000000000000000n, 0n))).not.toThrow();
  });

  it("reports the offending seed word", () => {
    try {
      Msws.fromSeed(seedFromWords(0x1234n, 0n));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SeedValueError);
      if (err instanceof SeedValueError) {
        expect(err.generator).toBe("msws");
        expect(err.word).toBe(0x1234n);
        expect(err.message).toBe(
          "msws: bad seed 0x0000000000001234: high 32 bits of the stream constant are zero",
        );
      }
    }
  });

  it("rejects seeds of the wrong length", () => {
    expect(() => Msws.fromSeed(new Uint8Array(15))).toThrow(SeedLengthError);
    expect(() => Msws.fromSeed(new Uint8Array(17))).toThrow("msws: seed must be 16 bytes, got 17");
  });

  describe("fromRng", () => {
    it("redraws the stream constant until its high bits are non-zero", () => {
      const source = scriptedSource([0xffffffffn, 0n, 0x100000000n, 0x1234n]);
      const rng = Msws.fromRng(source);
      expect(source.drawn).toBe(4);

      const expected = Msws.fromSeed(seedFromWords(0x100000001n, 0x1234n));
      expect(take(10, () => rng.nextU64())).toEqual(take(10, () => expected.nextU64()));
    });

    it("takes the first draw when it is already usable", () => {
      const source = scriptedSource([0x0807060504030201n, 0x100f0e0d0c0b0a09n]);
      const rng = Msws.fromRng(source);
      expect(source.drawn).toBe(2);
      expect(rng.nextU64()).toBe(0xb92db652c3de1059n);
    });

    it("can be seeded from another engine", () => {
      const a = Msws.fromRng(Msws.fromSeed(countingSeed(16)));
      const b = Msws.fromRng(Msws.fromSeed(countingSeed(16)));
      expect(take(5, () => a.nextU64())).toEqual(take(5, () => b.nextU64()));
    });
  });

  it("clones into an independent copy", () => {
    const a = Msws.fromSeed(countingSeed(16));
    a.nextU64();
    const b = a.clone();
    expect(b.nextU64()).toBe(0x26b2b64630cc2aban);
    expect(b.nextU64()).toBe(0xcf28a127bcfe72a5n);
    expect(a.nextU64()).toBe(0x26b2b64630cc2aban);
  });
});
