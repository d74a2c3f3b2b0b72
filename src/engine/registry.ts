/** Name → seed constructor table for drivers that pick a generator by name. */

import type { RandomSource, SeedableGenerator, WordBits } from "./types";
import { UnknownGeneratorError } from "./errors";
import { Msws, Mwp, PcgXsh64Lcg, PcgXsl64Lcg, PcgXsl128Mcg, Xsm32, Xsm64 } from "./generators";

export interface GeneratorInfo {
  seedLength: number;
  /** Word width used by fillBytes */
  wordBits: WordBits;
  fromSeed(seed: Uint8Array): RandomSource;
}

function entry<G extends RandomSource>(ctor: SeedableGenerator<G>, wordBits: WordBits): GeneratorInfo {
  return {
    seedLength: ctor.SEED_LENGTH,
    wordBits,
    fromSeed: (seed) => ctor.fromSeed(seed),
  };
}

export const GENERATOR_NAMES = [
  "msws",
  "mwp",
  "pcg_xsh_64_lcg",
  "pcg_xsl_64_lcg",
  "pcg_xsl_128_mcg",
  "xsm32",
  "xsm64",
] as const;

export type GeneratorName = (typeof GENERATOR_NAMES)[number];

export const GENERATORS: Readonly<Record<GeneratorName, GeneratorInfo>> = {
  msws: entry(Msws, 64),
  mwp: entry(Mwp, 64),
  pcg_xsh_64_lcg: entry(PcgXsh64Lcg, 32),
  pcg_xsl_64_lcg: entry(PcgXsl64Lcg, 32),
  pcg_xsl_128_mcg: entry(PcgXsl128Mcg, 64),
  xsm32: entry(Xsm32, 32),
  xsm64: entry(Xsm64, 64),
};

export function isGeneratorName(value: string): value is GeneratorName {
  return GENERATOR_NAMES.some((name) => name === value);
}

/** Look up `name` and construct it from `seed` */
export function createGenerator(name: string, seed: Uint8Array): RandomSource {
  if (!isGeneratorName(name)) {
    throw new UnknownGeneratorError(name, GENERATOR_NAMES);
  }
  return GENERATORS[name].fromSeed(seed);
}
