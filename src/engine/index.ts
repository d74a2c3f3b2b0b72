export * from "./generators";
export { fillBytesViaNext, readU32LE, readU64LE, checkSeedLength } from "./serialize";
export { xshRr, xslRr, PCG_MULTIPLIER_64 } from "./permute";
export { SeedError, SeedLengthError, SeedValueError, UnknownGeneratorError } from "./errors";
export { GENERATORS, GENERATOR_NAMES, createGenerator, isGeneratorName } from "./registry";
export type { GeneratorInfo, GeneratorName } from "./registry";
export type { RandomSource, CloneableSource, SeedableGenerator, WordBits } from "./types";
