/** Seed and lookup failures raised while constructing a generator. */

import { formatHex64 } from "@/utils/format";

export class SeedError extends Error {
  readonly generator: string;

  constructor(generator: string, message: string) {
    super(message);
    this.name = "SeedError";
    this.generator = generator;
  }
}

/** Seed byte length does not match the generator's seed size */
export class SeedLengthError extends SeedError {
  readonly expected: number;
  readonly actual: number;

  constructor(generator: string, expected: number, actual: number) {
    super(generator, `${generator}: seed must be ${expected} bytes, got ${actual}`);
    this.name = "SeedLengthError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** Seed decodes to a value the generator cannot run from */
export class SeedValueError extends SeedError {
  readonly word: bigint;

  constructor(generator: string, word: bigint, reason: string) {
    super(generator, `${generator}: bad seed ${formatHex64(word)}: ${reason}`);
    this.name = "SeedValueError";
    this.word = word;
  }
}

export class UnknownGeneratorError extends Error {
  readonly generatorName: string;

  constructor(name: string, known: readonly string[]) {
    super(`unknown generator "${name}" (expected one of: ${known.join(", ")})`);
    this.name = "UnknownGeneratorError";
    this.generatorName = name;
  }
}
