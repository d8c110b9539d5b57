export { createGenerators, fake, ORCID_START } from "./registry";
export type { Generators, GeneratorOptions, ResearcherIdOptions } from "./registry";
export { SequenceGenerator, incrementer, range, product } from "./sequence";
export type { SequenceFactory } from "./sequence";
export { formatIssn, formatOrcid, issnCheckCharacter, orcidCheckCharacter } from "./checksums";
export { DEFAULT_SEED, deriveSeed, resolveSeed, resetSeedCache } from "./seed";
