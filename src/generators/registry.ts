// Generator registry: named accessors for synthetic fixture values.
// Each registry owns its sequences and a seeded faker instance, so tests can
// create, inject and reset registries instead of sharing process-wide state.
import { Faker, en } from "@faker-js/faker";
import vocabulary from "./data/vocabulary.json";
import { formatIssn, formatOrcid } from "./checksums";
import { resolveSeed } from "./seed";
import { SequenceGenerator, incrementer, product, range } from "./sequence";
import type { SequenceFactory } from "./sequence";
import { debug } from "../utils/logger";

// Seven-digit ISSN bases; the sequence restarts after 9999999.
const ISSN_START = 1000000;
const ISSN_END = 10000000;

// ORCID counters start with "15" and stay below 35000000 to remain valid identifiers.
export const ORCID_START = 15040608;
const ORCID_END = 35000000;

const COUNTRY_NAME_MAX_LENGTH = 50;

export interface ResearcherIdOptions {
  letters?: string;
  number?: number;
  year?: number;
}

export interface GeneratorOptions {
  seed?: number;
}

export interface Generators {
  /** Seed currently applied to the random draws. */
  readonly seed: number;
  id: (offset?: number) => number;
  number: () => number;
  doi: () => string;
  pmid: () => string;
  arxiv: () => string;
  ut: (prefix?: string) => string;
  manuscriptId: () => string;
  publisherName: () => string;
  publicationTitle: () => string;
  institutionName: () => string;
  affiliationName: () => string;
  countryName: () => string;
  name: () => string;
  email: () => string;
  journalName: () => string;
  gibberish: () => string;
  issn: () => string;
  orcid: () => string;
  researcherId: (options?: ResearcherIdOptions) => string;
  truid: () => string;
  /** Restarts every sequence and re-seeds random draws. */
  reset: (seed?: number) => void;
}

export function createGenerators(options: GeneratorOptions = {}): Generators {
  let currentSeed = options.seed ?? resolveSeed();
  const faker = new Faker({ locale: [en] });
  faker.seed(currentSeed);

  const sequences: Array<SequenceGenerator<unknown>> = [];
  function sequence<T>(name: string, factory: SequenceFactory<T>): SequenceGenerator<T> {
    const generator = new SequenceGenerator(name, factory);
    sequences.push(generator);
    return generator;
  }

  const ids = sequence("id", () => incrementer(1));
  const numbers = sequence("number", () => incrementer());
  const dois = sequence("doi", () => incrementer());
  const pmids = sequence("pmid", () => incrementer());
  const arxivIds = sequence("arxiv", () => incrementer(1000));
  const uts = sequence("ut", () => incrementer(100000000000000));
  const manuscripts = sequence("manuscriptId", () => incrementer());
  const publishers = sequence("publisherName", () => incrementer());
  const publications = sequence("publicationTitle", () => incrementer());
  const institutions = sequence("institutionName", () => incrementer());
  const affiliations = sequence("affiliationName", () => incrementer());
  const researcherNumbers = sequence("researcherId", () => incrementer(1000));
  const issns = sequence("issn", () => range(ISSN_START, ISSN_END));
  const orcids = sequence("orcid", () => range(ORCID_START, ORCID_END));
  const countries = sequence("countryName", () => vocabulary.countries[Symbol.iterator]());
  const names = sequence("name", () => product(vocabulary.firstNames, vocabulary.lastNames));
  const emails = sequence("email", () => product(vocabulary.adjectives, vocabulary.lastNames));
  const journals = sequence("journalName", () =>
    product(vocabulary.countries, vocabulary.adjectives, vocabulary.fields)
  );
  const sentences = sequence("gibberish", () =>
    product(vocabulary.words, vocabulary.words, vocabulary.words)
  );

  return {
    get seed() {
      return currentSeed;
    },
    id: (offset = 0) => offset + ids.next(),
    number: () => numbers.next(),
    doi: () => `10.1234/FIXTURE.TEST.${dois.next()}`,
    pmid: () => String(pmids.next()),
    arxiv: () => {
      const value = arxivIds.next();
      return `${value}.${value}`;
    },
    ut: (prefix = "WOS") => `${prefix}:${uts.next()}`,
    manuscriptId: () => `Manuscript:ID-${manuscripts.next()}`,
    publisherName: () => `Publisher ${publishers.next()}`,
    publicationTitle: () => `Publication ${publications.next()}`,
    institutionName: () => `Institution ${institutions.next()}`,
    affiliationName: () => `Affiliation ${affiliations.next()}`,
    countryName: () => countries.next().slice(0, COUNTRY_NAME_MAX_LENGTH),
    name: () => names.next().join(" "),
    email: () => {
      const [adjective, lastName] = emails.next();
      return `${adjective.toLowerCase()}.${lastName.toLowerCase()}@test.com`;
    },
    journalName: () => {
      const [country, adjective, field] = journals.next();
      return `The ${country} journal of ${adjective} ${field}`;
    },
    gibberish: () => sentences.next().join(" "),
    issn: () => formatIssn(issns.next()),
    orcid: () => formatOrcid(orcids.next()),
    researcherId: (researcher = {}) => {
      // One random upper-case letter repeated, e.g. "MMM-1000-2014".
      const letters = researcher.letters ?? faker.string.alpha({ length: 1, casing: "upper" }).repeat(3);
      const serial = researcher.number ?? researcherNumbers.next();
      const year = researcher.year ?? faker.number.int({ min: 2008, max: 2018 });
      return `${letters}-${serial}-${year}`;
    },
    truid: () => faker.string.uuid(),
    reset: (seed) => {
      currentSeed = seed ?? currentSeed;
      faker.seed(currentSeed);
      for (const generator of sequences) {
        generator.restart();
      }
      debug("generators", "registry reset", { seed: currentSeed });
    },
  };
}

/**
 * Process-wide registry used by builders that are not given one.
 */
export const fake: Generators = createGenerators();
