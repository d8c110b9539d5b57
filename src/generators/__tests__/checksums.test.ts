// Unit tests for ISSN and ORCID check characters
import { describe, test, expect } from "@jest/globals";
import { formatIssn, formatOrcid, issnCheckCharacter, orcidCheckCharacter } from "../checksums";

describe("ISSN", () => {
  test("formats the first and last seven-digit bases", () => {
    expect(formatIssn(1000000)).toBe("1000-0003");
    expect(formatIssn(1000001)).toBe("1000-0011");
    expect(formatIssn(9999999)).toBe("9999-9994");
  });

  test("uses X when the remainder is one", () => {
    expect(issnCheckCharacter("1000002")).toBe("X");
    expect(formatIssn(1000002)).toBe("1000-002X");
  });

  test("computes the check character for an arbitrary base", () => {
    expect(issnCheckCharacter("1234567")).toBe("9");
  });

  test("rejects bases of the wrong length", () => {
    expect(() => issnCheckCharacter("123")).toThrow(RangeError);
    expect(() => issnCheckCharacter("123")).toThrow('ISSN base must be 7 digits. Received: "123"');
  });

  test("rejects non-digit bases", () => {
    expect(() => issnCheckCharacter("12a4567")).toThrow(
      'ISSN base must contain only decimal digits. Received: "12a4567"'
    );
  });
});

describe("ORCID", () => {
  test("pads the counter to fifteen digits and appends the check character", () => {
    expect(formatOrcid(15040608)).toBe("0000-0001-5040-6082");
    expect(formatOrcid(15040609)).toBe("0000-0001-5040-6090");
    expect(formatOrcid(21825009)).toBe("0000-0002-1825-0097");
    expect(formatOrcid(34999999)).toBe("0000-0003-4999-9997");
  });

  test("uses X when the result is ten", () => {
    expect(formatOrcid(15040612)).toBe("0000-0001-5040-612X");
  });

  test("computes the check character from the fifteen base digits", () => {
    expect(orcidCheckCharacter("000000015040608")).toBe("2");
  });

  test("rejects bases of the wrong length", () => {
    expect(() => orcidCheckCharacter("1504")).toThrow('ORCID base must be 15 digits. Received: "1504"');
  });
});
