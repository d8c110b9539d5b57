// Check characters for standard identifiers.

function toDigits(value: string, label: string): number[] {
  if (!/^\d+$/.test(value)) {
    throw new RangeError(`${label} must contain only decimal digits. Received: "${value}"`);
  }
  return Array.from(value, (char) => Number(char));
}

/**
 * ISSN check character for seven base digits: weights 8 down to 2, modulo 11.
 */
export function issnCheckCharacter(baseDigits: string): string {
  const digits = toDigits(baseDigits, "ISSN base");
  if (digits.length !== 7) {
    throw new RangeError(`ISSN base must be 7 digits. Received: "${baseDigits}"`);
  }

  const remainder = digits.reduce((sum, digit, i) => sum + (8 - i) * digit, 0) % 11;
  if (remainder === 1) return "X";
  if (remainder === 0) return "0";
  return String(11 - remainder);
}

/**
 * Formats a seven-digit number as an ISSN, e.g. 1000000 -> "1000-0003".
 */
export function formatIssn(value: number): string {
  const base = String(value);
  const check = issnCheckCharacter(base);
  return `${base.slice(0, 4)}-${base.slice(4)}${check}`;
}

/**
 * ORCID check character (ISO 7064 MOD 11-2) for fifteen base digits.
 */
export function orcidCheckCharacter(baseDigits: string): string {
  const digits = toDigits(baseDigits, "ORCID base");
  if (digits.length !== 15) {
    throw new RangeError(`ORCID base must be 15 digits. Received: "${baseDigits}"`);
  }

  let total = 0;
  for (const digit of digits) {
    total = (total + digit) * 2;
  }
  const result = (12 - (total % 11)) % 11;
  return result === 10 ? "X" : String(result);
}

/**
 * Formats a counter as an ORCID, e.g. 15040608 -> "0000-0001-5040-6082".
 */
export function formatOrcid(counter: number): string {
  const base = String(counter).padStart(15, "0");
  const check = orcidCheckCharacter(base);
  return [base.slice(0, 4), base.slice(4, 8), base.slice(8, 12), base.slice(12, 15) + check].join("-");
}
