const LEADING_YEAR = /^(\d{2}|\d{4})[-\s]/;
const EMBEDDED_YEAR = /(19[8-9]\d|20[0-2]\d)/;
const URL_YEAR = /\/(\d{4})\//;

/**
 * Reads a filing year out of a free-text case number.
 *
 * A leading `YY-` / `YYYY-` (or the same followed by whitespace) wins; two
 * digits are taken as 20YY. Otherwise the first 4-digit number between 1980
 * and 2029 anywhere in the string is used. Returns null when neither applies.
 */
export function extractYear(caseNumber: string | null | undefined): number | null {
  if (!caseNumber) return null;

  const leading = LEADING_YEAR.exec(caseNumber);
  if (leading) {
    const digits = leading[1];
    return digits.length === 2 ? 2000 + Number(digits) : Number(digits);
  }

  const embedded = EMBEDDED_YEAR.exec(caseNumber);
  return embedded ? Number(embedded[1]) : null;
}

export function extractYearFromUrl(url: string): number | null {
  const m = URL_YEAR.exec(url);
  return m ? Number(m[1]) : null;
}
