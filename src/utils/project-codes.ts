/**
 * Project codes carried in source file names, e.g. "21045 Harbor Bridge" -> "21045".
 * The first run of digits in each name counts; names without digits are skipped.
 *
 * Codes are returned as written in the file name. Timesheet `Proj Cd` keys
 * carry one extra leading "0" ("21045" is filed as "021045"), so a lookup
 * against them must prepend it.
 */
export function extractProjectCodes(sourceFiles: readonly string[]): string[] {
  const codes = new Set<string>();

  for (const file of sourceFiles) {
    const match = /\d+/.exec(file);
    if (match) {
      codes.add(match[0]);
    }
  }

  return [...codes];
}
