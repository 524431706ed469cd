/**
 * Join first and last name with a single space, leaving out a missing or
 * blank part: ("Matt", "Groff") -> "Matt Groff", ("Matt", null) -> "Matt".
 */
export function formatFullName(firstName?: string | null, lastName?: string | null): string {
  return [firstName, lastName]
    .map((part) => part?.trim() ?? '')
    .filter((part) => part !== '')
    .join(' ');
}
