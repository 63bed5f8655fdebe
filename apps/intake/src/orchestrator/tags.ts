/**
 * Tags the recorder's board accepts, in their original order.
 */
export function filterAllowedTags(tags: ReadonlyArray<string>, allowed: ReadonlyArray<string>): string[] {
  const allowedSet = new Set(allowed);
  return tags.filter((t) => allowedSet.has(t));
}
