/**
 * Notes text for the recorder from IP metadata; empty when nothing was found.
 */
export function formatIpNotes(meta: Readonly<Record<string, string>>): string {
  if (Object.keys(meta).length === 0) return "";

  const lines = [`IP: ${meta.ip ?? "N/A"}`];
  if (meta.city && meta.region) {
    lines.push(`Location (IP): ${meta.city}, ${meta.region}, ${meta.country ?? ""}`);
  }
  if (meta.org) lines.push(`Org: ${meta.org}`);
  return lines.join("\n");
}
