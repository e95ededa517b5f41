/** Formats a date the way `dcterms:modified` wants it: `CCYY-MM-DDThh:mm:ssZ`. */
export function toXmlDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/** Drops the milliseconds, which neither the package document nor zip entries can hold. */
export function truncateToSeconds(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}
