import type { BibliographyEntry, ReferenceInput } from "./types";
import { formatCitation } from "../formatters";
import { UNKNOWN_AUTHOR } from "./authors";

const collator = new Intl.Collator("en", { sensitivity: "base", numeric: true });

/**
 * Name a reference is filed under in the reference list
 */
export function leadName(ref: ReferenceInput): string {
  if (ref.type === "report") {
    return ref.organisation.trim() || UNKNOWN_AUTHOR;
  }
  const first = ref.authors.map((a) => a.trim()).find((a) => a.length > 0);
  return first ?? UNKNOWN_AUTHOR;
}

function compareEntries(a: BibliographyEntry, b: BibliographyEntry): number {
  return (
    collator.compare(leadName(a.reference), leadName(b.reference)) ||
    collator.compare(a.reference.year.trim(), b.reference.year.trim()) ||
    collator.compare(a.reference.title.trim(), b.reference.title.trim())
  );
}

/**
 * Format every reference and order the list A-Z by lead name, then year, then title
 */
export function buildBibliography(references: ReferenceInput[]): BibliographyEntry[] {
  return references
    .map((reference) => ({ reference, ...formatCitation(reference) }))
    .sort(compareEntries);
}
