import type {
  BibliographyEntry,
  CitationHighlight,
  CitationReport,
  InTextCitation,
  ReferenceInput,
} from "./types";
import { leadSurname } from "./authors";
import { buildBibliography, leadName } from "./bibliography";

// (Smith, 2020) / (Smith 2020) / (O'Neil et al., 2021)
const CITATION_PATTERN = /\(([A-Z][A-Za-z'-]+)(?: et al\.)?,?\s*(\d{4})\)/g;

export function findInTextCitations(text: string): InTextCitation[] {
  return Array.from(text.matchAll(CITATION_PATTERN), (m) => ({
    author: m[1],
    year: m[2],
  }));
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])(?<!\bet al\.)\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function cites(citation: InTextCitation, ref: ReferenceInput): boolean {
  const surname = leadSurname(leadName(ref)).toLowerCase();
  return surname.includes(citation.author.toLowerCase()) && ref.year.trim() === citation.year;
}

/**
 * Compare the in-text citations of a piece of writing against a reference list
 */
export function checkCitations(text: string, references: ReferenceInput[]): CitationReport {
  const highlights: CitationHighlight[] = [];

  for (const sentence of splitSentences(text)) {
    for (const citation of findInTextCitations(sentence)) {
      const matched = references.some((ref) => cites(citation, ref));
      highlights.push({ ...citation, sentence, status: matched ? "matched" : "missing" });
    }
  }

  const citations = highlights.map(({ author, year }) => ({ author, year }));
  const unused: BibliographyEntry[] = buildBibliography(references).filter(
    (entry) => !citations.some((citation) => cites(citation, entry.reference))
  );

  const matched = highlights.filter((h) => h.status === "matched").length;

  return {
    citations,
    highlights,
    unused,
    summary: {
      total: citations.length,
      matched,
      missing: highlights.length - matched,
      unused: unused.length,
    },
  };
}
