export type ReferenceType = "book" | "chapter" | "journal" | "website" | "report" | "thesis";

export type Markup = "text" | "markdown" | "html";

interface BaseReference {
  authors: string[];
  year: string;
  title: string;
}

export interface BookReference extends BaseReference {
  type: "book";
  edition?: string;
  place: string;
  publisher: string;
}

export interface ChapterReference extends BaseReference {
  type: "chapter";
  editors: string[];
  bookTitle: string;
  place: string;
  publisher: string;
  pages?: string;
}

export interface JournalReference extends BaseReference {
  type: "journal";
  journal: string;
  volume: string;
  issue?: string;
  pages?: string;
}

export interface WebsiteReference extends BaseReference {
  type: "website";
  url: string;
  accessed?: string;
}

// Reports are credited to an organisation rather than people
export interface ReportReference {
  type: "report";
  organisation: string;
  year: string;
  title: string;
  place: string;
  publisher: string;
}

export interface ThesisReference extends BaseReference {
  type: "thesis";
  degree: string;
  university: string;
}

export type ReferenceInput =
  | BookReference
  | ChapterReference
  | JournalReference
  | WebsiteReference
  | ReportReference
  | ThesisReference;

/**
 * One piece of a formatted reference. Renderers decide how `style` and
 * `link` are shown (asterisks, tags, or a Word run).
 */
export interface ReferenceRun {
  text: string;
  style?: "italic" | "bold";
  link?: string;
}

export interface FormattedReference {
  runs: ReferenceRun[];
  text: string;
  markdown: string;
  html: string;
}

export interface BibliographyEntry extends FormattedReference {
  reference: ReferenceInput;
}

export type CitationStatus = "matched" | "missing";

export interface InTextCitation {
  author: string;
  year: string;
}

export interface CitationHighlight extends InTextCitation {
  sentence: string;
  status: CitationStatus;
}

export interface CitationReport {
  citations: InTextCitation[];
  highlights: CitationHighlight[];
  unused: BibliographyEntry[];
  summary: {
    total: number;
    matched: number;
    missing: number;
    unused: number;
  };
}
