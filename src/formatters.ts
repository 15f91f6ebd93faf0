import type {
  BookReference,
  ChapterReference,
  FormattedReference,
  JournalReference,
  ReferenceInput,
  ReferenceRun,
  ReportReference,
  ThesisReference,
  WebsiteReference,
} from "./lib/types";
import { formatAuthors, formatEditors, UNKNOWN_AUTHOR } from "./lib/authors";
import { renderRuns } from "./lib/render";

export const NO_DATE = "n.d.";
export const UNTITLED = "Untitled";

const WEB_URL = /^https?:\/\//i;

function plain(text: string): ReferenceRun {
  return { text };
}

function italic(text: string): ReferenceRun {
  return { text, style: "italic" };
}

function bold(text: string): ReferenceRun {
  return { text, style: "bold" };
}

function clean(value: string | undefined): string {
  return (value ?? "").trim();
}

function yearOf(year: string): string {
  return clean(year) || NO_DATE;
}

function titleOf(title: string): string {
  return clean(title) || UNTITLED;
}

/**
 * "Place: Publisher", or whichever half is present
 */
function publication(place: string, publisher: string): string {
  return [clean(place), clean(publisher)].filter((p) => p.length > 0).join(": ");
}

/**
 * Edition is only shown when it is not the first:
 * "2nd" -> "2nd edn.", "Revised edition" -> "revised edn."
 */
export function formatEdition(edition: string | undefined): string {
  const lowered = clean(edition).toLowerCase();
  const base = lowered.replace(/\s*\b(?:edition|edn|ed)\.?$/, "").trim();

  if (!base || /^(?:1|1st|first)$/.test(base)) return "";
  return `${base} edn.`;
}

function formatBook(ref: BookReference): ReferenceRun[] {
  const runs = [
    plain(`${formatAuthors(ref.authors)} (${yearOf(ref.year)}) `),
    italic(titleOf(ref.title)),
    plain("."),
  ];

  const edition = formatEdition(ref.edition);
  if (edition) runs.push(plain(` ${edition}`));

  const pub = publication(ref.place, ref.publisher);
  if (pub) runs.push(plain(` ${pub}.`));

  return runs;
}

function formatChapter(ref: ChapterReference): ReferenceRun[] {
  const editors = formatEditors(ref.editors);
  const runs = [
    plain(`${formatAuthors(ref.authors)} (${yearOf(ref.year)}) ${titleOf(ref.title)}. In: `),
  ];
  if (editors) runs.push(plain(`${editors} `));
  runs.push(italic(titleOf(ref.bookTitle)), plain("."));

  const pages = clean(ref.pages);
  const tail = [publication(ref.place, ref.publisher), pages ? `pp.${pages}` : ""]
    .filter((p) => p.length > 0)
    .join(", ");
  if (tail) runs.push(plain(` ${tail}.`));

  return runs;
}

function formatJournal(ref: JournalReference): ReferenceRun[] {
  const runs = [plain(`${formatAuthors(ref.authors)} (${yearOf(ref.year)}) ${titleOf(ref.title)}.`)];

  const journal = clean(ref.journal);
  if (journal) runs.push(plain(" "), italic(journal), plain("."));

  const volume = clean(ref.volume);
  const issue = clean(ref.issue);
  const pages = clean(ref.pages);

  const locator: ReferenceRun[] = [];
  if (volume) locator.push(bold(volume));
  if (issue) locator.push(plain(`(${issue})`));
  if (pages) locator.push(plain(`${locator.length > 0 ? ", " : ""}pp.${pages}`));
  if (locator.length > 0) runs.push(plain(" "), ...locator, plain("."));

  return runs;
}

function formatWebsite(ref: WebsiteReference): ReferenceRun[] {
  const runs = [
    plain(`${formatAuthors(ref.authors)} (${yearOf(ref.year)}) `),
    italic(titleOf(ref.title)),
    plain(". [Online]."),
  ];

  const accessed = clean(ref.accessed);
  if (accessed) runs.push(plain(` [Accessed ${accessed}].`));

  const url = clean(ref.url);
  if (url) {
    // Only web addresses become links; anything else stays as text
    runs.push(plain(" Available from: "), WEB_URL.test(url) ? { text: url, link: url } : plain(url));
  }

  return runs;
}

function formatReport(ref: ReportReference): ReferenceRun[] {
  const runs = [
    plain(`${clean(ref.organisation) || UNKNOWN_AUTHOR} (${yearOf(ref.year)}) `),
    italic(titleOf(ref.title)),
    plain("."),
  ];

  const pub = publication(ref.place, ref.publisher);
  if (pub) runs.push(plain(` ${pub}.`));

  return runs;
}

function formatThesis(ref: ThesisReference): ReferenceRun[] {
  const runs = [
    plain(`${formatAuthors(ref.authors)} (${yearOf(ref.year)}) `),
    italic(titleOf(ref.title)),
    plain("."),
  ];

  for (const part of [clean(ref.degree), clean(ref.university)]) {
    if (part) runs.push(plain(` ${part}.`));
  }

  return runs;
}

export function referenceRuns(ref: ReferenceInput): ReferenceRun[] {
  switch (ref.type) {
    case "book":
      return formatBook(ref);
    case "chapter":
      return formatChapter(ref);
    case "journal":
      return formatJournal(ref);
    case "website":
      return formatWebsite(ref);
    case "report":
      return formatReport(ref);
    case "thesis":
      return formatThesis(ref);
  }
}

export function formatCitation(ref: ReferenceInput): FormattedReference {
  const runs = referenceRuns(ref);
  return {
    runs,
    text: renderRuns(runs, "text"),
    markdown: renderRuns(runs, "markdown"),
    html: renderRuns(runs, "html"),
  };
}

/**
 * Book reference from the five form fields, as plain text:
 * `Author (Year) Title. Place: Publisher.`
 */
export function formatReference(
  author: string,
  year: string,
  title: string,
  publisher: string,
  place: string
): string {
  return formatCitation(bookFromFields({ author, year, title, publisher, place })).text;
}

export interface ReferenceFields {
  author: string;
  year: string;
  title: string;
  publisher: string;
  place: string;
}

export function bookFromFields(fields: ReferenceFields): BookReference {
  return {
    type: "book",
    authors: [fields.author],
    year: fields.year,
    title: fields.title,
    place: fields.place,
    publisher: fields.publisher,
  };
}
