import { Document, ExternalHyperlink, HeadingLevel, Packer, Paragraph, TextRun } from "docx";
import type { BibliographyEntry, ReferenceRun } from "./types";

export const DOCX_MIME_TYPE =
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export interface DocxOptions {
  footer?: string;
}

function toDocxRun(run: ReferenceRun): TextRun | ExternalHyperlink {
  if (run.link) {
    return new ExternalHyperlink({
      link: run.link,
      children: [new TextRun({ text: run.text, style: "Hyperlink" })],
    });
  }
  return new TextRun({
    text: run.text,
    italics: run.style === "italic" ? true : undefined,
    bold: run.style === "bold" ? true : undefined,
  });
}

export function buildBibliographyDocument(
  entries: BibliographyEntry[],
  options: DocxOptions = {}
): Document {
  const children: Paragraph[] = [
    new Paragraph({
      text: "Reference List",
      heading: HeadingLevel.HEADING_1,
    }),
    ...entries.map((entry) => new Paragraph({ children: entry.runs.map(toDocxRun) })),
  ];

  if (options.footer) {
    children.push(new Paragraph({ text: "" }));
    children.push(new Paragraph({ children: [new TextRun({ text: options.footer, italics: true })] }));
  }

  return new Document({ sections: [{ children }] });
}

/**
 * Word file for a reference list, as bytes ready to send
 */
export async function renderBibliographyDocx(
  entries: BibliographyEntry[],
  options: DocxOptions = {}
): Promise<ArrayBuffer> {
  const buffer = await Packer.toBuffer(buildBibliographyDocument(entries, options));
  const bytes = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(bytes).set(buffer);
  return bytes;
}
