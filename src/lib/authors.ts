export const UNKNOWN_AUTHOR = "Unknown Author";

/**
 * Leeds Harvard author list:
 * one name as given, two joined with "and", three or more cut to "et al."
 */
export function formatAuthors(authors: string[]): string {
  const names = authors.map((a) => a.trim()).filter((a) => a.length > 0);

  if (names.length === 0) return UNKNOWN_AUTHOR;
  if (names.length === 1) return names[0];
  if (names.length === 2) return `${names[0]} and ${names[1]}`;

  return `${names[0]} et al.`;
}

/**
 * Editors follow the author rule with "ed." or "eds." after them
 */
export function formatEditors(editors: string[]): string {
  const names = editors.map((e) => e.trim()).filter((e) => e.length > 0);
  if (names.length === 0) return "";

  return `${formatAuthors(names)} ${names.length === 1 ? "ed." : "eds."}`;
}

/**
 * Surname used to match in-text citations and to sort lists:
 * "Smith, J." -> "Smith", "Jane Smith" -> "Jane"
 */
export function leadSurname(name: string): string {
  const trimmed = name.trim();
  if (trimmed.includes(",")) return trimmed.split(",")[0].trim();
  return trimmed.split(/\s+/)[0];
}
