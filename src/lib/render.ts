import type { Markup, ReferenceRun } from "./types";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function italic(text: string): string {
  return `<i>${text}</i>`;
}

function bold(text: string): string {
  return `<b>${text}</b>`;
}

function renderHtmlRun(run: ReferenceRun): string {
  const text = escapeHtml(run.text);
  if (run.link) {
    return `<a href="${escapeHtml(run.link)}" target="_blank" rel="noopener">${text}</a>`;
  }
  if (run.style === "italic") return italic(text);
  if (run.style === "bold") return bold(text);
  return text;
}

function renderMarkdownRun(run: ReferenceRun): string {
  if (run.style === "italic") return `*${run.text}*`;
  if (run.style === "bold") return `**${run.text}**`;
  return run.text;
}

export function renderRuns(runs: ReferenceRun[], markup: Markup): string {
  switch (markup) {
    case "html":
      return runs.map(renderHtmlRun).join("");
    case "markdown":
      return runs.map(renderMarkdownRun).join("");
    case "text":
      return runs.map((run) => run.text).join("");
  }
}
