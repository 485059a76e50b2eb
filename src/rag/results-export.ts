import type { Match } from "./types.js";

export type ResultsFormat = "json" | "csv" | "txt";

export const RESULTS_FORMATS: readonly ResultsFormat[] = ["json", "csv", "txt"];

export function isResultsFormat(value: string): value is ResultsFormat {
  return RESULTS_FORMATS.some((format) => format === value);
}

const CSV_HEADER = ["score", "doc_id", "page", "paragraph", "chunk"].join(",");

// Quote only when needed; embedded quotes are doubled.
function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Header plus one row per match, CRLF-terminated. */
export function formatResultsCsv(matches: readonly Match[]): string {
  const rows = matches.map((m) => [m.score, m.docId, m.page, m.paragraph, m.text].map(csvField).join(","));
  return [CSV_HEADER, ...rows].map((line) => `${line}\r\n`).join("");
}

/** Plain-text report: the query, then each match's score, citation and text. */
export function formatResultsReport(query: string, matches: readonly Match[]): string {
  let content = `Query: ${query}\n\nResults:\n`;
  for (const m of matches) {
    content += `\n---\nScore: ${m.score}\nDoc: ${m.docId} | Page: ${m.page} | Paragraph: ${m.paragraph}\n\n${m.text}\n`;
  }
  return content;
}

export function formatResults(query: string, matches: readonly Match[], format: ResultsFormat): string {
  switch (format) {
    case "csv":
      return formatResultsCsv(matches);
    case "txt":
      return formatResultsReport(query, matches);
    case "json":
      return `${JSON.stringify({ query, results: matches }, null, 2)}\n`;
  }
}
