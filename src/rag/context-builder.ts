import type { Match } from "./types.js";

export interface RagContext {
  systemSuffix: string;
  sources: SourceRef[];
}

export interface SourceRef {
  docId: string;
  pages: number[];
}

export function formatCitation(match: Match): string {
  return `[${match.docId}, Page ${match.page}, Para ${match.paragraph}]`;
}

/**
 * Formats matches as cited excerpts for the answer generator's system prompt.
 */
export function buildContext(matches: readonly Match[]): RagContext | null {
  if (matches.length === 0) return null;

  const contextParts = matches.map((match) => `${formatCitation(match)}: ${match.text}`);

  const systemSuffix =
    "\n\n--- Retrieved Context ---\n" +
    "Use the following document excerpts to answer the user's question. " +
    "Always cite sources using the [DocID, Page, Para] labels when referencing specific information.\n\n" +
    contextParts.join("\n\n");

  // Deduplicate sources and collect pages
  const sourceMap = new Map<string, Set<number>>();
  for (const match of matches) {
    const pages = sourceMap.get(match.docId) ?? new Set<number>();
    if (typeof match.page === "number") pages.add(match.page);
    sourceMap.set(match.docId, pages);
  }

  const sources: SourceRef[] = [];
  for (const [docId, pages] of sourceMap) {
    sources.push({ docId, pages: [...pages].sort((a, b) => a - b) });
  }

  return { systemSuffix, sources };
}

export function formatSourcesForUI(sources: readonly SourceRef[]): string {
  return sources
    .map((s) => {
      if (s.pages.length === 0) return s.docId;
      const pageRefs = s.pages.map((p) => `p.${p}`).join(", ");
      return `${s.docId} ${pageRefs}`;
    })
    .join(" | ");
}
