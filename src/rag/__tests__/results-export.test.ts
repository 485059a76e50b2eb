import { describe, expect, it } from "@jest/globals";
import { formatResults, formatResultsCsv, formatResultsReport, isResultsFormat } from "../results-export.js";
import { NOT_AVAILABLE, type Match } from "../types.js";

const matches: Match[] = [
  { docId: "d1", page: 1, paragraph: 2, text: 'Say "hi", then\nleave', score: 0.75 },
  { docId: "d2", page: NOT_AVAILABLE, paragraph: 3, text: "plain", score: 0.5 },
];

describe("formatResultsCsv", () => {
  it("writes a header and quotes fields that need it", () => {
    expect(formatResultsCsv(matches)).toBe(
      "score,doc_id,page,paragraph,chunk\r\n" +
        '0.75,d1,1,2,"Say ""hi"", then\nleave"\r\n' +
        "0.5,d2,not available,3,plain\r\n",
    );
  });

  it("writes only the header when nothing matched", () => {
    expect(formatResultsCsv([])).toBe("score,doc_id,page,paragraph,chunk\r\n");
  });
});

describe("formatResultsReport", () => {
  it("lists the query and every match with its citation", () => {
    expect(formatResultsReport("fox", matches)).toBe(
      "Query: fox\n\nResults:\n" +
        '\n---\nScore: 0.75\nDoc: d1 | Page: 1 | Paragraph: 2\n\nSay "hi", then\nleave\n' +
        "\n---\nScore: 0.5\nDoc: d2 | Page: not available | Paragraph: 3\n\nplain\n",
    );
  });
});

describe("formatResults", () => {
  it("dispatches on the format", () => {
    expect(formatResults("fox", matches, "csv")).toBe(formatResultsCsv(matches));
    expect(formatResults("fox", matches, "txt")).toBe(formatResultsReport("fox", matches));
    expect(JSON.parse(formatResults("fox", matches, "json"))).toEqual({ query: "fox", results: matches });
  });

  it("recognizes the supported formats", () => {
    expect(isResultsFormat("csv")).toBe(true);
    expect(isResultsFormat("xml")).toBe(false);
  });
});
