#!/usr/bin/env node
import "dotenv/config";
import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import logger, { setLogLevel } from "./logger.js";
import { buildContext, formatSourcesForUI } from "./rag/context-builder.js";
import { loadRagConfig } from "./rag/config.js";
import { getErrorMessage, RagError, RagErrorCode } from "./rag/errors.js";
import { initRagPipeline } from "./rag/pipeline.js";
import { formatResults, isResultsFormat, RESULTS_FORMATS, type ResultsFormat } from "./rag/results-export.js";
import type { ExtractedDocument } from "./rag/types.js";

const USAGE = [
  "Usage: doc-rag <command> [...]",
  "  ingest <textFile> [docId]   chunk, embed and index a UTF-8 text file (pages split on form feeds)",
  "  query <text> [k] [--format json|csv|txt] [--out file]",
  "                              print or save the top k matches",
  "  rebuild                     re-index every stored chunk",
  "  docs                        stored documents and their chunk counts",
  "  stats                       chunk and index counts",
].join("\n");

const QUERY_USAGE = "Usage: doc-rag query <text> [k] [--format json|csv|txt] [--out file]";

const COMMANDS = ["ingest", "query", "rebuild", "docs", "stats"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseCli(argv: readonly string[]): { command: Command; args: string[] } {
  const [, , command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new RagError(RagErrorCode.INVALID_ARGUMENT, USAGE);
  }
  return { command, args: rest };
}

/** Text extraction is external; form feeds (as pdftotext emits) separate pages. */
export function textToDocument(docId: string, text: string): ExtractedDocument {
  return {
    docId,
    pages: text.split("\f").map((pageText, i) => ({ pageNumber: i + 1, text: pageText })),
  };
}

export interface QueryArgs {
  queryText: string;
  k: number | undefined;
  format: ResultsFormat;
  out: string | undefined;
}

export function parseQueryArgs(args: readonly string[]): QueryArgs {
  const positional: string[] = [];
  let format: ResultsFormat = "json";
  let out: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--format" || arg === "--out") {
      const value = args[++i];
      if (value === undefined) throw new RagError(RagErrorCode.INVALID_ARGUMENT, `${arg} needs a value`);
      if (arg === "--out") {
        out = value;
      } else if (isResultsFormat(value)) {
        format = value;
      } else {
        throw new RagError(
          RagErrorCode.INVALID_ARGUMENT,
          `Unknown format "${value}", expected one of ${RESULTS_FORMATS.join(", ")}`,
        );
      }
    } else if (arg !== undefined) {
      positional.push(arg);
    }
  }

  const [queryText, kArg, ...extra] = positional;
  if (!queryText || extra.length > 0) throw new RagError(RagErrorCode.INVALID_ARGUMENT, QUERY_USAGE);
  return { queryText, k: parseK(kArg), format, out };
}

function parseK(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const k = Number(raw);
  if (!Number.isInteger(k) || k < 1) {
    throw new RagError(RagErrorCode.INVALID_ARGUMENT, `k must be a positive integer, got "${raw}"`);
  }
  return k;
}

async function main(argv: readonly string[]): Promise<void> {
  const { command, args } = parseCli(argv);
  const config = loadRagConfig();
  setLogLevel(config.logLevel);

  const rebuilding = command === "rebuild";
  const rag = await initRagPipeline(config, { resetOnModelChange: rebuilding, recreateIfUnreadable: rebuilding });

  switch (command) {
    case "ingest": {
      const [filePath, docIdArg] = args;
      if (!filePath) throw new RagError(RagErrorCode.INVALID_ARGUMENT, "Usage: doc-rag ingest <textFile> [docId]");
      const text = await readFile(filePath, "utf-8");
      const count = await rag.ingestDocument(textToDocument(docIdArg ?? path.basename(filePath), text));
      process.stdout.write(`${count}\n`);
      return;
    }
    case "query": {
      const { queryText, k, format, out } = parseQueryArgs(args);
      const matches = await rag.query(queryText, k);
      const context = buildContext(matches);
      if (context) logger.info(`Sources: ${formatSourcesForUI(context.sources)}`);
      const output = formatResults(queryText, matches, format);
      if (out) {
        await writeFile(out, output, "utf-8");
        logger.info(`Wrote ${matches.length} results to ${out}`);
      } else {
        process.stdout.write(output);
      }
      return;
    }
    case "docs": {
      const documents = [...(await rag.documents())].map(([docId, chunks]) => ({ docId, chunks: chunks.length }));
      process.stdout.write(`${JSON.stringify(documents, null, 2)}\n`);
      return;
    }
    case "rebuild": {
      const count = await rag.rebuild((done, total) => logger.info(`Re-indexed ${done}/${total} chunks`));
      process.stdout.write(`${count}\n`);
      return;
    }
    case "stats": {
      process.stdout.write(`${JSON.stringify(await rag.stats(), null, 2)}\n`);
      return;
    }
  }
}

if (require.main === module) {
  main(process.argv).catch((err: unknown) => {
    logger.error(getErrorMessage(err));
    process.exitCode = 1;
  });
}
