// SPDX-License-Identifier: Apache-2.0
import fs from "node:fs";
import cac from "cac";
import { lex, parse, toQueryString } from "@fts-query/shared";
import { log } from "./log";
import {
  OutputFormatSchema,
  columnReport,
  describeError,
  encodeTokenArgs,
  parseColumnList,
  parseQueryDocument,
  renderQuery,
} from "./output";
import { SUITES_DIR, runConformance } from "./conformance/run";

process.stdout.on("error", (err) => {
  if ("code" in err && err.code === "EPIPE") process.exit(0);
  throw err;
});

function run(action: () => void): void {
  try {
    action();
  } catch (err) {
    process.stderr.write(`${describeError(err)}\n`);
    process.exit(1);
  }
}

const cli = cac("fts-query");

cli
  .command("lex <query>", "Print the tokens of a query as JSON")
  .action((query: string) => {
    run(() => {
      process.stdout.write(JSON.stringify(lex(query), null, 2) + "\n");
    });
  });

cli
  .command("parse <query>", "Parse a query and print its AST")
  .option("--output <format>", "Output format: ast, dict, query", { default: "ast" })
  .action((query: string, options: { output: unknown }) => {
    run(() => {
      const format = OutputFormatSchema.parse(options.output);
      process.stdout.write(renderQuery(parse(query), format) + "\n");
    });
  });

cli
  .command("format <query>", "Print a query in canonical form")
  .action((query: string) => {
    run(() => {
      process.stdout.write(toQueryString(parse(query)) + "\n");
    });
  });

cli
  .command("from-dict <file>", "Read a query dict from a JSON or YAML file and print it as text")
  .option("--verbose", "Print detailed progress", { default: false })
  .action((file: string, options: { verbose: boolean }) => {
    run(() => {
      log(`Reading ${file}`, options.verbose);
      const ast = parseQueryDocument(fs.readFileSync(file, "utf-8"));
      process.stdout.write(toQueryString(ast) + "\n");
    });
  });

cli
  .command("columns <query>", "Show the columns each phrase of a query is matched against")
  .option("--columns <names>", "Comma-separated list of the table's columns")
  .action((query: string, options: { columns?: unknown }) => {
    run(() => {
      const columns = parseColumnList(options.columns);
      if (columns.length === 0) throw new Error("--columns is required");
      for (const line of columnReport(query, columns)) {
        process.stdout.write(line + "\n");
      }
    });
  });

cli
  .command("tokens <...slots>", "Encode pre-tokenized phrase text; join co-located tokens with >")
  .action((slots: string[]) => {
    run(() => {
      process.stdout.write(encodeTokenArgs(slots) + "\n");
    });
  });

cli
  .command("conformance", "Run the YAML conformance suites")
  .option("--suites <dir>", "Directory of suite files", { default: SUITES_DIR })
  .option("--verbose", "Print canonical forms and progress", { default: false })
  .action((options: { suites: string; verbose: boolean }) => {
    let allPassed = false;
    run(() => {
      allPassed = runConformance({ suites: options.suites, verbose: options.verbose });
    });
    process.exit(allPassed ? 0 : 1);
  });

cli.help();
cli.parse();
