#!/usr/bin/env node
import { JsonAnalyzer } from "../analysis/analyzer.js";
import { FileSource } from "../io/sources.js";
import { Parser } from "../parser/parser.js";
import { walkDocuments } from "../parser/walk.js";
import { parseArgs, type CliArgs } from "./args.js";

const readCommandLine = (): CliArgs => {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
};

const { inputPath, options } = readCommandLine();

const run = (): void => {
  let parser: Parser | undefined;
  try {
    console.log(`Input JSON: ${inputPath}`);

    parser = new Parser(FileSource.open(inputPath), options);
    const analyzer = new JsonAnalyzer();
    walkDocuments(parser, analyzer);

    const report = analyzer.getReport();
    console.log("Success: input decoded.");
    console.log("Analysis Report:");
    console.log(`  Documents:   ${report.documents}`);
    console.log(`  Max depth:   ${report.maxDepth}`);
    console.log(`  Peak buffer: ${parser.peakBufferCapacity} bytes`);
    console.log("  Tokens:");
    console.log(`    Objects:  ${report.tokens.objects}`);
    console.log(`    Arrays:   ${report.tokens.arrays}`);
    console.log(`    Keys:     ${report.tokens.keys}`);
    console.log(`    Strings:  ${report.tokens.strings}`);
    console.log(`    Numbers:  ${report.tokens.numbers}`);
    console.log(`    Booleans: ${report.tokens.booleans}`);
    console.log(`    Nulls:    ${report.tokens.nulls}`);
    console.log("  String Deduplication:");
    console.log(`    Unique Strings: ${report.strings.uniqueCount}${report.strings.truncated ? " (table full)" : ""}`);
    console.log(`    Total Strings:  ${report.strings.totalCount}`);
    console.log(`    Unique Bytes:   ${report.strings.uniqueBytes}`);
    console.log(`    Total Bytes:    ${report.strings.totalBytes}`);
    if (report.strings.totalBytes > 0) {
      const saved = report.strings.totalBytes - report.strings.uniqueBytes;
      const ratio = (saved / report.strings.totalBytes) * 100;
      console.log(`    Saved:          ${saved} bytes (${ratio.toFixed(2)}%)`);
    }
    if (report.arrays.size > 0) {
      console.log("  Numeric Arrays:");
      for (const [path, type] of report.arrays) {
        console.log(`    ${path}: ${type}`);
      }
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
  } finally {
    parser?.close();
  }
};

run();
