import { JsonAnalyzer } from "../src/analysis/analyzer.js";
import { IterableSource } from "../src/io/sources.js";
import { Parser } from "../src/parser/parser.js";
import { walkDocuments } from "../src/parser/walk.js";

const targetMegabytes = Number(process.argv[2] ?? "1024");
const targetBytes = targetMegabytes * 1024 * 1024;
const recordsPerChunk = 1000;

// Synthetic array of records, produced lazily so the input never sits in memory.
function* generateDocument(): Generator<string> {
  yield "[";
  let produced = 1;
  let id = 0;
  while (produced < targetBytes) {
    let chunk = "";
    for (let i = 0; i < recordsPerChunk; i++, id++) {
      chunk += `{"id":${id},"name":"user-${id % 5000}","score":${(id % 997) / 10},"tags":["a","b"],"active":${id % 3 === 0}},`;
    }
    produced += chunk.length;
    yield chunk;
  }
  yield "null]";
}

async function main() {
  console.log(`Decoding a ${targetMegabytes} MiB synthetic document...`);
  const parser = new Parser(new IterableSource(generateDocument()), {
    initialBufferCapacity: 64 * 1024,
    maxBufferCapacity: 64 * 1024,
  });
  const analyzer = new JsonAnalyzer();

  const start = process.hrtime.bigint();
  try {
    walkDocuments(parser, analyzer);
  } finally {
    parser.close();
  }
  const end = process.hrtime.bigint();
  const { heapUsed, rss } = process.memoryUsage();

  const duration = Number(end - start) / 1e9;
  const report = analyzer.getReport();
  console.log(`Decoded ${parser.position} bytes in ${duration.toFixed(3)}s`);
  console.log(`Throughput: ${(parser.position / 1024 / 1024 / duration).toFixed(1)} MiB/s`);
  console.log(`Objects: ${report.tokens.objects}, unique strings: ${report.strings.uniqueCount}`);
  console.log(`Peak buffer: ${parser.peakBufferCapacity} bytes`);
  console.log(`Heap used: ${(heapUsed / 1024 / 1024).toFixed(1)} MiB, RSS: ${(rss / 1024 / 1024).toFixed(1)} MiB`);
}

main().catch(console.error);
