#!/usr/bin/env node
/**
 * parabatch CLI: the main entry point.
 *
 * Commands: inspect
 */
import { inspectCmd } from "./commands/inspect.js";

const USAGE = `
parabatch: length-aware dynamic batching for parallel corpora

Commands:
  inspect          Load a parallel corpus and report one batching pass

Options:
  --data=a,b               Aligned corpus files, one example per line
  --vocab=va,vb            One vocabulary per corpus file (or one shared)
  --config=path            JSON batching config (flags override it)
  --shardSize=N            Examples per shard, 0 = single shard
  --batchCapacity=N        Sentences or padded tokens per batch
  --capacityPolicy=P       sentences | tokens
  --maxExampleLength=N     Skip longer examples, 0 = keep all
  --seed=N                 Shuffle seed (default 42)
  --logLevel=L             debug | info | warn | error
  --logFile=path           Also append JSONL logs to a file
  --help, -h               Show this help

Examples:
  parabatch inspect --data=data/train.en,data/train.fr --vocab=data/vocab.en,data/vocab.fr
  parabatch inspect --data=data/train.en,data/train.fr --vocab=data/vocab.joint --capacityPolicy=sentences --batchCapacity=64
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "inspect") {
    await inspectCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
