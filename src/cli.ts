#!/usr/bin/env node

import ansis from "ansis";
import { parseArgs } from "./core/args";
import { Runner } from "./execution/runner";

function showHelp(): void {
  console.log(`
${ansis.bold("procbed")} - Render templated configs and drive process test beds

${ansis.bold("Usage:")}
  procbed <file.bed> [flags]

${ansis.bold("Flags:")}
  -q, --quiet             Suppress process output and progress messages
  -b, --bail              Stop at the first process that exits non-zero
  --no-prefix             Disable output prefixes
  --prefix=<str>          Custom prefix
  --output=<dir>          Write rendered templates under <dir>
  --commands=<a,b>        Only run the named [commands.<name>] blocks
  --set=<name>=<value>    Declare a string global before [globals] runs
  --render-only           Render templates, skip every commands block
  --progress=<file>       Rewrite <file> with loop positions before each spawn
                          (default: $PROCBED_PROGRESS)
  -h, --help              Show this help

${ansis.bold("Examples:")}
  procbed bench.bed                         Render and run everything
  procbed bench.bed --commands=smoke -b     Run one block, bail on failure
  procbed bench.bed --set=seed=7 --render-only
  `);
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));

  if (parsed.help || parsed.file === undefined) {
    showHelp();
    process.exit(parsed.help ? 0 : 1);
  }

  const options = {
    ...parsed.options,
    progressFile: parsed.options.progressFile ?? process.env.PROCBED_PROGRESS,
  };
  const runner = new Runner();
  await runner.run(parsed.file, options);
}

main().catch((error) => {
  console.error(ansis.red("Fatal error:"), error);
  process.exit(1);
});
