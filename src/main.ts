#!/usr/bin/env node
import yaml from "js-yaml";
import { borehole2D } from "./borehole2d.js";
import { loadOptions, mergeOptions } from "./options.js";
import { toRows } from "./sanitize.js";
import { consoleLogger, readText } from "./util.js";

function main(): void {
  const [recordsPath, optionsPath, outDxf] = process.argv.slice(2);
  if (!recordsPath) {
    console.error("Usage: borehole2d <records.yaml|json> [options.yaml] [out.dxf]");
    process.exit(1);
  }
  const rows = toRows(yaml.load(readText(recordsPath)));
  const options = optionsPath ? loadOptions(optionsPath) : mergeOptions();
  if (outDxf) options.path = outDxf;
  const result = borehole2D(rows, options, { logger: consoleLogger });
  consoleLogger.info(`layers=${result.records.length} materials=${Object.keys(result.colors).length} -> ${result.path}`);
}

try {
  main();
} catch (e: unknown) {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
}
