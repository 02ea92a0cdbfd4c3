#!/usr/bin/env node
import fs from 'node:fs';
import { pathToFileURL } from 'node:url';
import { parseArgs, type TallyConfig } from './config.js';
import { loadUnit, parseSystemDefinition, readJsonFile } from './loader.js';
import { SystemRegistry } from './registry.js';
import { renderComment, renderWire } from './render.js';
import { chainOf, countBins, describeUnit, innermost } from './unit.js';

export function formatLevels(levels: string[]): string {
  const lines = ['LEVELS (innermost first):'];
  levels.forEach((level, i) => {
    lines.push(`  ${String(i + 1).padStart(2)}. ${level}`);
  });
  return lines.join('\n');
}

export function run(config: TallyConfig): void {
  const registry = new SystemRegistry(parseSystemDefinition(readJsonFile(config.systemPath, 'system definition')));
  const unit = innermost(loadUnit(readJsonFile(config.unitPath, 'unit expression')));

  if (config.verbose) {
    console.log(formatLevels(chainOf(unit).map(describeUnit)));
    console.log(`Bins: ${countBins(unit)}\n`);
  }

  if (config.output !== 'wire') {
    console.log(`Comment:${renderComment(unit)}`);
  }
  if (config.output !== 'comment') {
    console.log(`Wire:${renderWire(unit, registry)}`);
  }
}

function main(): void {
  try {
    const config = parseArgs(process.argv.slice(2));

    if (config.verbose) {
      console.log('Configuration:', JSON.stringify(config, null, 2));
    }

    run(config);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

/**
 * True when `scriptPath` (usually `process.argv[1]`) is this module, also when
 * it is reached through a symlink such as the one npm puts in `.bin/`.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath || !fs.existsSync(scriptPath)) return false;
  return pathToFileURL(fs.realpathSync(scriptPath)).href === moduleUrl;
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  main();
}
