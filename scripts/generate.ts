#!/usr/bin/env node
/**
 * CLI script to generate optics for a TypeScript module
 * Usage: npx tsx scripts/generate.ts <file.ts> [options]
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, dirname, join, relative, resolve } from 'node:path';
import { generateFromSource } from '../src/generator/index.js';
import { MemoryCodeSink } from '../src/output/index.js';
import type { Diagnostic, SourceGenerationOptions } from '../src/index.js';

function usage(): void {
  console.log('Usage: npx tsx scripts/generate.ts <file.ts> [options]');
  console.log('');
  console.log('Options:');
  console.log('  --max-depth=N       Navigator depth, clamped to 1..10 (default: 1)');
  console.log('  --include=a,b       Root fields that get navigators (default: all)');
  console.log('  --exclude=c         Root fields that never get navigators');
  console.log('  --types=A,B         Also generate for these unannotated declarations');
  console.log('  --allow-mutable     Generate lenses for types that have setters');
  console.log('  --no-navigators     Skip <Type>Focus for unannotated product types');
  console.log('  --runtime=module    Module the generated code imports the runtime from');
  console.log('  --js                Emit JavaScript instead of TypeScript');
  console.log('  --out-dir=dir       Write <ClassName>.ts files instead of printing');
  console.log('  --verbose           Trace the generation steps');
}

function list(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.line !== undefined ? `:${diagnostic.line}:${diagnostic.column ?? 0}` : '';
  const member = diagnostic.memberName ? `.${diagnostic.memberName}` : '';
  return `${diagnostic.severity} [${diagnostic.category}] ${diagnostic.typeName}${member}${where}: ${diagnostic.message}`;
}

/**
 * Import specifier of `target` as seen from a file in `fromDir`
 */
function moduleSpecifier(fromDir: string, target: string): string {
  const path = relative(fromDir, target).replace(/\\/g, '/').replace(/\.tsx?$/, '.js');
  return path.startsWith('.') ? path : `./${path}`;
}

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    usage();
    process.exit(1);
  }

  // Parse arguments
  let filePath = '';
  let outDir = '';
  let javascript = false;
  let verbose = false;
  const options: SourceGenerationOptions = {};

  for (const arg of args) {
    if (arg.startsWith('--max-depth=')) {
      options.maxDepth = Number(arg.slice('--max-depth='.length));
    } else if (arg.startsWith('--include=')) {
      options.includeFields = list(arg.slice('--include='.length));
    } else if (arg.startsWith('--exclude=')) {
      options.excludeFields = list(arg.slice('--exclude='.length));
    } else if (arg.startsWith('--types=')) {
      options.types = list(arg.slice('--types='.length));
    } else if (arg.startsWith('--runtime=')) {
      options.runtimeModule = arg.slice('--runtime='.length);
    } else if (arg.startsWith('--out-dir=')) {
      outDir = arg.slice('--out-dir='.length);
    } else if (arg === '--allow-mutable') {
      options.allowMutableFields = true;
    } else if (arg === '--no-navigators') {
      options.generateNavigators = false;
    } else if (arg === '--js') {
      javascript = true;
    } else if (arg === '--verbose') {
      verbose = true;
    } else if (!arg.startsWith('-')) {
      filePath = arg;
    }
  }

  if (!filePath) {
    console.error('Error: No file path provided');
    process.exit(1);
  }

  if (options.maxDepth !== undefined && !Number.isFinite(options.maxDepth)) {
    console.error('Error: --max-depth must be a number');
    process.exit(1);
  }

  // Resolve and read file
  const absolutePath = resolve(process.cwd(), filePath);
  let source: string;

  try {
    source = readFileSync(absolutePath, 'utf-8');
  } catch (err) {
    console.error(`Error: Could not read file '${absolutePath}': ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  const targetDir = outDir ? resolve(process.cwd(), outDir) : dirname(absolutePath);
  options.module = moduleSpecifier(targetDir, absolutePath);
  options.filename = basename(absolutePath);
  if (verbose) {
    options.log = (message) => console.error(`  ${message}`);
  }

  console.error(`Generating optics for ${filePath}...`);
  const startTime = Date.now();
  const { artifacts, diagnostics } = generateFromSource(source, options);
  const elapsed = Date.now() - startTime;

  for (const diagnostic of diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }
  console.error(`Generated ${artifacts.length} artifacts in ${elapsed}ms`);

  const sink = new MemoryCodeSink({ typescript: !javascript });
  for (const artifact of artifacts) {
    sink.write(artifact);
  }

  const extension = javascript ? '.js' : '.ts';
  for (const file of sink.all()) {
    if (outDir) {
      mkdirSync(targetDir, { recursive: true });
      const target = join(targetDir, `${file.className}${extension}`);
      writeFileSync(target, `${file.code}\n`);
      console.error(`  wrote ${relative(process.cwd(), target)}`);
    } else {
      console.log(`// ${file.qualifiedName}`);
      console.log(file.code);
      console.log('');
    }
  }

  if (diagnostics.some((diagnostic) => diagnostic.severity === 'error')) {
    process.exit(1);
  }
}

main();
