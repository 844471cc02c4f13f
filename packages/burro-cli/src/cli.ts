#!/usr/bin/env node
/**
 * Burro CLI - compile a markup file into a laid-out document
 *
 *   burro compile <source-file> [--font-map <file>] [--backend pdf|xml] [-o <file>]
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { FontCatalog, loadFontMap, render, type PageSink } from 'burro-core';
import { createPdfBackend } from 'burro-backend-pdf';
import { createXmlBackend } from 'burro-backend-xml';

const BACKENDS = ['pdf', 'xml'] as const;

export type BackendType = (typeof BACKENDS)[number];

export interface CompileCommandOptions {
  fontMap?: string;
  backend?: string;
  output?: string;
}

function isBackendType(value: string): value is BackendType {
  return BACKENDS.some(backend => backend === value);
}

function createBackend(type: BackendType): PageSink {
  return type === 'xml' ? createXmlBackend() : createPdfBackend();
}

/**
 * Compile a source file and write the result. Returns the output path.
 */
export function compileFile(sourceFile: string, options: CompileCommandOptions = {}): string {
  const backendType = options.backend ?? 'pdf';
  if (!isBackendType(backendType)) {
    throw new Error(`Unknown backend type: ${backendType}`);
  }

  const sourcePath = path.resolve(sourceFile);
  if (!fs.existsSync(sourcePath)) {
    throw new Error(`Source file not found: ${sourceFile}`);
  }

  // An explicit font map must exist; the default one beside the source is optional
  const catalog = FontCatalog.builtin();
  if (options.fontMap) {
    if (!fs.existsSync(options.fontMap)) {
      throw new Error(`Font map not found: ${options.fontMap}`);
    }
    loadFontMap(options.fontMap, catalog);
  } else {
    const defaultMap = path.join(path.dirname(sourcePath), 'fontmap.yaml');
    if (fs.existsSync(defaultMap)) {
      loadFontMap(defaultMap, catalog);
    }
  }

  const source = fs.readFileSync(sourcePath, 'utf-8');
  const sink = createBackend(backendType);
  const output = render(source, sink, {
    file: sourceFile,
    fonts: catalog,
    onWarning: warning => console.warn(`Warning: ${warning.message}`),
  });

  const outputPath = options.output
    ? path.resolve(options.output)
    : path.join(path.dirname(sourcePath), `${path.basename(sourcePath, path.extname(sourcePath))}.${backendType}`);
  fs.writeFileSync(outputPath, output, sink.encoding);

  if (process.env.DEBUG) {
    console.error(`DEBUG: wrote ${outputPath}`);
  }
  return outputPath;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('burro')
    .description('Compile Burro markup into a fixed, author-controlled page layout')
    .version('0.1.0');

  program
    .command('compile')
    .description('Compile a source file to PDF (or an XML placement dump)')
    .argument('<source-file>', 'Burro source file')
    .option('--font-map <file>', 'YAML font map (default: fontmap.yaml beside the source)')
    .option('--backend <type>', 'Backend type (pdf, xml)', 'pdf')
    .option('-o, --output <file>', 'Output file (default: the source path with .pdf or .xml)')
    .action((sourceFile: string, options: CompileCommandOptions) => {
      try {
        compileFile(sourceFile, options);
      } catch (error) {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        if (process.env.DEBUG && error instanceof Error) {
          console.error(error.stack);
        }
        process.exit(1);
      }
    });

  return program;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return fs.realpathSync(script) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  createProgram().parse();
}
