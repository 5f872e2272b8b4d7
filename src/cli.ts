#!/usr/bin/env node
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { readFileSync, realpathSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import { decodeProgram } from './frontend/json.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  nullChecks: boolean;
  runtimePrelude: boolean;
  annotateSource: boolean;
};

function usage(): string {
  return [
    'skac [options] <program.ast.json>',
    '',
    'Options:',
    '  -o, --output <file>     Output assembly path (default: input with .s extension)',
    '      --no-null-checks    Do not test pointers before dereferencing',
    '      --runtime-prelude   Declare the runtime library functions as extern',
    '      --annotate          Emit source-location comments (reads the files named by spans)',
    '  -V, --version           Print version',
    '  -h, --help              Show help',
    '',
    'Notes:',
    '  - <program.ast.json> is the parser output serialized as JSON and must be the last argument.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function packageVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const pkg: unknown = JSON.parse(readFileSync(resolve(here, '..', '..', 'package.json'), 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let nullChecks = true;
  let runtimePrelude = false;
  let annotateSource = false;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${packageVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      if (a.startsWith('--output=')) {
        const v = a.slice('--output='.length);
        if (!v) fail(`--output expects a value`);
        outputPath = v;
        continue;
      }
      const v = argv[++i];
      if (!v) fail(`${a} expects a value`);
      outputPath = v;
      continue;
    }
    if (a === '--no-null-checks') {
      nullChecks = false;
      continue;
    }
    if (a === '--runtime-prelude') {
      runtimePrelude = true;
      continue;
    }
    if (a === '--annotate') {
      annotateSource = true;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <program.ast.json> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <program.ast.json> argument (and it must be last)`);
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    nullChecks,
    runtimePrelude,
    annotateSource,
  };
}

/**
 * `prog.ast.json` -> `prog.s`, `prog.json` -> `prog.s`.
 */
export function defaultOutputPath(entryFile: string): string {
  const entry = resolve(entryFile);
  const stem = entry.replace(/\.json$/i, '').replace(/\.ast$/i, '');
  return `${stem}.s`;
}

async function writeArtifacts(outputPath: string, artifacts: Artifact[]): Promise<void> {
  for (const artifact of artifacts) {
    if (artifact.kind !== 'asm') continue;
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, artifact.text, 'utf8');
    process.stdout.write(`${outputPath}\n`);
  }
}

/**
 * Every file named by a `span` anywhere in the decoded tree.
 */
function spanFiles(value: unknown, out: Set<string>): Set<string> {
  if (Array.isArray(value)) {
    for (const v of value) spanFiles(v, out);
    return out;
  }
  if (typeof value !== 'object' || value === null) return out;
  for (const [key, v] of Object.entries(value)) {
    if (key === 'span' && typeof v === 'object' && v !== null && 'file' in v) {
      if (typeof v.file === 'string') out.add(v.file);
      continue;
    }
    spanFiles(v, out);
  }
  return out;
}

async function readSources(
  files: Iterable<string>,
  diagnostics: Diagnostic[],
): Promise<Map<string, string>> {
  const sources = new Map<string, string>();
  for (const file of files) {
    try {
      sources.set(file, await readFile(file, 'utf8'));
    } catch (err) {
      diagnostics.push({
        id: DiagnosticIds.IoReadFailed,
        severity: 'warning',
        message: `Cannot read source for annotation: ${String(err)}`,
        file,
      });
    }
  }
  return sources;
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

function reportDiagnostics(diagnostics: Diagnostic[]): void {
  for (const d of [...diagnostics].sort(compareDiagnosticsForCli)) {
    process.stderr.write(`${formatDiagnostic(d)}\n`);
  }
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const diagnostics: Diagnostic[] = [];
    let text: string;
    try {
      text = await readFile(parsed.entryFile, 'utf8');
    } catch (err) {
      diagnostics.push({
        id: DiagnosticIds.IoReadFailed,
        severity: 'error',
        message: `Failed to read input file: ${String(err)}`,
        file: parsed.entryFile,
      });
      reportDiagnostics(diagnostics);
      return 2;
    }

    const program = decodeProgram(text, parsed.entryFile, diagnostics);
    if (!program) {
      reportDiagnostics(diagnostics);
      return 1;
    }

    const sources = parsed.annotateSource
      ? await readSources(spanFiles(program, new Set()), diagnostics)
      : undefined;

    const res = compile(
      program,
      {
        nullChecks: parsed.nullChecks,
        runtimePrelude: parsed.runtimePrelude,
        annotateSource: parsed.annotateSource,
        ...(sources ? { sources } : {}),
      },
      { formats: defaultFormatWriters },
    );

    const all = [...diagnostics, ...res.diagnostics];
    reportDiagnostics(all);
    if (all.some((d) => d.severity === 'error')) {
      return 1;
    }

    await writeArtifacts(parsed.outputPath ?? defaultOutputPath(parsed.entryFile), res.artifacts);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`skac: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function stripExtendedWindowsPrefix(path: string): string {
  if (path.startsWith('\\\\?\\UNC\\')) return `\\\\${path.slice(8)}`;
  if (path.startsWith('\\\\?\\')) return path.slice(4);
  return path;
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const stripped = stripExtendedWindowsPrefix(real);
  const normalized = stripped.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = normalizePathForCompare(fileURLToPath(import.meta.url));
  const invoked = normalizePathForCompare(invokedAs);
  if (invoked === self) return true;
  // npm bin shims can surface a different spelling of the same built entry.
  return invoked.endsWith('/dist/src/cli.js') && self.endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err: unknown) => {
      process.stderr.write(`skac: ${String(err)}\n`);
      process.exit(2);
    },
  );
}
