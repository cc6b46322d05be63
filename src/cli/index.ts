#!/usr/bin/env node

/**
 * quill CLI
 *
 * Usage:
 *   quill toggle <file> [range]            Toggle comments (range: N or A:B)
 *   quill comment <file> [range]           Comment lines
 *   quill uncomment <file> [range]         Uncomment lines
 *   quill normalize <file> [range]         Normalize spacing inside comment markers
 *   quill align <file> [range]             Align trailing comments
 *   quill convert <file> <target> [range]  Convert to line or block comments, or detect the current form
 *   quill debug [file]                     Toggle debug regions (--project <dir>, --list)
 *   quill inspect <file> <line>            Show the comment style in effect on a line
 *   quill select <file> <line>             Print a text-object or semantic selection
 */

import { Command, InvalidArgumentError } from 'commander';
import {
  runAlign, runConvert, runDebug, runInspect, runNormalize, runSelect, runToggle,
  SELECT_OBJECTS, type CommonOptions, type ToggleMode,
} from './commands.js';

const program = new Command();

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

function nonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Expected a non-negative integer.');
  return n;
}

/** Options shared by every command, read from the root program */
function common(extra: { dryRun?: boolean } = {}): CommonOptions {
  const opts = program.opts<{ filetype?: string; syntax: boolean }>();
  return { filetype: opts.filetype, syntax: opts.syntax, dryRun: extra.dryRun };
}

function exitWith(code: number): void {
  process.exitCode = code;
}

program
  .name('quill')
  .description('Language-aware comment toggling for source files')
  .version('0.4.0')
  .option('-f, --filetype <id>', 'Filetype to use instead of the one inferred from the extension')
  .option('--no-syntax', 'Skip tree-sitter detection and use the language table only');

// ─── toggle / comment / uncomment ────────────────────────────────────

const toggleCommands: Array<{ name: ToggleMode; description: string }> = [
  { name: 'toggle', description: 'Comment the range, or uncomment it when every line is commented' },
  { name: 'comment', description: 'Comment every line in the range' },
  { name: 'uncomment', description: 'Uncomment every line in the range' },
];

for (const { name, description } of toggleCommands) {
  const cmd = program
    .command(name)
    .description(description)
    .argument('<file>', 'File to edit')
    .argument('[range]', 'Line N or lines A:B (default: whole file)');
  if (name !== 'uncomment') {
    cmd.option('-s, --style <type>', 'Comment form: line or block');
  }
  cmd
    .option('--dry-run', 'Print the result instead of writing the file')
    .action(async (file: string, range: string | undefined, opts: { style?: string; dryRun?: boolean }) => {
      exitWith(await runToggle(file, range, { mode: name, style: opts.style }, common(opts)));
    });
}

// ─── normalize ───────────────────────────────────────────────────────

program
  .command('normalize')
  .description('Normalize to one space inside comment markers')
  .argument('<file>', 'File to edit')
  .argument('[range]', 'Line N or lines A:B (default: whole file)')
  .option('--dry-run', 'Print the result instead of writing the file')
  .action(async (file: string, range: string | undefined, opts: { dryRun?: boolean }) => {
    exitWith(await runNormalize(file, range, common(opts)));
  });

// ─── align ───────────────────────────────────────────────────────────

program
  .command('align')
  .description('Align trailing line comments to a common column')
  .argument('<file>', 'File to edit')
  .argument('[range]', 'Line N or lines A:B (default: whole file)')
  .option('--column <n>', 'Never start a comment past this column', positiveInt)
  .option('--min-gap <n>', 'Minimum spaces between code and comment', positiveInt)
  .option('--tab-width <n>', 'Display width of a tab', positiveInt)
  .option('--dry-run', 'Print the result instead of writing the file')
  .action(async (file: string, range: string | undefined, opts: {
    column?: number; minGap?: number; tabWidth?: number; dryRun?: boolean;
  }) => {
    const { dryRun, ...align } = opts;
    exitWith(await runAlign(file, range, align, common({ dryRun })));
  });

// ─── convert ─────────────────────────────────────────────────────────

program
  .command('convert')
  .description('Convert comments to line or block form ("detect" prints the current form)')
  .argument('<file>', 'File to edit')
  .argument('<target>', 'line | block | detect')
  .argument('[range]', 'Line N or lines A:B (default: whole file)')
  .option('--dry-run', 'Print the result instead of writing the file')
  .action(async (file: string, target: string, range: string | undefined, opts: { dryRun?: boolean }) => {
    exitWith(await runConvert(file, target, range, common(opts)));
  });

// ─── debug ───────────────────────────────────────────────────────────

program
  .command('debug')
  .description('Toggle debug regions in a file, or across a project with --project')
  .argument('[file]', 'File to edit')
  .option('-p, --project <dir>', 'Toggle debug regions in every file under <dir>')
  .option('-l, --list', 'List debug regions instead of toggling them')
  .option('--start-marker <text>', 'Region start marker')
  .option('--end-marker <text>', 'Region end marker')
  .option('--no-search-tool', 'Scan with the filesystem walk only')
  .option('--dry-run', 'Show what would change without writing files')
  .action(async (file: string | undefined, opts: {
    project?: string; list?: boolean; startMarker?: string; endMarker?: string;
    searchTool: boolean; dryRun?: boolean;
  }) => {
    const { dryRun, ...debug } = opts;
    exitWith(await runDebug(file, debug, common({ dryRun })));
  });

// ─── inspect ─────────────────────────────────────────────────────────

program
  .command('inspect')
  .description('Show the comment style and state at a line')
  .argument('<file>', 'File to read')
  .argument('<line>', 'Line number')
  .option('--col <n>', '0-indexed column (default: 0)', nonNegativeInt)
  .action(async (file: string, line: string, opts: { col?: number }) => {
    exitWith(await runInspect(file, line, opts, common()));
  });

// ─── select ──────────────────────────────────────────────────────────

program
  .command('select')
  .description('Print the range a text object or semantic selection covers')
  .argument('<file>', 'File to read')
  .argument('<line>', 'Line number')
  .requiredOption('-o, --object <kind>', `Text object: ${SELECT_OBJECTS.join(' | ')}`)
  .option('-e, --end <line>', 'Last line of the range to expand (object "expand")')
  .action(async (file: string, line: string, opts: { object: string; end?: string }) => {
    exitWith(await runSelect(file, line, opts, common()));
  });

await program.parseAsync();
