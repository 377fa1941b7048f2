import { resolve } from 'path';
import { parseArgs } from 'util';
import { z } from 'zod';
import { TaxonSelectionVO } from '../domain/value-objects/taxon-selection.vo';
import { RunModeVO } from '../domain/value-objects/run-mode.vo';
import { InvalidArgumentsError } from '../domain/errors/pipeline.errors';

export const PROGRAM_NAME = 'wgs-taxon-fetch';
export const VERSION = '0.3.0';

export const USAGE = `Usage: ${PROGRAM_NAME} [options]

Collect NCBI WGS project FASTA files for a taxid and merge them into
WGS4taxid<TAXID>[-<EXCLUDE>].fa in the work directory.

Options:
  -d, --download         Just download (not parse) the WGS project files
  -e, --reverse          Process projects in reversed alphabetical order
  -f, --force            Ignore any previous run: clear the ledger and the
                         output file (previous downloads are kept)
  -r, --resume           Resume, using project files already on disk
                         without listing them on the server
  -t, --taxid <TAXID>    NCBI taxid to include with everything underneath
                         (default: ${TaxonSelectionVO.DEFAULT_INCLUDE_TAXID})
  -x, --exclude <TAXID>  NCBI taxid to exclude with everything underneath
  -w, --workdir <DIR>    Directory for downloads, ledger and output
                         (default: current directory)
  -v, --verbose          Enable verbose (debug) output
  -V, --version          Show the version and exit
  -h, --help             Show this help and exit
`;

const cliSchema = z
  .object({
    download: z.boolean().default(false),
    reverse: z.boolean().default(false),
    force: z.boolean().default(false),
    resume: z.boolean().default(false),
    verbose: z.boolean().default(false),
    taxid: z.string().regex(/^\d+$/, 'TAXID must be a numeric NCBI taxid').default(TaxonSelectionVO.DEFAULT_INCLUDE_TAXID),
    exclude: z.string().regex(/^\d*$/, 'TAXID must be a numeric NCBI taxid').default(''),
    workdir: z.string().min(1, 'DIR must not be empty').optional(),
  })
  .refine((options) => !(options.force && options.resume), {
    message: '-f/--force and -r/--resume are mutually exclusive',
  });

export interface RunOptions {
  selection: TaxonSelectionVO;
  mode: RunModeVO;
  workDir: string;
}

export type CliCommand = { kind: 'help' } | { kind: 'version' } | { kind: 'run'; options: RunOptions };

function readArguments(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        download: { type: 'boolean', short: 'd' },
        reverse: { type: 'boolean', short: 'e' },
        force: { type: 'boolean', short: 'f' },
        resume: { type: 'boolean', short: 'r' },
        taxid: { type: 'string', short: 't' },
        exclude: { type: 'string', short: 'x' },
        workdir: { type: 'string', short: 'w' },
        verbose: { type: 'boolean', short: 'v' },
        version: { type: 'boolean', short: 'V' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (error) {
    throw new InvalidArgumentsError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse the command line (without the node and script entries).
 * Invalid input throws InvalidArgumentsError.
 */
export function parseCliArguments(argv: string[], cwd: string): CliCommand {
  const values = readArguments(argv);

  if (values.help) return { kind: 'help' };
  if (values.version) return { kind: 'version' };

  const result = cliSchema.safeParse(values);
  if (!result.success) {
    throw new InvalidArgumentsError(result.error.errors.map((e) => e.message).join('; '));
  }

  const options = result.data;
  return {
    kind: 'run',
    options: {
      selection: TaxonSelectionVO.create({ includeTaxid: options.taxid, excludeTaxid: options.exclude }),
      mode: RunModeVO.create({
        downloadOnly: options.download,
        force: options.force,
        resume: options.resume,
        reverse: options.reverse,
        verbose: options.verbose,
      }),
      workDir: resolve(cwd, options.workdir ?? '.'),
    },
  };
}

export function banner(): string {
  return `\n=-= ${PROGRAM_NAME} =-= v${VERSION} =-=\n\n`;
}
