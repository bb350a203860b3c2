import { parseArgs } from 'util';
import { z } from 'zod';
import { CliContext } from '../context';
import { validateArgs } from '../args';
import { logger } from '../../utils/logger';

export const DOWNLOAD_USAGE = `usage:
    archive download <identifier> [<file>...] [options]

options:
    -f, --format=<format>      Only download files of this format (repeatable).
    --source=<source>          Only download files from this source: original, derivative, metadata (repeatable).
    -g, --glob=<pattern>       Only download files matching the pattern; separate patterns with |.
    --destdir=<dir>            Directory to download into [default: .].
    --no-directories           Do not create an <identifier> directory.
    -c, --checksum             Skip files whose local checksum matches.
    -i, --ignore-existing      Skip files that already exist locally.
    --dry-run                  Print URLs instead of downloading.`;

const downloadArgsSchema = z.object({
  identifier: z.string({ required_error: '<identifier> is required' }).min(1),
  files: z.array(z.string()),
  formats: z.array(z.string()).optional(),
  sources: z.array(z.string()).optional(),
  glob: z.string().optional(),
  destdir: z.string().default('.'),
  noDirectories: z.boolean().default(false),
  checksum: z.boolean().default(false),
  ignoreExisting: z.boolean().default(false),
  dryRun: z.boolean().default(false),
});

export async function runDownload(argv: string[], context: CliContext): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      format: { type: 'string', short: 'f', multiple: true },
      source: { type: 'string', multiple: true },
      glob: { type: 'string', short: 'g' },
      destdir: { type: 'string' },
      'no-directories': { type: 'boolean' },
      checksum: { type: 'boolean', short: 'c' },
      'ignore-existing': { type: 'boolean', short: 'i' },
      'dry-run': { type: 'boolean' },
    },
  });

  const [identifier, ...files] = positionals;
  const args = validateArgs(downloadArgsSchema, {
    identifier,
    files,
    formats: values.format,
    sources: values.source,
    glob: values.glob,
    destdir: values.destdir,
    noDirectories: values['no-directories'],
    checksum: values.checksum,
    ignoreExisting: values['ignore-existing'],
    dryRun: values['dry-run'],
  });

  const item = await context.session.getItem(args.identifier);
  if (!item.exists) {
    logger.error(`${args.identifier}: item does not exist`);
    return 1;
  }

  const results = await item.download({
    files: args.files.length > 0 ? args.files : undefined,
    formats: args.formats,
    source: args.sources,
    globPattern: args.glob,
    destdir: args.destdir,
    noDirectory: args.noDirectories,
    checksum: args.checksum,
    ignoreExisting: args.ignoreExisting,
    dryRun: args.dryRun,
  });

  if (args.dryRun) {
    results.forEach(result => context.write(result.url));
    return 0;
  }

  const failed = results.filter(result => result.status === 'failed');
  logger.stats({
    Downloaded: results.filter(result => result.status === 'downloaded').length,
    Skipped: results.filter(result => result.status === 'skipped').length,
    Failed: failed.length,
  });
  return failed.length > 0 ? 1 : 0;
}
