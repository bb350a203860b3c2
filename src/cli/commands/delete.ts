import { parseArgs } from 'util';
import { z } from 'zod';
import { CliContext } from '../context';
import { formatPreparedRequests, validateArgs } from '../args';
import { DeleteResult } from '../../item/ArchiveItem';
import { IDENTIFIER_RULES, isValidIdentifier } from '../../utils/identifier';
import { logger } from '../../utils/logger';

export const DELETE_USAGE = `usage:
    archive delete <identifier> <file>... [options]

options:
    --cascade            Also delete derivative files of each file.
    -R, --retries=<i>    Retries when S3 returns 503 SlowDown [default: 0].
    -s, --sleep=<i>      Seconds to sleep between retries [default: 30].
    -d, --debug          Print S3 request parameters and exit without sending.`;

const deleteArgsSchema = z.object({
  identifier: z
    .string({ required_error: '<identifier> is required' })
    .refine(isValidIdentifier, { message: `<identifier> ${IDENTIFIER_RULES}` }),
  files: z.array(z.string()).min(1, { message: '<file> is required' }),
  cascade: z.boolean().default(false),
  retries: z.coerce.number().int().min(0).default(0),
  sleep: z.coerce.number().int().min(0).default(30),
  debug: z.boolean().default(false),
});

export async function runDelete(argv: string[], context: CliContext): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      cascade: { type: 'boolean' },
      retries: { type: 'string', short: 'R' },
      sleep: { type: 'string', short: 's' },
      debug: { type: 'boolean', short: 'd' },
    },
  });

  const [identifier, ...files] = positionals;
  const args = validateArgs(deleteArgsSchema, {
    identifier,
    files,
    cascade: values.cascade,
    retries: values.retries,
    sleep: values.sleep,
    debug: values.debug,
  });

  const item = await context.session.getItem(args.identifier);
  const results: DeleteResult[] = [];
  for (const name of args.files) {
    if (!args.debug && !item.getFile(name)) {
      logger.warn(`${args.identifier}/${name} does not exist, skipping`);
      continue;
    }
    results.push(
      await item.deleteFile(name, {
        cascadeDelete: args.cascade,
        retries: args.retries,
        retriesSleep: args.sleep,
        debug: args.debug,
      })
    );
  }

  const prepared = results.flatMap(result => (result.kind === 'debug' ? [result.request] : []));
  if (prepared.length > 0) {
    context.write(formatPreparedRequests(prepared));
  }
  return results.every(result => result.kind === 'debug' || result.response.ok) ? 0 : 1;
}
