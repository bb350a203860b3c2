import { parseArgs } from 'util';
import { z } from 'zod';
import { CliContext } from '../context';
import { keyValueOption, validateArgs } from '../args';
import { logger } from '../../utils/logger';

export const METADATA_USAGE = `usage:
    archive metadata <identifier> [--formats]
    archive metadata <identifier> --modify=<key:value>... [--append] [--target=<target>]

options:
    -m, --modify=<key:value>   Metadata to set; the value REMOVE_TAG deletes the key (repeatable).
    -a, --append               Append values to existing metadata fields.
    -t, --target=<target>      Metadata target to modify [default: metadata].
    -F, --formats              List the file formats in the item.`;

const metadataArgsSchema = z.object({
  identifier: z.string({ required_error: '<identifier> is required' }).min(1),
  modify: keyValueOption('--modify'),
  append: z.boolean().default(false),
  target: z.string().default('metadata'),
  formats: z.boolean().default(false),
});

const writeResponseSchema = z
  .object({ success: z.boolean().optional(), error: z.string().optional(), task_id: z.number().optional() })
  .passthrough();

export async function runMetadata(argv: string[], context: CliContext): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      modify: { type: 'string', short: 'm', multiple: true },
      append: { type: 'boolean', short: 'a' },
      target: { type: 'string', short: 't' },
      formats: { type: 'boolean', short: 'F' },
    },
  });

  const args = validateArgs(metadataArgsSchema, {
    identifier: positionals[0],
    modify: values.modify,
    append: values.append,
    target: values.target,
    formats: values.formats,
  });

  const item = await context.session.getItem(args.identifier);

  if (Object.keys(args.modify).length > 0) {
    const response = await item.modifyMetadata(args.modify, { target: args.target, append: args.append });
    const parsed = writeResponseSchema.safeParse(response.ok ? response.json() : {});
    if (!response.ok || !parsed.success || parsed.data.success === false) {
      const reason = parsed.success && parsed.data.error ? parsed.data.error : await response.errorMessage();
      logger.error(`${args.identifier} - error (${response.status}): ${reason}`);
      return 1;
    }
    context.write(`${args.identifier} - success: ${parsed.data.task_id ?? 'no changes'}`);
    return 0;
  }

  if (args.formats) {
    const formats = new Set(item.files.map(file => file.format).filter(Boolean));
    formats.forEach(format => context.write(String(format)));
    return 0;
  }

  context.write(
    JSON.stringify({
      metadata: item.metadata,
      files: item.files.map(file => file.record),
      server: item.server,
      dir: item.dir,
    })
  );
  return 0;
}
