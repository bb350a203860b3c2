import { parseArgs } from 'util';
import { z } from 'zod';
import { CliContext } from '../context';
import { validateArgs } from '../args';

export const LIST_USAGE = `usage:
    archive list <identifier> [options]

options:
    -l, --location             Print the download URL of each file.
    -c, --columns=<name,size>  Comma-separated file fields to print [default: name].
    -g, --glob=<pattern>       Only list files matching the pattern; separate patterns with |.
    -f, --format=<format>      Only list files of this format (repeatable).`;

const listArgsSchema = z.object({
  identifier: z.string({ required_error: '<identifier> is required' }).min(1),
  location: z.boolean().default(false),
  columns: z
    .string()
    .default('name')
    .transform(value => value.split(',').map(column => column.trim()).filter(Boolean)),
  glob: z.string().optional(),
  formats: z.array(z.string()).optional(),
});

export async function runList(argv: string[], context: CliContext): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      location: { type: 'boolean', short: 'l' },
      columns: { type: 'string', short: 'c' },
      glob: { type: 'string', short: 'g' },
      format: { type: 'string', short: 'f', multiple: true },
    },
  });

  const args = validateArgs(listArgsSchema, {
    identifier: positionals[0],
    location: values.location,
    columns: values.columns,
    glob: values.glob,
    formats: values.format,
  });

  const item = await context.session.getItem(args.identifier);
  const files = item.getFiles({ globPattern: args.glob, formats: args.formats });

  for (const file of files) {
    if (args.location) {
      context.write(file.url);
      continue;
    }
    const row = args.columns.map(column => {
      const value = file.record[column];
      return value === undefined ? '' : String(value);
    });
    context.write(row.join('\t'));
  }
  return 0;
}
