import { parseArgs } from 'util';
import { z } from 'zod';
import { CliContext } from '../context';
import { keyValueOption, validateArgs } from '../args';

export const SEARCH_USAGE = `usage:
    archive search <query>... [options]

options:
    -f, --field=<field>         Metadata fields to return (repeatable).
    -s, --sort=<field order>    Sort results, e.g. "downloads desc" (repeatable).
    -p, --parameters=<key:value>  Extra search parameters; page or rows fetch a single page (repeatable).
    -i, --itemlist              Output identifiers only.
    -n, --num-found             Print the number of results and exit.`;

const searchArgsSchema = z.object({
  query: z.string().min(1, { message: '<query> is required' }),
  fields: z.array(z.string()).default([]),
  sorts: z.array(z.string()).default([]),
  parameters: keyValueOption('--parameters'),
  itemlist: z.boolean().default(false),
  numFound: z.boolean().default(false),
});

export async function runSearch(argv: string[], context: CliContext): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      field: { type: 'string', short: 'f', multiple: true },
      sort: { type: 'string', short: 's', multiple: true },
      parameters: { type: 'string', short: 'p', multiple: true },
      itemlist: { type: 'boolean', short: 'i' },
      'num-found': { type: 'boolean', short: 'n' },
    },
  });

  const args = validateArgs(searchArgsSchema, {
    query: positionals.join(' '),
    fields: values.field,
    sorts: values.sort,
    parameters: values.parameters,
    itemlist: values.itemlist,
    numFound: values['num-found'],
  });

  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(args.parameters)) {
    params[key] = Array.isArray(value) ? value[value.length - 1] : value;
  }

  const search = context.session.searchItems(args.query, {
    fields: args.itemlist ? ['identifier'] : args.fields,
    sorts: args.sorts,
    params,
  });

  if (args.numFound) {
    context.write(String(await search.getNumFound()));
    return 0;
  }

  for await (const doc of search) {
    context.write(args.itemlist ? String(doc.identifier) : JSON.stringify(doc));
  }
  return 0;
}
