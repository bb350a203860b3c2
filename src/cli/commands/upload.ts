import fs from 'fs-extra';
import { parseArgs } from 'util';
import { parse as parseCsv } from 'csv-parse';
import { z } from 'zod';
import { CliContext } from '../context';
import { formatPreparedRequests, keyValueOption, validateArgs } from '../args';
import { ArchiveSession } from '../../session/ArchiveSession';
import { MetadataInput, PreparedRequest } from '../../types';
import { UploadFiles, UploadOptions, UploadResult, uploadSucceeded } from '../../upload/UploadManager';
import { ValidationError } from '../../utils/errors';
import { IDENTIFIER_RULES, isValidIdentifier, validateIdentifier } from '../../utils/identifier';
import { logger } from '../../utils/logger';

export const UPLOAD_USAGE = `usage:
    archive upload <identifier> <file>... [options]
    archive upload <identifier> - --remote-name=<name> [options]
    archive upload <identifier> <file> --remote-name=<name> [options]
    archive upload --spreadsheet=<metadata.csv> [options]
    archive upload <identifier> --status-check

options:
    -q, --quiet                  Turn off output.
    -d, --debug                  Print S3 request parameters and exit without sending.
    -r, --remote-name=<name>     Remote filename (required when reading stdin).
    -S, --spreadsheet=<csv>      Bulk upload from a CSV with identifier and file columns.
    -m, --metadata=<key:value>   Metadata to add to the item (repeatable).
    -H, --header=<key:value>     S3 HTTP headers to send (repeatable).
    -c, --checksum               Skip files whose checksum matches the item's copy.
    -n, --no-derive              Do not derive uploaded files.
    --size-hint=<size>           Size hint for the item, in bytes.
    --delete                     Delete local files after verifying checksums.
    -R, --retries=<i>            Retries when S3 returns 503 SlowDown [default: 0].
    -s, --sleep=<i>              Seconds to sleep between retries [default: 30].
    --status-check               Check whether S3 accepts requests for the item.`;

const uploadArgsSchema = z
  .object({
    identifier: z
      .string()
      .refine(isValidIdentifier, { message: `<identifier> ${IDENTIFIER_RULES}` })
      .optional(),
    files: z.array(z.string()),
    remoteName: z.string().min(1).optional(),
    spreadsheet: z.string().optional(),
    metadata: keyValueOption('--metadata'),
    header: keyValueOption('--header'),
    checksum: z.boolean().default(false),
    noDerive: z.boolean().default(false),
    sizeHint: z.coerce.number().int().positive({ message: '--size-hint value must be an integer' }).optional(),
    delete: z.boolean().default(false),
    retries: z.coerce.number().int().min(0, { message: '--retries value must be an integer' }).default(0),
    sleep: z.coerce.number().int().min(0, { message: '--sleep value must be an integer' }).default(30),
    debug: z.boolean().default(false),
    quiet: z.boolean().default(false),
    statusCheck: z.boolean().default(false),
  })
  .superRefine((args, ctx) => {
    if (!args.identifier && !args.spreadsheet) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: '<identifier> or --spreadsheet is required' });
    }
    if (args.spreadsheet && !fs.pathExistsSync(args.spreadsheet)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: '--spreadsheet should be a readable file' });
    }
    if (!args.spreadsheet && !args.statusCheck && args.files.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: '<file> is required' });
    }
    if (args.files.some(file => file !== '-' && !fs.pathExistsSync(file))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: '<file> should be a readable file or directory' });
    }
    if (args.files.includes('-') && !args.remoteName) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: '--remote-name must be provided when uploading from stdin',
      });
    }
  });

const spreadsheetRowSchema = z.record(z.string());

function toHeaders(parsed: Record<string, string | string[]>): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(parsed)) {
    headers[name] = Array.isArray(value) ? value.join(',') : value;
  }
  return headers;
}

function report(results: UploadResult[], context: CliContext): boolean {
  const debugRequests: PreparedRequest[] = [];
  for (const result of results) {
    if (result.kind === 'debug') {
      debugRequests.push(result.request);
    }
  }
  if (debugRequests.length > 0) {
    context.write(formatPreparedRequests(debugRequests));
  }
  return results.every(uploadSucceeded);
}

/**
 * One upload per row, sequentially, on a single session. A row without an
 * identifier continues the item of the row above it.
 */
async function uploadSpreadsheet(
  spreadsheet: string,
  options: UploadOptions,
  session: ArchiveSession,
  context: CliContext
): Promise<boolean> {
  const parser = fs.createReadStream(spreadsheet).pipe(
    parseCsv({ columns: true, skip_empty_lines: true, trim: true })
  );

  let previousIdentifier: string | undefined;
  let allSucceeded = true;
  let rowNumber = 1;

  for await (const record of parser) {
    rowNumber++;
    const row = spreadsheetRowSchema.parse(record);
    const { identifier: rowIdentifier, file, ...columns } = row;
    const identifier = rowIdentifier || previousIdentifier;

    if (!identifier || !file) {
      logger.error(`${spreadsheet} row ${rowNumber}: identifier and file are required`);
      allSucceeded = false;
      continue;
    }
    if (identifier !== previousIdentifier) {
      logger.section(`${identifier}:`);
    }

    const rowMetadata: MetadataInput = {};
    for (const [key, value] of Object.entries(columns)) {
      if (value) rowMetadata[key.toLowerCase()] = value;
    }

    try {
      validateIdentifier(identifier);
      const item = await session.getItem(identifier);
      const results = await item.upload(file, { ...options, metadata: { ...options.metadata, ...rowMetadata } });
      allSucceeded = report(results, context) && allSucceeded;
    } catch (error) {
      logger.error(`${spreadsheet} row ${rowNumber} (${identifier}): ${error instanceof Error ? error.message : String(error)}`);
      allSucceeded = false;
    }
    previousIdentifier = identifier;
  }

  return allSucceeded;
}

export async function runUpload(argv: string[], context: CliContext): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'remote-name': { type: 'string', short: 'r' },
      spreadsheet: { type: 'string', short: 'S' },
      metadata: { type: 'string', short: 'm', multiple: true },
      header: { type: 'string', short: 'H', multiple: true },
      checksum: { type: 'boolean', short: 'c' },
      'no-derive': { type: 'boolean', short: 'n' },
      'size-hint': { type: 'string' },
      delete: { type: 'boolean' },
      retries: { type: 'string', short: 'R' },
      sleep: { type: 'string', short: 's' },
      debug: { type: 'boolean', short: 'd' },
      quiet: { type: 'boolean', short: 'q' },
      'status-check': { type: 'boolean' },
    },
  });

  const [identifier, ...files] = positionals;
  const args = validateArgs(uploadArgsSchema, {
    identifier,
    files,
    remoteName: values['remote-name'],
    spreadsheet: values.spreadsheet,
    metadata: values.metadata,
    header: values.header,
    checksum: values.checksum,
    noDerive: values['no-derive'],
    sizeHint: values['size-hint'],
    delete: values.delete,
    retries: values.retries,
    sleep: values.sleep,
    debug: values.debug,
    quiet: values.quiet,
    statusCheck: values['status-check'],
  });

  logger.setQuiet(args.quiet);
  const { session } = context;

  if (args.statusCheck && args.identifier) {
    if (await session.s3IsOverloaded(args.identifier)) {
      logger.warn(`${args.identifier} is over limit, and not accepting requests. Expect 503 SlowDown errors.`);
      return 1;
    }
    context.write(`success: ${args.identifier} is accepting requests.`);
    return 0;
  }

  const options: UploadOptions = {
    metadata: args.metadata,
    headers: toHeaders(args.header),
    queueDerive: !args.noDerive,
    checksum: args.checksum,
    delete: args.delete,
    retries: args.retries,
    retriesSleep: args.sleep,
    debug: args.debug,
    sizeHint: args.sizeHint,
  };

  if (args.spreadsheet) {
    return (await uploadSpreadsheet(args.spreadsheet, options, session, context)) ? 0 : 1;
  }

  let uploadFiles: UploadFiles = args.files;
  if (args.remoteName) {
    const source = args.files[0] === '-' ? context.stdin : args.files[0];
    uploadFiles = { [args.remoteName]: source };
  }

  if (!args.identifier) {
    throw new ValidationError('<identifier> is required');
  }
  const item = await session.getItem(args.identifier);
  logger.section(`${item.identifier}:`);
  const results = await item.upload(uploadFiles, options);
  return report(results, context) ? 0 : 1;
}
